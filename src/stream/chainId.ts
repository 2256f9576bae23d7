// src/stream/chainId.ts
import { getLogger } from '../utils/logger.ts';
import { errorMessage } from '../errors.ts';
import type { StreamOpener } from './client.ts';
import type { StreamFrame } from './types.ts';

const log = getLogger('stream/chainId');

export type ChainIdErrorKind = 'NoChainId' | 'RpcError' | 'StreamEndedEarly';

export class ChainIdError extends Error {
  constructor(
    readonly kind: ChainIdErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ChainIdError';
  }
}

/**
 * Reads the chain id served by the data service from a minimal `[1, 2]` stream.
 * The stream is always cancelled afterwards.
 *
 * @throws {ChainIdError} `NoChainId`, `RpcError` or `StreamEndedEarly`.
 */
export async function detectChainId(open: StreamOpener): Promise<number> {
  const stream = await open(1, 2);
  try {
    let first: IteratorResult<StreamFrame>;
    try {
      first = await stream.frames.next();
    } catch (e) {
      throw new ChainIdError('RpcError', `[chain-id] stream error: ${errorMessage(e)}`, { cause: e });
    }
    if (first.done) throw new ChainIdError('StreamEndedEarly', '[chain-id] stream ended before the first frame');
    const { chainId } = first.value;
    if (chainId === null) throw new ChainIdError('NoChainId', '[chain-id] first frame carries no chain id');
    log.info(`[chain-id] data service reports chain_id=${chainId} connection_id=${stream.connectionId}`);
    return chainId;
  } finally {
    stream.cancel();
  }
}
