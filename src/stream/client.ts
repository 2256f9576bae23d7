// src/stream/client.ts
/**
 * gRPC client of the raw-data service: opens a server-streaming
 * `GetTransactions` call and hands back a lazy iterator of decoded frames plus
 * the server-assigned connection id.
 */
import * as grpc from '@grpc/grpc-js';
import { getLogger } from '../utils/logger.ts';
import { TimeoutError, withTimeout } from '../utils/time.ts';
import { errorMessage } from '../errors.ts';
import type { FrameCodec, GetTransactionsRequest } from './proto.ts';
import type { StreamFrame } from './types.ts';

const log = getLogger('stream/client');

/** Attempts per connect and per GetTransactions call. */
export const RECONNECTION_MAX_RETRIES = 5;
/** Decode and encode limit for a single message (256 MiB). */
export const MAX_RESPONSE_SIZE = 256 * 1024 * 1024;
export const GET_TRANSACTIONS_PATH = '/aptos.indexer.v1.RawData/GetTransactions';
export const CONNECTION_ID_HEADER = 'x-aptos-connection-id';
export const REQUEST_NAME_HEADER = 'x-aptos-request-name';

// grpc-js compression algorithm ids: 0 identity, 1 deflate, 2 gzip
const GZIP = 2;

export type StreamErrorKind = 'ConnectTimeout' | 'ConnectFailed' | 'RequestFailed';

/**
 * Raised once a connect or request step has failed {@link RECONNECTION_MAX_RETRIES} times.
 */
export class StreamError extends Error {
  constructor(
    readonly kind: StreamErrorKind,
    readonly attempts: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StreamError';
  }
}

export type StreamClientConfig = {
  dataServiceUrl: string;
  authToken: string;
  requestName: string;
  http2PingIntervalSecs: number;
  http2PingTimeoutSecs: number;
  reconnectionTimeoutSecs: number;
};

/**
 * An open `GetTransactions` stream. Not restartable: reconnecting means opening a new one.
 */
export type OpenedStream = {
  frames: AsyncIterator<StreamFrame>;
  connectionId: string;
  /** Cancels the call and closes the underlying channel. */
  cancel(): void;
};

/**
 * Opens a stream for `[startingVersion, endingVersion]` (open-ended without an end).
 */
export type StreamOpener = (startingVersion: number, endingVersion?: number) => Promise<OpenedStream>;

/**
 * Splits the service URL into a gRPC target and channel credentials; `https` enables TLS.
 */
export function parseTarget(url: string): { target: string; tls: boolean } {
  const u = new URL(url);
  const tls = u.protocol === 'https:';
  if (!tls && u.protocol !== 'http:') throw new Error(`unsupported data service scheme: ${u.protocol}`);
  const port = u.port || (tls ? '443' : '80');
  return { target: `${u.hostname}:${port}`, tls };
}

export function buildChannelOptions(cfg: StreamClientConfig): grpc.ChannelOptions {
  return {
    'grpc.keepalive_time_ms': cfg.http2PingIntervalSecs * 1000,
    'grpc.keepalive_timeout_ms': cfg.http2PingTimeoutSecs * 1000,
    'grpc.keepalive_permit_without_calls': 1,
    'grpc.max_receive_message_length': MAX_RESPONSE_SIZE,
    'grpc.max_send_message_length': MAX_RESPONSE_SIZE,
    'grpc.default_compression_algorithm': GZIP,
  };
}

/**
 * `transactions_count` is only sent for a bounded range: `end - start + 1`.
 */
export function buildRequest(startingVersion: number, endingVersion?: number): GetTransactionsRequest {
  const req: GetTransactionsRequest = { starting_version: String(startingVersion) };
  if (endingVersion !== undefined) req.transactions_count = String(endingVersion - startingVersion + 1);
  return req;
}

export function buildMetadata(cfg: Pick<StreamClientConfig, 'authToken' | 'requestName'>): grpc.Metadata {
  const md = new grpc.Metadata();
  md.set('authorization', `Bearer ${cfg.authToken}`);
  md.set(REQUEST_NAME_HEADER, cfg.requestName);
  return md;
}

/**
 * Reads the connection id the server attaches to the response headers.
 */
export function connectionIdOf(headers: grpc.Metadata): string {
  const [value] = headers.get(CONNECTION_ID_HEADER);
  return value === undefined ? 'unknown' : value.toString();
}

/**
 * Runs `attempt` up to {@link RECONNECTION_MAX_RETRIES} times, returning the
 * first success and throwing a {@link StreamError} of the last failure's kind.
 */
export async function withRetries<T>(
  label: string,
  kindOf: (e: unknown) => StreamErrorKind,
  attempt: (n: number) => Promise<T>,
): Promise<T> {
  let last: unknown;
  for (let n = 1; n <= RECONNECTION_MAX_RETRIES; n++) {
    try {
      return await attempt(n);
    } catch (e) {
      last = e;
      log.warn(`[stream] ${label} failed (attempt ${n}/${RECONNECTION_MAX_RETRIES}): ${errorMessage(e)}`);
    }
  }
  throw new StreamError(
    kindOf(last),
    RECONNECTION_MAX_RETRIES,
    `${label} failed after ${RECONNECTION_MAX_RETRIES} attempts: ${errorMessage(last)}`,
    { cause: last },
  );
}

function isStreamFrame(v: unknown): v is StreamFrame {
  return typeof v === 'object' && v !== null && 'transactions' in v && Array.isArray(v.transactions) && 'sizeInBytes' in v;
}

async function* framesOf(call: grpc.ClientReadableStream<StreamFrame>): AsyncGenerator<StreamFrame> {
  for await (const chunk of call) {
    if (!isStreamFrame(chunk)) throw new Error('unexpected chunk on transaction stream');
    yield chunk;
  }
}

function connectOnce(target: string, creds: grpc.ChannelCredentials, options: grpc.ChannelOptions, timeoutMs: number) {
  const client = new grpc.Client(target, creds, options);
  return new Promise<grpc.Client>((resolve, reject) => {
    client.waitForReady(Date.now() + timeoutMs, (err) => {
      if (err) {
        client.close();
        reject(err);
      } else {
        resolve(client);
      }
    });
  });
}

/**
 * Connects to the data service and starts `GetTransactions`.
 * Connect and call are each retried; both are bounded by `reconnectionTimeoutSecs` per attempt.
 */
export async function openStream(
  cfg: StreamClientConfig,
  codec: FrameCodec,
  startingVersion: number,
  endingVersion?: number,
): Promise<OpenedStream> {
  const { target, tls } = parseTarget(cfg.dataServiceUrl);
  const creds = tls ? grpc.credentials.createSsl() : grpc.credentials.createInsecure();
  const timeoutMs = cfg.reconnectionTimeoutSecs * 1000;
  const request = buildRequest(startingVersion, endingVersion);

  log.info(
    `[stream] connecting to ${target} (tls=${tls}) start_version=${startingVersion} end_version=${endingVersion ?? 'none'}`,
  );

  const client = await withRetries(
    'connect',
    (e) => (e instanceof Error && /deadline/i.test(e.message) ? 'ConnectTimeout' : 'ConnectFailed'),
    () => connectOnce(target, creds, buildChannelOptions(cfg), timeoutMs),
  );

  try {
    return await withRetries(
      'GetTransactions',
      () => 'RequestFailed',
      async () => {
        const call = client.makeServerStreamRequest<GetTransactionsRequest, StreamFrame>(
          GET_TRANSACTIONS_PATH,
          (req) => codec.encodeRequest(req),
          (buf) => codec.decodeFrame(buf),
          request,
          buildMetadata(cfg),
        );
        try {
          const headers = await withTimeout(
            new Promise<grpc.Metadata>((resolve, reject) => {
              call.once('metadata', resolve);
              call.once('error', reject);
            }),
            timeoutMs,
            'GetTransactions headers',
          );
          const connectionId = connectionIdOf(headers);
          log.info(`[stream] stream opened start_version=${startingVersion} connection_id=${connectionId}`);
          return {
            frames: framesOf(call),
            connectionId,
            cancel() {
              call.cancel();
              client.close();
            },
          };
        } catch (e) {
          call.cancel();
          throw e instanceof TimeoutError ? new Error(`no response headers within ${timeoutMs}ms`) : e;
        }
      },
    );
  } catch (e) {
    client.close();
    throw e;
  }
}

/**
 * Binds configuration and codec into a {@link StreamOpener}.
 */
export function createStreamOpener(cfg: StreamClientConfig, codec: FrameCodec): StreamOpener {
  return (startingVersion, endingVersion) => openStream(cfg, codec, startingVersion, endingVersion);
}
