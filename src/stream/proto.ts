// src/stream/proto.ts
/**
 * Run-time loading of the raw-data protocol definitions and the codec used by
 * the gRPC client: request encoding and response decoding into validated
 * {@link StreamFrame}s.
 */
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import { getLogger } from '../utils/logger.ts';
import { TransactionsResponseSchema, type StreamFrame } from './types.ts';

const log = getLogger('stream/proto');

export const DEFAULT_PROTO_DIR = fileURLToPath(new URL('../../protos', import.meta.url));

/**
 * Recursively collects all `.proto` file paths from a directory.
 * @param dir - The directory to search for `.proto` files.
 * @returns An array of file paths to `.proto` files.
 */
export function collectProtoFiles(dir: string): string[] {
  const out: string[] = [];
  (function walk(d: string) {
    const entries = fs.readdirSync(d, { withFileTypes: true });
    for (const e of entries) {
      const p = path.join(d, e.name);
      if (e.isDirectory()) walk(p);
      else if (e.isFile() && p.endsWith('.proto')) out.push(p);
    }
  })(dir);
  return out;
}

/**
 * Loads all `.proto` files from a directory into a protobuf Root.
 * Imports are resolved relative to `protoDir`.
 */
export function loadProtoRoot(protoDir: string = DEFAULT_PROTO_DIR): protobuf.Root {
  const files = collectProtoFiles(protoDir);
  if (files.length === 0) throw new Error(`No .proto files found in ${protoDir}`);

  const root = new protobuf.Root();
  root.resolvePath = (_origin, target) => {
    if (path.isAbsolute(target)) return target;
    return path.join(protoDir, target);
  };
  root.loadSync(files, { keepCase: true });
  root.resolveAll();
  log.debug('Loaded proto root', { totalFiles: files.length });
  return root;
}

/** Plain request object of `GetTransactions`. */
export type GetTransactionsRequest = {
  starting_version: string;
  transactions_count?: string;
};

export type FrameCodec = {
  encodeRequest(req: GetTransactionsRequest): Buffer;
  decodeFrame(buf: Buffer): StreamFrame;
};

/**
 * Builds the request/response codec from a loaded root.
 */
export function createFrameCodec(root: protobuf.Root): FrameCodec {
  const RequestType = root.lookupType('aptos.indexer.v1.GetTransactionsRequest');
  const ResponseType = root.lookupType('aptos.indexer.v1.TransactionsResponse');

  return {
    encodeRequest(req) {
      return Buffer.from(RequestType.encode(RequestType.fromObject(req)).finish());
    },
    decodeFrame(buf) {
      const msg = ResponseType.decode(buf);
      const obj = ResponseType.toObject(msg, {
        longs: String,
        enums: String,
        bytes: String,
        defaults: true,
        arrays: true,
        oneofs: true,
      });
      const parsed = TransactionsResponseSchema.parse(obj);
      return {
        chainId: parsed.chain_id ?? null,
        transactions: parsed.transactions,
        sizeInBytes: buf.length,
      };
    },
  };
}
