// src/stream/types.ts
/**
 * Domain shapes of the streamed data and the zod schemas that turn decoded
 * protobuf objects (protobufjs `toObject` output, snake_case, longs as strings)
 * into them.
 */
import { z } from 'zod';

/**
 * u64 → JS number. Versions and heights are dense counters well below 2^53;
 * anything larger is rejected instead of silently losing precision.
 */
export const u64 = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isSafeInteger(n) || n < 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a safe u64: ${String(v)}` });
    return z.NEVER;
  }
  return n;
});

const u64String = z.union([z.string(), z.number()]).transform((v) => String(v));

const TimestampSchema = z
  .object({ seconds: z.union([z.string(), z.number()]), nanos: z.number() })
  .transform((t) => new Date(Number(t.seconds) * 1000 + Math.floor(t.nanos / 1_000_000)));

export type TransactionEvent = {
  /** Address of the event handle owner (`0x0`-like for module events). */
  accountAddress: string;
  creationNumber: string;
  sequenceNumber: string;
  typeStr: string;
  /** JSON-encoded Move value. */
  data: string;
};

const EventSchema = z
  .object({
    key: z.object({ creation_number: u64String, account_address: z.string() }).nullish(),
    sequence_number: u64String,
    type_str: z.string(),
    data: z.string(),
  })
  .transform(
    (e): TransactionEvent => ({
      accountAddress: e.key?.account_address ?? '0x0',
      creationNumber: e.key?.creation_number ?? '0',
      sequenceNumber: e.sequence_number,
      typeStr: e.type_str,
      data: e.data,
    }),
  );

/**
 * One write-set change. The position inside `Transaction.changes` is its index.
 */
export type WriteSetChange =
  | { kind: 'write_resource'; address: string; typeStr: string; data: string }
  | { kind: 'delete_resource'; address: string; typeStr: string }
  | { kind: 'write_table_item'; handle: string; key: string; keyType: string; value: string; valueType: string }
  | { kind: 'delete_table_item'; handle: string; key: string; keyType: string }
  | { kind: 'write_module'; address: string }
  | { kind: 'delete_module'; address: string };

const WriteSetChangeSchema = z
  .object({
    change: z.string().optional(),
    write_resource: z.object({ address: z.string(), type_str: z.string(), data: z.string() }).nullish(),
    delete_resource: z.object({ address: z.string(), type_str: z.string() }).nullish(),
    write_table_item: z
      .object({
        handle: z.string(),
        key: z.string(),
        data: z.object({ key_type: z.string(), value: z.string(), value_type: z.string() }).nullish(),
      })
      .nullish(),
    delete_table_item: z
      .object({ handle: z.string(), key: z.string(), data: z.object({ key_type: z.string() }).nullish() })
      .nullish(),
    write_module: z.object({ address: z.string() }).nullish(),
    delete_module: z.object({ address: z.string() }).nullish(),
  })
  .transform((w, ctx): WriteSetChange => {
    if (w.write_resource) {
      return { kind: 'write_resource', address: w.write_resource.address, typeStr: w.write_resource.type_str, data: w.write_resource.data };
    }
    if (w.delete_resource) {
      return { kind: 'delete_resource', address: w.delete_resource.address, typeStr: w.delete_resource.type_str };
    }
    if (w.write_table_item) {
      const d = w.write_table_item.data;
      return {
        kind: 'write_table_item',
        handle: w.write_table_item.handle,
        key: w.write_table_item.key,
        keyType: d?.key_type ?? '',
        value: d?.value ?? '',
        valueType: d?.value_type ?? '',
      };
    }
    if (w.delete_table_item) {
      return {
        kind: 'delete_table_item',
        handle: w.delete_table_item.handle,
        key: w.delete_table_item.key,
        keyType: w.delete_table_item.data?.key_type ?? '',
      };
    }
    if (w.write_module) return { kind: 'write_module', address: w.write_module.address };
    if (w.delete_module) return { kind: 'delete_module', address: w.delete_module.address };
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `write set change without payload (${w.change ?? 'none'})` });
    return z.NEVER;
  });

export type TransactionType =
  | 'unspecified'
  | 'genesis'
  | 'block_metadata'
  | 'state_checkpoint'
  | 'user'
  | 'validator'
  | 'block_epilogue';

const TYPE_NAMES: Record<string, TransactionType> = {
  TRANSACTION_TYPE_GENESIS: 'genesis',
  TRANSACTION_TYPE_BLOCK_METADATA: 'block_metadata',
  TRANSACTION_TYPE_STATE_CHECKPOINT: 'state_checkpoint',
  TRANSACTION_TYPE_USER: 'user',
  TRANSACTION_TYPE_VALIDATOR: 'validator',
  TRANSACTION_TYPE_BLOCK_EPILOGUE: 'block_epilogue',
};

export type Transaction = {
  version: number;
  blockHeight: number;
  epoch: number;
  timestamp: Date | null;
  type: TransactionType;
  /** `0x`-prefixed hex transaction hash. */
  hash: string;
  success: boolean;
  vmStatus: string;
  changes: WriteSetChange[];
  /** Events of the transaction payload (user, block metadata, genesis or validator). */
  events: TransactionEvent[];
  /** Sender of a user transaction. */
  sender: string | null;
};

const eventsHolder = z.object({ events: z.array(EventSchema).default([]) }).nullish();

export const TransactionSchema = z
  .object({
    timestamp: TimestampSchema.nullish(),
    version: u64,
    epoch: u64,
    block_height: u64,
    type: z.string(),
    info: z
      .object({
        hash: z.string(),
        success: z.boolean(),
        vm_status: z.string(),
        changes: z.array(WriteSetChangeSchema).default([]),
      })
      .nullish(),
    user: z
      .object({
        request: z.object({ sender: z.string() }).nullish(),
        events: z.array(EventSchema).default([]),
      })
      .nullish(),
    block_metadata: eventsHolder,
    genesis: eventsHolder,
    validator: eventsHolder,
  })
  .transform(
    (t): Transaction => ({
      version: t.version,
      blockHeight: t.block_height,
      epoch: t.epoch,
      timestamp: t.timestamp ?? null,
      type: TYPE_NAMES[t.type] ?? 'unspecified',
      hash: t.info ? `0x${Buffer.from(t.info.hash, 'base64').toString('hex')}` : '0x',
      success: t.info?.success ?? false,
      vmStatus: t.info?.vm_status ?? '',
      changes: t.info?.changes ?? [],
      events: t.user?.events ?? t.block_metadata?.events ?? t.genesis?.events ?? t.validator?.events ?? [],
      sender: t.user?.request?.sender ?? null,
    }),
  );

/**
 * One decoded `TransactionsResponse`.
 */
export type StreamFrame = {
  chainId: number | null;
  transactions: Transaction[];
  /** Encoded length of the response message. */
  sizeInBytes: number;
};

export const TransactionsResponseSchema = z.object({
  transactions: z.array(TransactionSchema).default([]),
  chain_id: u64.nullish(),
});

/**
 * Contiguous run of transactions handed from the fetcher to exactly one worker.
 */
export type TransactionBatch = {
  chainId: number;
  transactions: Transaction[];
  startVersion: number;
  endVersion: number;
  startTimestamp: Date | null;
  endTimestamp: Date | null;
  sizeInBytes: number;
};
