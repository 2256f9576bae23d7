// src/types.ts
export type ArgMap = Record<string, string | boolean>;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * How the starting version is resolved and where progress is recorded.
 * - `default`: resume from `processor_status`, never before `initialStartingVersion`.
 * - `backfill`: bounded job tracked in `backfill_processor_status`.
 * - `testing`: start at `overrideStartingVersion`, record nothing.
 */
export type RunMode = 'default' | 'backfill' | 'testing';

/**
 * Connection settings of the upstream transaction stream.
 */
export type TransactionStreamConfig = {
  /** gRPC endpoint; `https://` enables TLS. */
  dataServiceUrl: string;
  /** Bearer token sent in the `authorization` header. */
  authToken: string;
  /** Value of the `x-aptos-request-name` header, identifies the consumer. */
  requestName: string;
  /** Explicit first version to request (overrides checkpoints in default mode). */
  startingVersion?: number;
  /** Inclusive last version to request. */
  endingVersion?: number;
  http2PingIntervalSecs: number;
  http2PingTimeoutSecs: number;
  /** Bound on one connect attempt and on one GetTransactions call. */
  reconnectionTimeoutSecs: number;
  /** Bound on waiting for the next streamed frame. */
  responseItemTimeoutSecs: number;
};

export type DispatcherConfig = {
  /** Max batches processed in parallel per tick. */
  concurrentTasks: number;
  /** Capacity of the fetcher → dispatcher channel. */
  channelBufferSize: number;
  /** Log every tick at info instead of debug. */
  verbose: boolean;
};

export type ModeConfig =
  | { kind: 'default'; initialStartingVersion: number }
  | {
      kind: 'backfill';
      backfillId: string;
      initialStartingVersion: number;
      endingVersion: number;
      overwriteCheckpoint: boolean;
    }
  | { kind: 'testing'; overrideStartingVersion: number; endingVersion?: number };

export type PgSettings = {
  /** Optional full connection string; wins over the discrete fields. */
  connectionString?: string;
  /** Hostname of the database server. */
  host?: string;
  /** Port number of the database server. */
  port: number;
  /** Database user. */
  user?: string;
  /** Database password. */
  password?: string;
  /** Database name. */
  database?: string;
  /** Enable SSL if true. */
  ssl: boolean;
  /** Maximum number of pooled connections for pg. */
  poolSize: number;
};

/**
 * Global application configuration resolved from CLI args, environment variables, and defaults.
 */
export type Config = {
  /** Processor to run, e.g. `events_processor`. */
  processor: string;
  /** Log verbosity level. */
  logLevel: LogLevel;
  stream: TransactionStreamConfig;
  dispatcher: DispatcherConfig;
  mode: ModeConfig;
  pg: PgSettings;
};
