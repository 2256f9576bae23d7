// src/config/schema.ts
import { z } from 'zod';
import { PROCESSOR_NAMES } from '../processor/registry.ts';

// Runtime validation schema (Zod)
const PgConfigSchema = z.object({
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().positive(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  database: z.string().min(1).optional(),
  ssl: z.boolean(),
  poolSize: z.number().int().positive(),
});

const version = z.number().int().min(0);

const StreamSchema = z
  .object({
    dataServiceUrl: z.string().startsWith('http://').or(z.string().startsWith('https://')),
    authToken: z.string().min(1),
    requestName: z.string().min(1),
    startingVersion: version.optional(),
    endingVersion: version.optional(),
    http2PingIntervalSecs: z.number().int().min(1),
    http2PingTimeoutSecs: z.number().int().min(1),
    reconnectionTimeoutSecs: z.number().int().min(1),
    responseItemTimeoutSecs: z.number().int().min(1),
  })
  .refine((s) => !(s.startingVersion !== undefined && s.endingVersion !== undefined && s.endingVersion < s.startingVersion), {
    message: 'endingVersion must be greater than or equal to startingVersion',
    path: ['endingVersion'],
  });

const DispatcherSchema = z.object({
  concurrentTasks: z.number().int().min(1),
  channelBufferSize: z.number().int().min(1),
  verbose: z.boolean(),
});

const ModeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('default'), initialStartingVersion: version }),
  z.object({
    kind: z.literal('backfill'),
    backfillId: z.string().min(1),
    initialStartingVersion: version,
    endingVersion: version,
    overwriteCheckpoint: z.boolean(),
  }),
  z.object({ kind: z.literal('testing'), overrideStartingVersion: version, endingVersion: version.optional() }),
]);

const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'trace', 'silent']);
export const ProcessorNameEnum = z.enum(PROCESSOR_NAMES);

export const ConfigSchema = z
  .object({
    processor: ProcessorNameEnum,
    logLevel: LogLevelEnum,
    stream: StreamSchema,
    dispatcher: DispatcherSchema,
    mode: ModeSchema,
    pg: PgConfigSchema,
  })
  .refine((c) => c.mode.kind !== 'backfill' || c.mode.endingVersion >= c.mode.initialStartingVersion, {
    message: 'backfill endingVersion must be greater than or equal to initialStartingVersion',
    path: ['mode', 'endingVersion'],
  });
