// src/config.ts
import type { ArgMap, Config, ModeConfig } from './types.ts';
import { loadDotEnvIfPresent } from './config/dotenv.ts';
import { parseArgv } from './config/argv.ts';
import {
  asBool,
  asLogLevel,
  asOptionalVersion,
  asPositiveInt,
  asRunMode,
  asString,
} from './config/parsers.ts';
import { validateConfig } from './config/validate.ts';
export { printConfig } from './config/printer.ts';

type Env = Record<string, string | undefined>;

/**
 * Build and return the runtime configuration.
 * Every option can be given as `--kebab-key=value` or as the `UPPER_SNAKE` environment variable;
 * the command line wins.
 *
 * @param argv Command-line arguments (without node and script).
 * @param env Environment; `.env` is merged into `process.env` first when the default is used.
 */
export function getConfig(argv: string[] = process.argv.slice(2), env?: Env): Config {
  if (!env) loadDotEnvIfPresent();
  const vars: Env = env ?? process.env;
  const args: ArgMap = parseArgv(argv);

  const pick = (key: string): string | boolean | undefined =>
    args[key] ?? vars[key.toUpperCase().replace(/-/g, '_')];

  const processor = asString('processor', pick('processor'), 'events_processor');
  const runMode = asRunMode(pick('mode'));
  const initialStartingVersion = asPositiveInt('initial-starting-version', pick('initial-starting-version'), 0);

  let mode: ModeConfig;
  if (runMode === 'backfill') {
    mode = {
      kind: 'backfill',
      backfillId: asString('backfill-id', pick('backfill-id')),
      initialStartingVersion,
      endingVersion: asPositiveInt('backfill-ending-version', pick('backfill-ending-version')),
      overwriteCheckpoint: asBool('overwrite-checkpoint', pick('overwrite-checkpoint'), false),
    };
  } else if (runMode === 'testing') {
    mode = {
      kind: 'testing',
      overrideStartingVersion: asPositiveInt('override-starting-version', pick('override-starting-version')),
      endingVersion: asOptionalVersion('ending-version', pick('ending-version')),
    };
  } else {
    mode = { kind: 'default', initialStartingVersion };
  }

  const raw = {
    processor,
    logLevel: asLogLevel(pick('log-level')),
    stream: {
      dataServiceUrl: asString('data-service-url', pick('data-service-url')),
      authToken: asString('auth-token', pick('auth-token')),
      requestName: asString('request-name', pick('request-name'), processor),
      startingVersion: asOptionalVersion('starting-version', pick('starting-version')),
      endingVersion: asOptionalVersion('ending-version', pick('ending-version')),
      http2PingIntervalSecs: asPositiveInt('http2-ping-interval-secs', pick('http2-ping-interval-secs'), 30),
      http2PingTimeoutSecs: asPositiveInt('http2-ping-timeout-secs', pick('http2-ping-timeout-secs'), 10),
      reconnectionTimeoutSecs: asPositiveInt('reconnection-timeout-secs', pick('reconnection-timeout-secs'), 5),
      responseItemTimeoutSecs: asPositiveInt('response-item-timeout-secs', pick('response-item-timeout-secs'), 60),
    },
    dispatcher: {
      concurrentTasks: asPositiveInt('concurrent-tasks', pick('concurrent-tasks'), 10),
      channelBufferSize: asPositiveInt('channel-buffer-size', pick('channel-buffer-size'), 100),
      verbose: asBool('verbose', pick('verbose'), false),
    },
    mode,
    pg: {
      connectionString: stringOrUndefined(pick('pg-url') ?? vars.DATABASE_URL),
      host: stringOrUndefined(pick('pg-host')),
      port: asPositiveInt('pg-port', pick('pg-port'), 5432),
      user: stringOrUndefined(pick('pg-user')),
      password: stringOrUndefined(pick('pg-pass') ?? vars.PG_PASSWORD),
      database: stringOrUndefined(pick('pg-db')),
      ssl: asBool('pg-ssl', pick('pg-ssl'), false),
      poolSize: asPositiveInt('pg-pool-size', pick('pg-pool-size'), 16),
    },
  };

  return validateConfig(raw);
}

function stringOrUndefined(v: string | boolean | undefined): string | undefined {
  return typeof v === 'string' && v !== '' ? v : undefined;
}
