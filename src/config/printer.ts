// src/config/printer.ts
import { pruneUndefined } from '../utils/pruneUndefined.ts';
import { getLogger } from '../utils/logger.ts';
import type { Config } from '../types.ts';

const log = getLogger('config');

function mask(secret: string | undefined): string | undefined {
  if (!secret) return undefined;
  return secret.length <= 4 ? '****' : `${secret.slice(0, 2)}…${secret.slice(-2)}`;
}

/**
 * Builds the loggable view of the configuration: credentials masked, unset values dropped.
 */
export function configView(cfg: Config): Record<string, unknown> {
  return pruneUndefined({
    processor: cfg.processor,
    stream: {
      url: cfg.stream.dataServiceUrl,
      authToken: mask(cfg.stream.authToken),
      requestName: cfg.stream.requestName,
      range: {
        from: cfg.stream.startingVersion ?? '(resolved)',
        to: cfg.stream.endingVersion ?? '(open)',
      },
      keepalive: {
        pingIntervalSecs: cfg.stream.http2PingIntervalSecs,
        pingTimeoutSecs: cfg.stream.http2PingTimeoutSecs,
      },
      timeouts: {
        reconnectionSecs: cfg.stream.reconnectionTimeoutSecs,
        responseItemSecs: cfg.stream.responseItemTimeoutSecs,
      },
    },
    dispatcher: cfg.dispatcher,
    mode: cfg.mode,
    postgres: {
      url: cfg.pg.connectionString ? '(set)' : undefined,
      host: cfg.pg.host,
      port: cfg.pg.port,
      user: cfg.pg.user,
      password: mask(cfg.pg.password),
      database: cfg.pg.database,
      ssl: cfg.pg.ssl,
      poolSize: cfg.pg.poolSize,
    },
    formatting: {
      logLevel: cfg.logLevel,
    },
  });
}

/**
 * Pretty-print selected configuration values via logger.
 */
export function printConfig(cfg: Config): void {
  log.info('[config]\n' + JSON.stringify(configView(cfg), null, 2));
}
