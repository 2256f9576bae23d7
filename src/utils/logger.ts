// src/utils/logger.ts
import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
type WinstonLevel = (typeof LEVELS)[number];

/**
 * Converts an arbitrary text value to a winston level.
 * Supports standard npm levels as well as aliases `trace` → `silly`, `log` → `info`.
 *
 * @param l String representation of the level (may be undefined).
 * @returns Normalized logging level for winston.
 */
function mapLevel(l?: string): WinstonLevel {
  const x = (l || '').toLowerCase();
  const known = LEVELS.find((lvl) => lvl === x);
  if (known) return known;
  if (x === 'trace') return 'silly';
  if (x === 'log') return 'info';
  return 'info';
}

type Env = 'development' | 'production' | 'test';

function readEnv(): Env {
  const raw = process.env.NODE_ENV;
  return raw === 'production' || raw === 'test' ? raw : 'development';
}

const env: Env = readEnv();

const splatFormat = winston.format.splat();
const metadataFormat = winston.format.metadata({
  fillExcept: ['timestamp', 'level', 'message', 'label', 'stack'],
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: () => new Date().toISOString() }),
  winston.format.errors({ stack: true }),
);

const devFormat = winston.format.combine(
  baseFormat,
  splatFormat,
  metadataFormat,
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, label } = info;
    const metaObj: Record<string, unknown> = info.metadata ?? {};
    const metaStr = Object.keys(metaObj).length ? ` ${JSON.stringify(metaObj)}` : '';
    const where = label ? `[${String(label)}]` : '';
    const line = stack ? `${String(message)}\n${String(stack)}` : String(message);
    return `${String(timestamp)} ${where} ${level}: ${line}${metaStr}`;
  }),
);

const prodFormat = winston.format.combine(baseFormat, splatFormat, metadataFormat, winston.format.json());

let root: winston.Logger | null = null;

/**
 * Creates the root logger with a console transport.
 * The format depends on NODE_ENV: JSON in production, otherwise colored human-readable.
 * The initial level comes from LOG_LEVEL; see {@link setLogLevel}.
 */
function buildRoot(): winston.Logger {
  const level = mapLevel(process.env.LOG_LEVEL);
  const useJson = env === 'production';

  const transports: winston.transport[] = [new winston.transports.Console({ handleExceptions: true })];

  return winston.createLogger({
    level,
    levels: winston.config.npm.levels,
    format: useJson ? prodFormat : devFormat,
    defaultMeta: { app: 'txn-stream-indexer', env },
    transports,
    silent: env === 'test',
  });
}

/**
 * Ensures the root logger is initialized and returns it.
 */
function ensureRoot(): winston.Logger {
  if (!root) root = buildRoot();
  return root;
}

/**
 * Returns a child logger with the specified module label.
 *
 * @param label Label (usually a file path or module name).
 * @returns Child logger with added label field.
 */
export function getLogger(label: string): winston.Logger {
  return ensureRoot().child({ label });
}

/**
 * Changes the logging level on the fly for the root logger and all its children.
 *
 * @param level New logging level; `silent` mutes output.
 */
export function setLogLevel(level: string): void {
  const logger = ensureRoot();
  if (level.toLowerCase() === 'silent') {
    logger.silent = true;
    return;
  }
  logger.level = mapLevel(level);
}
