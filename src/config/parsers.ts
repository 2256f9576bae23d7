// src/config/parsers.ts
import type { LogLevel, RunMode } from '../types.ts';

export function stripInlineComment(raw: string): string {
  let v = raw;
  const hashPos = v.indexOf('#');
  const semiPos = v.indexOf(';');
  let cutPos = -1;
  if (hashPos !== -1) cutPos = hashPos;
  if (semiPos !== -1 && (cutPos === -1 || semiPos < cutPos)) cutPos = semiPos;
  if (cutPos !== -1) v = v.slice(0, cutPos);
  return v.trim();
}

function isBlank(v: unknown): boolean {
  return v === undefined || v === null || v === '' || (typeof v === 'string' && v.toLowerCase() === 'undefined');
}

export function asInt(name: string, v: unknown, def?: number): number {
  if (isBlank(v)) {
    if (def === undefined) throw new Error(`Missing required numeric option: ${name}`);
    return def;
  }
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new Error(`Option ${name} must be an integer, got "${String(v)}"`);
  if (!Number.isSafeInteger(n)) throw new Error(`Option ${name} exceeds JS safe integer: ${n}`);
  return n;
}

export function asPositiveInt(name: string, v: unknown, def?: number): number {
  const n = asInt(name, v, def);
  if (n < 0) throw new Error(`Option ${name} must be >= 0, got ${n}`);
  return n;
}

/**
 * Like {@link asPositiveInt} but yields `undefined` for a missing value.
 */
export function asOptionalVersion(name: string, v: unknown): number | undefined {
  return isBlank(v) ? undefined : asPositiveInt(name, v);
}

export function asString(name: string, v: unknown, def?: string): string {
  if (v === undefined || v === null || v === '' || typeof v === 'boolean') {
    if (def === undefined) throw new Error(`Missing required option: ${name}`);
    return def;
  }
  return String(v);
}

export function asBool(name: string, v: unknown, def = false): boolean {
  if (v === undefined || v === null || v === '') return def;
  if (typeof v === 'boolean') return v;
  let s = String(v).trim();

  const isSingleQuoted = s.startsWith("'") && s.endsWith("'");
  const isDoubleQuoted = s.startsWith('"') && s.endsWith('"');
  if (isSingleQuoted || isDoubleQuoted) {
    s = s.slice(1, -1).trim();
  }

  s = stripInlineComment(s).toLowerCase();

  if (s === '1' || s === 'true' || s === 'yes' || s === 'y' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'n' || s === 'off') return false;

  throw new Error(`Option ${name} must be a boolean-like value, got "${String(v)}"`);
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export function asLogLevel(v: unknown, def: LogLevel = 'info'): LogLevel {
  if (isBlank(v)) return def;
  const s = String(v).toLowerCase();
  return LOG_LEVELS.find((l) => l === s) ?? def;
}

export function asRunMode(input: unknown): RunMode {
  if (isBlank(input) || input === false) return 'default';
  const raw = String(input).trim().toLowerCase();
  if (raw === 'default' || raw === 'backfill' || raw === 'testing') return raw;
  throw new Error(`mode must be "default", "backfill" or "testing", got "${String(input)}"`);
}
