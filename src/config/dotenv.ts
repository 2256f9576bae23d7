// src/config/dotenv.ts
import fs from 'node:fs';
import path from 'node:path';
import { stripInlineComment } from './parsers.ts';

/**
 * Parses the text of a .env file.
 * - Supports both `KEY=VALUE` and `export KEY=VALUE` lines.
 * - Handles single/double quoted values.
 * - Strips inline comments (# or ;) for unquoted values.
 */
export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('export ')) line = line.slice('export '.length).trim();

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
    if (key) out[key] = quoted ? value.slice(1, -1) : stripInlineComment(value);
  }
  return out;
}

/**
 * Loads `.env` from the working directory into process.env; variables that are
 * already set are left untouched.
 *
 * @returns Number of variables that were set.
 */
export function loadDotEnvIfPresent(file = path.resolve(process.cwd(), '.env')): number {
  if (!fs.existsSync(file)) return 0;
  let n = 0;
  for (const [key, value] of Object.entries(parseDotEnv(fs.readFileSync(file, 'utf8')))) {
    if (key in process.env) continue;
    process.env[key] = value;
    n++;
  }
  return n;
}
