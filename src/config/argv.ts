// src/config/argv.ts
import type { ArgMap } from '../types.ts';

/**
 * Parse CLI arguments of the form `--key=value`, `--flag` or `--no-flag`.
 * Unknown/positional args are ignored; a later occurrence of a key wins.
 */
export function parseArgv(argv = process.argv.slice(2)): ArgMap {
  const out: ArgMap = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq === -1) {
      if (body.startsWith('no-')) out[body.slice(3)] = false;
      else out[body] = true;
    } else {
      out[body.slice(0, eq)] = body.slice(eq + 1);
    }
  }
  return out;
}
