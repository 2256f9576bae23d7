// src/parsing/decodeErrors.ts
import type { DecodeError } from '../errors.ts';
import type { MetricsSink } from '../metrics/types.ts';
import { getLogger } from '../utils/logger.ts';
import { outerType } from './address.ts';
import type { DecodeErrorSink } from './objects.ts';

const log = getLogger('parsing/decode');

/**
 * Sink that logs a skipped datum at warn and counts it under `decode_errors_count{processor, kind}`.
 * `kind` is the Move type without type arguments.
 */
export function decodeErrorReporter(metrics: MetricsSink, processor: string): DecodeErrorSink {
  return (err: DecodeError) => {
    log.warn(`[decode] ${processor}: skipping datum: ${err.message}`, { typeStr: err.typeStr, version: err.version });
    metrics.incCounter('decode_errors_count', { processor, kind: outerType(err.typeStr) });
  };
}
