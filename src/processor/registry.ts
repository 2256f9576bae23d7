// src/processor/registry.ts
import type { SqlPool } from '../db/pg.ts';
import type { MetricsSink } from '../metrics/types.ts';
import { EventsProcessor, EVENTS_PROCESSOR } from './events/index.ts';
import { TokenV2Processor, TOKEN_V2_PROCESSOR } from './tokenV2/index.ts';
import type { Processor } from './types.ts';

export const PROCESSOR_NAMES = [EVENTS_PROCESSOR, TOKEN_V2_PROCESSOR] as const;

/**
 * Instantiates the processor registered under `name`.
 * @throws when no processor has that name.
 */
export function createProcessor(name: string, pool: SqlPool, metrics: MetricsSink): Processor {
  switch (name) {
    case EVENTS_PROCESSOR:
      return new EventsProcessor(pool, metrics);
    case TOKEN_V2_PROCESSOR:
      return new TokenV2Processor(pool, metrics);
    default:
      throw new Error(`unknown processor "${name}" (known: ${PROCESSOR_NAMES.join(', ')})`);
  }
}
