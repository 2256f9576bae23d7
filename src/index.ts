/**
 * Entry point of the transaction stream indexer.
 * Loads configuration, resolves where to resume, checks the data service and
 * runs the fetch → dispatch pipeline for the configured processor.
 * Fatal conditions end the process through `abortWith` with exit status 1.
 */
// src/index.ts
import { getConfig, printConfig } from './config.ts';
import { createCheckpointSaver } from './db/checkpoint.ts';
import { closePgPool, createPgPool } from './db/pg.ts';
import { createPgProgressStore } from './db/progress.ts';
import { resolveStartingVersion } from './db/startingVersion.ts';
import { PromMetricsSink } from './metrics/prom.ts';
import { createProcessor } from './processor/registry.ts';
import { runPipeline } from './runner/pipeline.ts';
import { detectChainId } from './stream/chainId.ts';
import { createStreamOpener } from './stream/client.ts';
import { DEFAULT_PROTO_DIR, createFrameCodec, loadProtoRoot } from './stream/proto.ts';
import type { Config } from './types.ts';
import { abortOnError } from './utils/abort.ts';
import { getLogger, setLogLevel } from './utils/logger.ts';

const log = getLogger('index');

/** Inclusive last version of this run, if the run is bounded. */
function endingVersionOf(cfg: Config): number | undefined {
  switch (cfg.mode.kind) {
    case 'backfill':
      return cfg.mode.endingVersion;
    case 'testing':
      return cfg.mode.endingVersion ?? cfg.stream.endingVersion;
    case 'default':
      return cfg.stream.endingVersion;
  }
}

async function main(): Promise<void> {
  const cfg = getConfig();
  setLogLevel(cfg.logLevel);
  printConfig(cfg);

  const metrics = new PromMetricsSink({ app: 'txn-stream-indexer' });
  const pool = createPgPool({ ...cfg.pg, applicationName: `txn-stream-indexer/${cfg.processor}` });
  const processor = createProcessor(cfg.processor, pool, metrics);
  const progress = createPgProgressStore(processor.connectionPool());

  const startingVersion = await resolveStartingVersion(progress, processor.name(), cfg.mode, cfg.stream.startingVersion);
  const endingVersion = endingVersionOf(cfg);

  const protoDir = process.env.PROTO_DIR || DEFAULT_PROTO_DIR;
  log.info(`[proto] dir = ${protoDir}`);
  const open = createStreamOpener(cfg.stream, createFrameCodec(loadProtoRoot(protoDir)));

  const storedChainId = await progress.readChainId();
  if (storedChainId === null) {
    const served = await detectChainId(open);
    log.info(`[start] no chain id recorded yet, data service serves chain_id=${served}`);
  } else {
    log.info(`[start] chain_id=${storedChainId} already recorded, skipping detection`);
  }

  await runPipeline({
    processor,
    open,
    progress,
    checkpoint: createCheckpointSaver(progress, processor.name(), cfg.mode),
    metrics,
    startingVersion,
    endingVersion,
    concurrentTasks: cfg.dispatcher.concurrentTasks,
    channelBufferSize: cfg.dispatcher.channelBufferSize,
    responseItemTimeoutMs: cfg.stream.responseItemTimeoutSecs * 1000,
    verbose: cfg.dispatcher.verbose,
  });

  await closePgPool();
  log.info(`[done] ${processor.name()} reached ending_version=${endingVersion ?? 'none'}`);
}

/**
 * Handle SIGINT signal. Checkpoints only ever follow durable data.
 */
process.on('SIGINT', () => {
  log.warn('SIGINT received, shutting down…');
  process.exit(0);
});
/**
 * Handle SIGTERM signal.
 */
process.on('SIGTERM', () => {
  log.warn('SIGTERM received, shutting down…');
  process.exit(0);
});

main().catch(abortOnError);
