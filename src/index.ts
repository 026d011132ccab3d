/**
 * index.ts
 *
 * Ingestion service entry point. Loads the JSON configuration, opens the
 * DuckDB store and runs one fetch -> reconcile -> ingest pipeline per
 * configured source, plus the latest-value and bucketed aggregate refreshes,
 * on their own intervals until SIGINT/SIGTERM.
 */
import "dotenv/config";
import { createAdapter } from "./adapters";
import type { SourceAdapter } from "./adapters/types";
import { getLogger } from "./common/logger";
import { ConfigError, fetchStart, loadConfig } from "./config";
import { Database } from "./db/connection";
import { createSchema } from "./db/schema";
import {
  DatastreamRepository,
  MeasurementRepository,
  SensorRepository,
} from "./db/repositories";
import { CategoryClassifier } from "./core/categories";
import { ObservationIngestor } from "./core/ingestor";
import { BucketedMeasurementsRefresh, LatestMeasurementsRefresh } from "./core/maintenance";
import { Pipeline } from "./core/pipeline";
import { EntityReconciler } from "./core/reconciler";
import { IngestionScheduler, type ScheduledJob } from "./core/scheduler";

const logger = getLogger();

// Load config from environment variable or command line argument
const configPath = process.env.CONFIG_PATH || process.argv[2];

if (!configPath) {
  console.error(
    "Please provide the path to the configuration file as an argument."
  );
  process.exit(1);
}

async function main(path: string) {
  const config = loadConfig(path);
  const db = new Database({
    path: config.database.path,
    maxRetryCount: config.database.maxRetryCount,
    retryBackoffMs: config.database.retryBackoffSec * 1000,
    logger,
  });
  await db.withConnection((conn) => createSchema(conn));

  const sensors = new SensorRepository(db);
  const datastreams = new DatastreamRepository(db);
  const measurements = new MeasurementRepository(db);
  const classifier = new CategoryClassifier();

  const reconciler = new EntityReconciler({ sensors, datastreams, classifier, logger });
  const ingestor = new ObservationIngestor({
    datastreams,
    measurements,
    logger,
    subBatchSize: config.ingest.subBatchSize,
  });

  const adapters: SourceAdapter[] = [];
  const jobs: ScheduledJob[] = [];
  for (const source of config.sources) {
    const adapter = createAdapter(source, logger);
    if (!classifier.hasSource(adapter.source)) {
      throw new ConfigError(`No category table for source '${adapter.source}'`);
    }
    adapters.push(adapter);
    jobs.push(
      new Pipeline({
        adapter,
        reconciler,
        ingestor,
        measurements,
        logger: logger.with().str("source", adapter.source).logger(),
        intervalMs: source.intervalSec * 1000,
        defaultStart: fetchStart(source),
        maxRetryCount: source.maxRetryCount,
        retryBackoffMs: source.retryBackoffSec * 1000,
      })
    );
  }
  jobs.push(
    new LatestMeasurementsRefresh(
      measurements,
      config.maintenance.latestRefreshIntervalSec * 1000,
      logger
    )
  );
  for (const bucket of config.maintenance.buckets) {
    for (const aggregate of bucket.aggregates) {
      jobs.push(
        new BucketedMeasurementsRefresh(
          measurements,
          {
            width: bucket.width,
            aggregate,
            intervalMs: bucket.intervalSec * 1000,
            lookback: bucket.lookback,
          },
          logger
        )
      );
    }
  }

  const scheduler = new IngestionScheduler(jobs, logger);
  scheduler.start();
  logger
    .with()
    .array(
      "sources",
      adapters.map((a) => a.source)
    )
    .logger()
    .info("Ingestion started");

  // Graceful shutdown
  let stopping = false;
  async function shutdown(sig: string) {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${sig}, shutting down...`);
    await scheduler.stop();
    for (const adapter of adapters) {
      await adapter.close?.();
    }
    await db.close();
  }
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown(sig)
        .catch((err: unknown) => {
          logger.with().error(err).logger().error("Shutdown failed");
        })
        .finally(() => process.exit(0));
    });
  }
}

main(configPath).catch((err: unknown) => {
  logger.with().error(err).logger().error("Fatal startup error");
  process.exit(1);
});
