/**
 * Single valuation run: load config, wire services, value the inventory, exit.
 * Exit code 1 only when no report could be produced.
 */

import type { Logger } from "pino";
import { loadRuntimeConfig, loadRuntimeConfigOrReport, type RuntimeConfig } from "./config";
import { describeError, errorCategory } from "./domain/errors";
import { createModuleLogger, createRootLogger } from "./utils/logger";
import { InventoryFetcher } from "./services/inventory/inventoryFetcher";
import { SteamInventoryClient } from "./services/inventory/steamInventoryClient";
import { SteamMarketPriceClient } from "./services/pricing/marketPriceClient";
import { PacingPolicy } from "./services/pricing/pacingPolicy";
import { PriceCache } from "./services/pricing/priceCache";
import { PriceResolver } from "./services/pricing/priceResolver";
import { FirestoreSnapshotSink, openFirestore } from "./services/snapshot/firestoreSnapshotSink";
import { DisabledSnapshotSink, type SnapshotSink } from "./services/snapshot/snapshotSink";
import { ValuationPipeline } from "./services/valuation/valuationPipeline";

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

function createSink(config: RuntimeConfig, logger: Logger): SnapshotSink {
  const sinkLogger = createModuleLogger(logger, "snapshot");
  if (!config.firebaseCredentialsPath) {
    return new DisabledSnapshotSink(sinkLogger);
  }
  try {
    return new FirestoreSnapshotSink(
      openFirestore(config.firebaseCredentialsPath),
      config.firestoreCollection,
      sinkLogger,
    );
  } catch (error) {
    logger.error({ error: describeError(error), category: "SINK_FAILURE" }, "Could not initialise Firestore");
    return new DisabledSnapshotSink(sinkLogger);
  }
}

function createPipeline(config: RuntimeConfig, logger: Logger): ValuationPipeline {
  // Steam answers bare clients with 400s
  const headers = {
    "User-Agent": BROWSER_USER_AGENT,
    Referer: `https://steamcommunity.com/profiles/${config.accountId}/inventory`,
  };

  const cache = new PriceCache(
    {
      filePath: config.priceCacheFile,
      appId: config.appId,
      currency: config.currency,
      ttlMs: config.priceCacheTtlMs,
    },
    createModuleLogger(logger, "price-cache"),
  );

  const fetcher = new InventoryFetcher(
    new SteamInventoryClient({ timeoutMs: config.httpTimeoutMs, headers }, createModuleLogger(logger, "inventory")),
    new PacingPolicy({ intervalMs: config.inventoryPageDelayMs }),
    { pageSize: config.inventoryPageSize, maxPages: config.inventoryMaxPages },
    createModuleLogger(logger, "inventory"),
  );

  const resolver = new PriceResolver(
    cache,
    new SteamMarketPriceClient({ timeoutMs: config.httpTimeoutMs, headers }, createModuleLogger(logger, "market")),
    new PacingPolicy({ intervalMs: config.pacingIntervalMs }),
    {
      appId: config.appId,
      currency: config.currency,
      rateLimitRetries: config.rateLimitRetries,
      rateLimitBackoffMs: config.rateLimitBackoffMs,
    },
    createModuleLogger(logger, "price-resolver"),
  );

  return new ValuationPipeline({
    fetcher,
    resolver,
    cache,
    sink: createSink(config, logger),
    currency: config.currency,
    logger: createModuleLogger(logger, "pipeline"),
  });
}

async function main(): Promise<void> {
  const config = loadRuntimeConfigOrReport(loadRuntimeConfig, () =>
    createRootLogger({ level: "info", pretty: process.env.NODE_ENV !== "production" }),
  );
  if (config === null) {
    process.exitCode = 1;
    return;
  }

  const logger = createRootLogger({
    level: config.logLevel,
    logFile: config.logFile ?? undefined,
    pretty: config.prettyLogs,
  });

  try {
    const report = await createPipeline(config, logger).run({
      accountId: config.accountId,
      appId: config.appId,
      contextId: config.contextId,
    });
    logger.info(
      { total: report.total.toFixed(2), failures: report.failures.length },
      "Task completed",
    );
  } catch (error) {
    logger.fatal({ error: describeError(error), category: errorCategory(error) }, "Exiting due to inventory fetch failure");
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error("Unhandled error in valuation run:", error);
  process.exitCode = 1;
});
