import type { Logger } from "pino";
import type { InventoryTarget } from "../../domain/inventory";
import type { ValuationFailure, ValuationLine, ValuationReport } from "../../domain/valuation";
import { describeError, errorCategory } from "../../domain/errors";
import { systemClock, type Clock } from "../../utils/clock";
import { aggregateItems } from "../inventory/itemAggregator";
import type { InventoryFetcher } from "../inventory/inventoryFetcher";
import type { PriceCache } from "../pricing/priceCache";
import type { PriceResolver } from "../pricing/priceResolver";
import type { SnapshotSink } from "../snapshot/snapshotSink";

export interface ValuationPipelineDeps {
  fetcher: InventoryFetcher;
  resolver: PriceResolver;
  cache: PriceCache;
  sink: SnapshotSink;
  currency: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * fetch → aggregate → resolve each group in order → total → snapshot.
 *
 * Only an inventory fetch failure escapes run(). Per-group price failures land in
 * report.failures; cache and sink write failures are logged.
 */
export class ValuationPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: ValuationPipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async run(target: InventoryTarget): Promise<ValuationReport> {
    const { fetcher, resolver, cache, logger } = this.deps;

    await cache.load();

    const records = await fetcher.fetchAll(target);
    const groups = aggregateItems(records);
    logger.info({ groups: groups.length, records: records.length }, "Found unique marketable items");

    const lines: ValuationLine[] = [];
    const failures: ValuationFailure[] = [];
    let total = 0;
    let itemCount = 0;

    try {
      for (const [index, group] of groups.entries()) {
        itemCount += group.count;
        const resolution = await resolver.resolve(group);
        const progress = `[${index + 1}/${groups.length}]`;

        if (resolution.ok) {
          const subtotal = resolution.price * group.count;
          total += subtotal;
          lines.push(
            Object.freeze({
              classificationKey: group.classificationKey,
              displayName: group.displayName,
              count: group.count,
              unitPrice: resolution.price,
              subtotal,
              priceSource: resolution.source,
            }),
          );
          logger.info(
            { key: group.classificationKey, source: resolution.source },
            `${progress} ${group.classificationKey}: ${group.count} x ${resolution.price} = ${subtotal.toFixed(2)}`,
          );
        } else {
          failures.push(
            Object.freeze({
              classificationKey: group.classificationKey,
              displayName: group.displayName,
              count: group.count,
              reason: resolution.reason,
              message: resolution.message,
            }),
          );
          logger.warn(
            { key: group.classificationKey, reason: resolution.reason, message: resolution.message },
            `${progress} ${group.classificationKey}: price unavailable`,
          );
        }
      }
    } finally {
      await this.persistCache();
    }

    const report: ValuationReport = Object.freeze({
      ...target,
      currency: this.deps.currency,
      generatedAt: new Date(this.clock.now()).toISOString(),
      itemCount,
      lines: Object.freeze(lines),
      failures: Object.freeze(failures),
      total,
    });

    logger.info(
      { total: report.total.toFixed(2), currency: report.currency, failures: failures.length },
      "Total inventory value",
    );

    await this.publish(report);
    return report;
  }

  private async persistCache(): Promise<void> {
    const { cache, logger } = this.deps;
    if (!cache.isDirty) return;

    try {
      await cache.save();
    } catch (error) {
      logger.error({ error: describeError(error), category: errorCategory(error) }, "Failed to save price cache");
    }
  }

  private async publish(report: ValuationReport): Promise<void> {
    try {
      await this.deps.sink.write(report);
    } catch (error) {
      this.deps.logger.error(
        { error: describeError(error), category: "SINK_FAILURE" },
        "Failed to persist valuation snapshot",
      );
    }
  }
}
