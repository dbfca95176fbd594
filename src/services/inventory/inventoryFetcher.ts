import type { Logger } from "pino";
import type {
  InventoryPageSource,
  InventoryRecord,
  InventoryTarget,
} from "../../domain/inventory";
import { FetchError, RateLimitedError, describeError } from "../../domain/errors";
import type { PacingPolicy } from "../pricing/pacingPolicy";

export interface InventoryFetcherOptions {
  pageSize: number;
  maxPages: number;
}

type FetchState =
  | { kind: "fetching"; cursor: string | null; pageIndex: number }
  | { kind: "done" }
  | { kind: "failed"; error: FetchError | RateLimitedError };

/**
 * Retrieves a complete inventory, page by page. Either every page arrives or
 * the fetch fails; partially collected records are never returned.
 */
export class InventoryFetcher {
  constructor(
    private readonly source: InventoryPageSource,
    private readonly pacing: PacingPolicy,
    private readonly options: InventoryFetcherOptions,
    private readonly logger: Logger,
  ) {}

  async fetchAll(target: InventoryTarget): Promise<InventoryRecord[]> {
    const records: InventoryRecord[] = [];
    let state: FetchState = { kind: "fetching", cursor: null, pageIndex: 0 };

    this.logger.info({ ...target }, "Fetching inventory");

    while (state.kind === "fetching") {
      state = await this.step(target, state, records);
    }

    if (state.kind === "failed") {
      throw state.error;
    }

    this.logger.info({ records: records.length }, "Inventory fetch complete");
    return records;
  }

  private async step(
    target: InventoryTarget,
    state: { cursor: string | null; pageIndex: number },
    into: InventoryRecord[],
  ): Promise<FetchState> {
    if (state.pageIndex >= this.options.maxPages) {
      return {
        kind: "failed",
        error: new FetchError(
          `Inventory still reported more items after ${this.options.maxPages} pages (cursor ${state.cursor})`,
        ),
      };
    }

    await this.pacing.acquire();
    this.logger.debug({ cursor: state.cursor, pageIndex: state.pageIndex }, "Requesting inventory page");

    try {
      const page = await this.source.fetchPage({
        ...target,
        cursor: state.cursor,
        pageSize: this.options.pageSize,
      });
      into.push(...page.records);

      if (page.nextCursor === undefined) {
        return { kind: "done" };
      }
      return { kind: "fetching", cursor: page.nextCursor, pageIndex: state.pageIndex + 1 };
    } catch (error) {
      if (error instanceof RateLimitedError || error instanceof FetchError) {
        return { kind: "failed", error };
      }
      return {
        kind: "failed",
        error: new FetchError(`Inventory page ${state.pageIndex + 1} failed: ${describeError(error)}`, {
          cause: error,
        }),
      };
    }
  }
}
