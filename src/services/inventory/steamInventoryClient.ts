import type { Logger } from "pino";
import { z } from "zod";
import type {
  InventoryPage,
  InventoryPageRequest,
  InventoryPageSource,
  InventoryRecord,
} from "../../domain/inventory";
import { FetchError, RateLimitedError, describeError } from "../../domain/errors";

const COMMUNITY_BASE_URL = "https://steamcommunity.com";

const flag = z.union([z.boolean(), z.number()]).transform((value) => value === true || value === 1);

const assetSchema = z.object({
  assetid: z.string(),
  classid: z.string(),
  instanceid: z.string().default("0"),
  amount: z.string().default("1"),
});

const descriptionSchema = z.object({
  classid: z.string(),
  instanceid: z.string().default("0"),
  market_hash_name: z.string().optional(),
  name: z.string().optional(),
  marketable: flag.default(false),
});

const inventoryResponseSchema = z.object({
  success: flag,
  assets: z.array(assetSchema).default([]),
  descriptions: z.array(descriptionSchema).default([]),
  more_items: flag.optional(),
  last_assetid: z.string().optional(),
  total_inventory_count: z.number().optional(),
});

type SteamDescription = z.infer<typeof descriptionSchema>;

export interface SteamInventoryClientConfig {
  baseUrl?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * One page of the community inventory endpoint, flattened to records.
 * Only marketable assets are kept; the rest cannot be priced.
 */
export class SteamInventoryClient implements InventoryPageSource {
  private readonly baseUrl: string;

  constructor(
    private readonly config: SteamInventoryClientConfig,
    private readonly logger: Logger,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = config.baseUrl ?? COMMUNITY_BASE_URL;
  }

  async fetchPage(request: InventoryPageRequest): Promise<InventoryPage> {
    const url = new URL(
      `${this.baseUrl}/inventory/${encodeURIComponent(request.accountId)}/${request.appId}/${request.contextId}`,
    );
    url.searchParams.set("l", "english");
    url.searchParams.set("count", String(request.pageSize));
    if (request.cursor) url.searchParams.set("start_assetid", request.cursor);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        method: "GET",
        headers: this.config.headers,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new FetchError(`Inventory request timed out after ${this.config.timeoutMs}ms`, { cause: error });
      }
      throw new FetchError(`Inventory request failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 429) {
      this.logger.error({ accountId: request.accountId }, "Rate limited fetching inventory");
      throw new RateLimitedError("Inventory endpoint returned 429", response.status);
    }
    if (!response.ok) {
      throw new FetchError(`Inventory endpoint returned ${response.status}: ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FetchError(`Inventory response is not JSON: ${describeError(error)}`, { cause: error });
    }

    const parsed = inventoryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`Inventory response has an unexpected shape: ${parsed.error.issues[0]?.message}`);
    }
    if (!parsed.data.success) {
      throw new FetchError("Inventory endpoint reported failure");
    }

    const { assets, descriptions, more_items, last_assetid } = parsed.data;
    const byClassInstance = new Map<string, SteamDescription>();
    const byClass = new Map<string, SteamDescription>();
    for (const description of descriptions) {
      byClassInstance.set(`${description.classid}_${description.instanceid}`, description);
      if (!byClass.has(description.classid)) byClass.set(description.classid, description);
    }

    const records: InventoryRecord[] = [];
    let skipped = 0;
    for (const asset of assets) {
      const description =
        byClassInstance.get(`${asset.classid}_${asset.instanceid}`) ?? byClass.get(asset.classid);
      if (!description?.marketable || !description.market_hash_name) {
        skipped++;
        continue;
      }

      const quantity = Number.parseInt(asset.amount, 10);
      records.push({
        assetId: asset.assetid,
        classId: asset.classid,
        instanceId: asset.instanceid,
        displayName: description.name ?? description.market_hash_name,
        classificationKey: description.market_hash_name,
        quantity: Number.isFinite(quantity) && quantity > 0 ? quantity : 1,
      });
    }

    if (skipped > 0) {
      this.logger.debug({ skipped }, "Skipped non-marketable assets");
    }

    if (more_items && last_assetid) {
      return { records, nextCursor: last_assetid };
    }
    if (more_items) {
      throw new FetchError("Inventory reported more items without a continuation asset id");
    }
    return { records };
  }
}
