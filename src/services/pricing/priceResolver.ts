import type { Logger } from "pino";
import type { ItemGroup } from "../../domain/inventory";
import type { PriceResolution } from "../../domain/valuation";
import { RateLimitedError, describeError } from "../../domain/errors";
import type { MarketPriceSource } from "./marketPriceClient";
import type { PacingPolicy } from "./pacingPolicy";
import type { PriceCache } from "./priceCache";

export interface PriceResolverOptions {
  appId: number;
  currency: number;
  /** Extra attempts after a rate-limited query before giving up on the item */
  rateLimitRetries?: number;
  rateLimitBackoffMs?: number;
}

const DEFAULT_RATE_LIMIT_BACKOFF_MS = 60_000;

export class PriceResolver {
  private readonly rateLimitRetries: number;
  private readonly rateLimitBackoffMs: number;

  constructor(
    private readonly cache: PriceCache,
    private readonly source: MarketPriceSource,
    private readonly pacing: PacingPolicy,
    private readonly options: PriceResolverOptions,
    private readonly logger: Logger,
  ) {
    this.rateLimitRetries = options.rateLimitRetries ?? 0;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? DEFAULT_RATE_LIMIT_BACKOFF_MS;
  }

  /**
   * Cache first; on a miss, one paced query to the market (plus rate-limit
   * retries). Never throws: failures come back as a resolution with a reason.
   */
  async resolve(group: ItemGroup): Promise<PriceResolution> {
    const key = group.classificationKey;

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.logger.debug({ key, price: cached }, "Price cache hit");
      return { ok: true, price: cached, source: "cache" };
    }

    for (let attempt = 0; ; attempt++) {
      await this.pacing.acquire();

      try {
        const price = await this.source.fetchPrice({
          appId: this.options.appId,
          currency: this.options.currency,
          classificationKey: key,
        });

        if (price === null) {
          return { ok: false, reason: "NoPriceAvailable", message: `No market listing price for ${key}` };
        }

        this.cache.put(key, price);
        return { ok: true, price, source: "market" };
      } catch (error) {
        if (!(error instanceof RateLimitedError)) {
          this.logger.error({ key, error: describeError(error) }, "Price query failed");
          return { ok: false, reason: "NoPriceAvailable", message: describeError(error) };
        }

        if (attempt >= this.rateLimitRetries) {
          return { ok: false, reason: "RateLimited", message: describeError(error) };
        }

        this.logger.warn(
          { key, attempt: attempt + 1, backoffMs: this.rateLimitBackoffMs },
          "Rate limited on price check, backing off before retry",
        );
        await this.pacing.pause(this.rateLimitBackoffMs);
      }
    }
  }
}
