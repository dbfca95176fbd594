import type { Logger } from "pino";
import { z } from "zod";
import { RateLimitedError, describeError } from "../../domain/errors";
import { parseMarketPrice } from "./priceParser";

const MARKET_BASE_URL = "https://steamcommunity.com";

const priceOverviewSchema = z.object({
  success: z.union([z.boolean(), z.number()]),
  lowest_price: z.string().optional(),
  median_price: z.string().optional(),
  volume: z.string().optional(),
});

export interface PriceQuery {
  appId: number;
  currency: number;
  classificationKey: string;
}

/**
 * External pricing endpoint. Resolves null when the item has no usable listing;
 * rejects with RateLimitedError when the endpoint is throttling or unreachable.
 */
export interface MarketPriceSource {
  fetchPrice(query: PriceQuery): Promise<number | null>;
}

export interface SteamMarketPriceClientConfig {
  baseUrl?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export class SteamMarketPriceClient implements MarketPriceSource {
  private readonly baseUrl: string;

  constructor(
    private readonly config: SteamMarketPriceClientConfig,
    private readonly logger: Logger,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = config.baseUrl ?? MARKET_BASE_URL;
  }

  async fetchPrice(query: PriceQuery): Promise<number | null> {
    const url = new URL(`${this.baseUrl}/market/priceoverview/`);
    url.searchParams.set("appid", String(query.appId));
    url.searchParams.set("currency", String(query.currency));
    url.searchParams.set("market_hash_name", query.classificationKey);

    this.logger.debug({ url: url.toString() }, "Requesting market price");

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
        throw new RateLimitedError(`Market price request timed out after ${this.config.timeoutMs}ms`, null, {
          cause: error,
        });
      }
      throw new RateLimitedError(`Market price request failed: ${describeError(error)}`, null, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      // 503 is how the market sheds load as often as 429
      if (response.status === 429 || response.status === 503) {
        this.logger.warn(
          { status: response.status, classificationKey: query.classificationKey },
          "Market price endpoint is rate limiting",
        );
        throw new RateLimitedError(`Market price endpoint returned ${response.status}`, response.status);
      }
      // Unknown items come back as 500 with {success:false}
      this.logger.warn(
        { status: response.status, classificationKey: query.classificationKey },
        "Market price endpoint returned no price",
      );
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.warn({ classificationKey: query.classificationKey, error: describeError(error) }, "Unreadable price body");
      return null;
    }

    const parsed = priceOverviewSchema.safeParse(body);
    if (!parsed.success || !parsed.data.success) {
      return null;
    }

    const priceString = parsed.data.lowest_price ?? parsed.data.median_price;
    if (!priceString) {
      return null;
    }

    const price = parseMarketPrice(priceString);
    if (price === null) {
      this.logger.warn({ classificationKey: query.classificationKey, priceString }, "Could not parse price string");
    }
    return price;
  }
}
