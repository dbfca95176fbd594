import pino from "pino";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { RateLimitedError } from "../../domain/errors";
import type { ItemGroup } from "../../domain/inventory";
import { SteamMarketPriceClient, type MarketPriceSource } from "../pricing/marketPriceClient";
import { PacingPolicy } from "../pricing/pacingPolicy";
import { PriceCache } from "../pricing/priceCache";
import { PriceResolver, type PriceResolverOptions } from "../pricing/priceResolver";

const logger = pino({ level: "silent" });

const group = (classificationKey: string, count = 1): ItemGroup => ({
  classificationKey,
  displayName: classificationKey,
  count,
});

describe("PriceResolver", () => {
  let now: number;
  let cache: PriceCache;
  let fetchPrice: Mock<MarketPriceSource["fetchPrice"]>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let pacing: PacingPolicy;

  const createResolver = (overrides: Partial<PriceResolverOptions> = {}) =>
    new PriceResolver(cache, { fetchPrice }, pacing, { appId: 730, currency: 1, ...overrides }, logger);

  beforeEach(() => {
    now = 1_700_000_000_000;
    const clock = { now: () => now };
    cache = new PriceCache({ filePath: "unused.json", appId: 730, currency: 1 }, logger, clock);
    fetchPrice = vi.fn<MarketPriceSource["fetchPrice"]>();
    sleep = vi.fn(async (ms: number) => {
      now += ms;
    });
    pacing = new PacingPolicy({ intervalMs: 3000, clock, sleep });
  });

  it("answers from the cache without querying the market or pacing", async () => {
    cache.put("Case Key", 2.49);

    const resolution = await createResolver().resolve(group("Case Key"));

    expect(resolution).toEqual({ ok: true, price: 2.49, source: "cache" });
    expect(fetchPrice).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("queries the market on a miss and writes the price back", async () => {
    fetchPrice.mockResolvedValue(10);

    const resolution = await createResolver().resolve(group("Glove Case"));

    expect(resolution).toEqual({ ok: true, price: 10, source: "market" });
    expect(fetchPrice).toHaveBeenCalledWith({ appId: 730, currency: 1, classificationKey: "Glove Case" });
    expect(cache.get("Glove Case")).toBe(10);
  });

  it("queries the market again once the cached price expired", async () => {
    cache.put("Glove Case", 9);
    now += 60 * 60 * 1000;
    fetchPrice.mockResolvedValue(11);

    const resolution = await createResolver().resolve(group("Glove Case"));

    expect(resolution).toEqual({ ok: true, price: 11, source: "market" });
    expect(cache.get("Glove Case")).toBe(11);
  });

  it("paces consecutive cache misses but not cache hits", async () => {
    cache.put("Cached", 1);
    fetchPrice.mockResolvedValue(5);
    const resolver = createResolver();

    await resolver.resolve(group("Miss 1"));
    await resolver.resolve(group("Cached"));
    await resolver.resolve(group("Miss 2"));

    expect(fetchPrice).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[3000]]);
  });

  it("reports NoPriceAvailable and caches nothing when no listing exists", async () => {
    fetchPrice.mockResolvedValue(null);

    const resolution = await createResolver().resolve(group("Souvenir Package"));

    expect(resolution).toEqual({
      ok: false,
      reason: "NoPriceAvailable",
      message: "No market listing price for Souvenir Package",
    });
    expect(cache.peek("Souvenir Package")).toBeUndefined();
  });

  it("reports RateLimited without retrying by default", async () => {
    fetchPrice.mockRejectedValue(new RateLimitedError("Market price endpoint returned 429", 429));

    const resolution = await createResolver().resolve(group("Glove Case"));

    expect(resolution).toEqual({ ok: false, reason: "RateLimited", message: "Market price endpoint returned 429" });
    expect(fetchPrice).toHaveBeenCalledTimes(1);
  });

  it("backs off and retries after a rate limit when configured", async () => {
    fetchPrice
      .mockRejectedValueOnce(new RateLimitedError("Market price endpoint returned 429", 429))
      .mockResolvedValueOnce(7.5);

    const resolution = await createResolver({ rateLimitRetries: 1, rateLimitBackoffMs: 60000 }).resolve(
      group("Glove Case"),
    );

    expect(resolution).toEqual({ ok: true, price: 7.5, source: "market" });
    expect(fetchPrice).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(60000);
  });

  it("gives up after the configured retries", async () => {
    fetchPrice.mockRejectedValue(new RateLimitedError("Market price endpoint returned 429", 429));

    const resolution = await createResolver({ rateLimitRetries: 2, rateLimitBackoffMs: 100 }).resolve(
      group("Glove Case"),
    );

    expect(resolution.ok).toBe(false);
    expect(fetchPrice).toHaveBeenCalledTimes(3);
  });

  it("reports NoPriceAvailable when the market answers an unknown item with a server error", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify({ success: false }), { status: 500 }),
    );
    const client = new SteamMarketPriceClient({ baseUrl: "https://market.test", timeoutMs: 1000 }, logger, fetchFn);
    const resolver = new PriceResolver(cache, client, pacing, { appId: 730, currency: 1 }, logger);

    const resolution = await resolver.resolve(group("Glove Case"));

    expect(resolution).toEqual({
      ok: false,
      reason: "NoPriceAvailable",
      message: "No market listing price for Glove Case",
    });
  });

  it("reports RateLimited when the market cannot be reached", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new SteamMarketPriceClient({ baseUrl: "https://market.test", timeoutMs: 1000 }, logger, fetchFn);
    const resolver = new PriceResolver(cache, client, pacing, { appId: 730, currency: 1 }, logger);

    const resolution = await resolver.resolve(group("Glove Case"));

    expect(resolution).toEqual({
      ok: false,
      reason: "RateLimited",
      message: "Market price request failed: fetch failed",
    });
  });

  it("reports NoPriceAvailable for unexpected source errors", async () => {
    fetchPrice.mockRejectedValue(new Error("unexpected payload"));

    const resolution = await createResolver({ rateLimitRetries: 1 }).resolve(group("Glove Case"));

    expect(resolution).toEqual({ ok: false, reason: "NoPriceAvailable", message: "unexpected payload" });
    expect(fetchPrice).toHaveBeenCalledTimes(1);
  });
});
