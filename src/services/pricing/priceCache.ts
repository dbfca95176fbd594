import { mkdir, open } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { CacheWriteError, describeError } from "../../domain/errors";
import { systemClock, type Clock } from "../../utils/clock";

export const DEFAULT_PRICE_CACHE_TTL_MS = 60 * 60 * 1000;

// On-disk layout: { [market_hash_name]: { price, timestamp (unix seconds), appid, currency } }
const entrySchema = z.object({
  price: z.number().finite().nonnegative(),
  timestamp: z.number().finite(),
  appid: z.string().optional(),
  currency: z.string().optional(),
});

const documentSchema = z.record(z.string(), entrySchema);

export type PriceCacheEntry = z.infer<typeof entrySchema>;

export interface PriceCacheOptions {
  filePath: string;
  appId: number;
  currency: number;
  ttlMs?: number;
}

/**
 * Time-bounded price store backed by a single JSON document.
 *
 * Entries are scoped to the app and currency they were fetched for; an entry for
 * another scope, or older than the TTL, reads as a miss but stays stored until
 * the next put for that key replaces it.
 */
export class PriceCache {
  private entries = new Map<string, PriceCacheEntry>();
  private dirty = false;
  private readonly ttlMs: number;
  private readonly appId: string;
  private readonly currency: string;

  constructor(
    private readonly options: PriceCacheOptions,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_PRICE_CACHE_TTL_MS;
    this.appId = String(options.appId);
    this.currency = String(options.currency);
  }

  get size(): number {
    return this.entries.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get(key: string): number | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.appid !== this.appId || entry.currency !== this.currency) {
      this.logger.debug({ key, appid: entry.appid, currency: entry.currency }, "Cache entry out of scope");
      return undefined;
    }

    const ageMs = this.clock.now() - entry.timestamp * 1000;
    if (ageMs >= this.ttlMs) {
      this.logger.debug({ key, ageMs }, "Cache entry expired");
      return undefined;
    }

    return entry.price;
  }

  peek(key: string): PriceCacheEntry | undefined {
    return this.entries.get(key);
  }

  put(key: string, price: number): void {
    this.entries.set(key, {
      price,
      timestamp: this.clock.now() / 1000,
      appid: this.appId,
      currency: this.currency,
    });
    this.dirty = true;
  }

  /**
   * Replace in-memory state with the file contents. A missing file or a corrupt
   * document leaves the cache empty; neither is raised to the caller.
   */
  async load(): Promise<void> {
    this.entries = new Map();
    this.dirty = false;

    const raw = await this.readFile();
    if (raw === null) return;

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { filePath: this.options.filePath, error: describeError(error), category: "CACHE_CORRUPT" },
        "Price cache is not valid JSON, starting empty",
      );
      return;
    }

    const parsed = documentSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.warn(
        { filePath: this.options.filePath, issues: parsed.error.issues.length, category: "CACHE_CORRUPT" },
        "Price cache has an unexpected shape, starting empty",
      );
      return;
    }

    this.entries = new Map(Object.entries(parsed.data));
    this.logger.debug({ filePath: this.options.filePath, entries: this.entries.size }, "Loaded price cache");
  }

  private async readFile(): Promise<string | null> {
    try {
      const handle = await open(this.options.filePath, "r");
      try {
        return await handle.readFile({ encoding: "utf-8" });
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug({ filePath: this.options.filePath }, "No price cache on disk, starting empty");
      } else {
        this.logger.warn(
          { filePath: this.options.filePath, error: describeError(error), category: "CACHE_CORRUPT" },
          "Could not read price cache, starting empty",
        );
      }
      return null;
    }
  }

  async save(): Promise<void> {
    const document = Object.fromEntries(this.entries);

    try {
      await mkdir(path.dirname(this.options.filePath), { recursive: true });
      const handle = await open(this.options.filePath, "w");
      try {
        await handle.writeFile(JSON.stringify(document), { encoding: "utf-8" });
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new CacheWriteError(`Failed to save price cache ${this.options.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.dirty = false;
    this.logger.debug({ filePath: this.options.filePath, entries: this.entries.size }, "Saved price cache");
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
