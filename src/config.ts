import { config as loadEnv } from "dotenv";
import type { Logger } from "pino";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, describeError, errorCategory } from "./domain/errors";

const PLACEHOLDER_ACCOUNT_ID = "YOUR_STEAM_ID_64";

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  STEAM_ACCOUNT_ID: z
    .string()
    .trim()
    .min(1, "STEAM_ACCOUNT_ID is required")
    .refine((value) => value !== PLACEHOLDER_ACCOUNT_ID, "STEAM_ACCOUNT_ID still holds the placeholder value"),
  STEAM_APP_ID: z.coerce.number().int().positive().default(730),
  STEAM_CONTEXT_ID: z.coerce.number().int().nonnegative().default(2),
  STEAM_CURRENCY: z.coerce.number().int().positive().default(1),
  PRICE_PACING_INTERVAL_MS: z.coerce.number().nonnegative().default(3000),
  PRICE_RATE_LIMIT_RETRIES: z.coerce.number().int().nonnegative().default(1),
  PRICE_RATE_LIMIT_BACKOFF_MS: z.coerce.number().nonnegative().default(60000),
  PRICE_CACHE_FILE: z.string().default("data/price_cache.json"),
  PRICE_CACHE_TTL_MS: z.coerce.number().positive().default(60 * 60 * 1000),
  // 5000 per page sometimes yields HTTP 400 upstream
  INVENTORY_PAGE_SIZE: z.coerce.number().int().min(1).max(5000).default(1000),
  INVENTORY_MAX_PAGES: z.coerce.number().int().positive().default(50),
  INVENTORY_PAGE_DELAY_MS: z.coerce.number().nonnegative().default(2000),
  HTTP_TIMEOUT_MS: z.coerce.number().positive().default(15000),
  FIREBASE_CREDENTIALS_PATH: optionalString,
  FIRESTORE_COLLECTION: z.string().default("inventory_values"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  LOG_FILE: optionalString,
  NODE_ENV: z.string().default("development"),
});

export type RuntimeConfig = Readonly<{
  accountId: string;
  appId: number;
  contextId: number;
  currency: number;
  pacingIntervalMs: number;
  rateLimitRetries: number;
  rateLimitBackoffMs: number;
  priceCacheFile: string;
  priceCacheTtlMs: number;
  inventoryPageSize: number;
  inventoryMaxPages: number;
  inventoryPageDelayMs: number;
  httpTimeoutMs: number;
  firebaseCredentialsPath: string | null;
  firestoreCollection: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  logFile: string | null;
  prettyLogs: boolean;
}>;

export function parseRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const parsed = result.data;
  return Object.freeze({
    accountId: parsed.STEAM_ACCOUNT_ID,
    appId: parsed.STEAM_APP_ID,
    contextId: parsed.STEAM_CONTEXT_ID,
    currency: parsed.STEAM_CURRENCY,
    pacingIntervalMs: parsed.PRICE_PACING_INTERVAL_MS,
    rateLimitRetries: parsed.PRICE_RATE_LIMIT_RETRIES,
    rateLimitBackoffMs: parsed.PRICE_RATE_LIMIT_BACKOFF_MS,
    priceCacheFile: parsed.PRICE_CACHE_FILE,
    priceCacheTtlMs: parsed.PRICE_CACHE_TTL_MS,
    inventoryPageSize: parsed.INVENTORY_PAGE_SIZE,
    inventoryMaxPages: parsed.INVENTORY_MAX_PAGES,
    inventoryPageDelayMs: parsed.INVENTORY_PAGE_DELAY_MS,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    firebaseCredentialsPath: parsed.FIREBASE_CREDENTIALS_PATH ?? null,
    firestoreCollection: parsed.FIRESTORE_COLLECTION,
    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE ?? null,
    prettyLogs: parsed.NODE_ENV !== "production",
  });
}

/**
 * Load .env from the project root, regardless of process.cwd(), then validate.
 * Variables already present in the environment win over the file.
 */
export function loadRuntimeConfig(): RuntimeConfig {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  loadEnv({ path: path.resolve(__dirname, "../.env") });
  return parseRuntimeConfig(process.env);
}

/**
 * Runs the loader; on failure logs a fatal entry with the error category to a
 * logger built on demand (no configured logger exists yet) and returns null.
 */
export function loadRuntimeConfigOrReport(
  load: () => RuntimeConfig,
  fallbackLogger: () => Logger,
): RuntimeConfig | null {
  try {
    return load();
  } catch (error) {
    fallbackLogger().fatal({ error: describeError(error), category: errorCategory(error) }, "Invalid configuration");
    return null;
  }
}
