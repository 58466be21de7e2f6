import "dotenv/config";
import { z } from "zod";

const logLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z.enum(logLevels).optional(),
  APP_SYMBOLS: z.string().default("TCS,INFY"),
  SCREENER_BASE_URL: z.string().url().default("https://www.screener.in"),
  BSE_BASE_URL: z.string().url().default("https://www.bseindia.com"),
  // Politeness delay applied after every network call.
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DOWNLOAD_DIR: z.string().default("downloads"),
  MAX_CONCALL_PERIODS: z.coerce.number().int().positive().default(5),
  MAX_ANNUAL_REPORTS: z.coerce.number().int().positive().default(5),
  BROWSER_USER_AGENT: z
    .string()
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    ),
  ALTERNATE_USER_AGENT: z
    .string()
    .default(
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:125.0) Gecko/20100101 Firefox/125.0",
    ),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Normalizes configured symbols once so batch order stays deterministic across environments.
 */
export const appSymbols = (): string[] =>
  Array.from(
    new Set(
      env.APP_SYMBOLS.split(",")
        .map((item) => item.trim().toUpperCase())
        .filter(Boolean),
    ),
  );
