import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const booleanString = (fallback: "true" | "false") =>
  z.string().default(fallback).transform((v) => v === "true");

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  DATABASE_PATH: z.string().default("./data/timelines.db"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: booleanString("true"),
  FETCH_BACKEND: z.enum(["api", "browser"]).default("api"),
  X_AUTH_TOKEN: optionalString,
  X_CT0: optionalString,
  X_BEARER_TOKEN: optionalString,
  X_GRAPHQL_BASE_URL: z.string().url().default("https://x.com/i/api/graphql"),
  X_QUERY_ID_LIST_TIMELINE: optionalString,
  X_QUERY_ID_USER_TWEETS: optionalString,
  X_QUERY_ID_USER_BY_SCREEN_NAME: optionalString,
  X_QUERY_ID_TWEET_DETAIL: optionalString,
  X_PAGE_SIZE: z.coerce.number().int().positive().default(40),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FETCH_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  FETCH_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  FETCH_RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),
  FETCH_RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().nonnegative().default(60000),
  BROWSER_PROFILE_DIR: z.string().default("./data/browser-profile"),
  PLAYWRIGHT_HEADLESS: booleanString("false"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  PROXY_URL: optionalString,
  THREAD_EXPANSION_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(3000),
  THREAD_EXPANSION_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(6000),
  RUN_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(3600),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
