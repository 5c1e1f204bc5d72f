import "dotenv/config";
import { z } from "zod";

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  CACHE_DIR: z.string().default("./cache"),
  HTTP_TIMEOUT_MS: z.coerce.number().default(10000),
  ENRICH_DELAY_MS: z.coerce.number().default(1000),
  LLM_RETRIES: z.coerce.number().int().default(3),
  LLM_BACKOFF_MS: z.coerce.number().default(1000),
  NEWS_MAX_RESULTS: z.coerce.number().int().default(5),
  NEWS_WINDOW_DAYS: z.coerce.number().int().optional(),
  MIN_PCT: z.coerce.number().default(3),
  TOP_N: z.coerce.number().int().default(10),
  NOISE_PCT: z.coerce.number().default(0),
});

const env = EnvSchema.parse(process.env);

export const cfg = {
  ...env,
};

export type Config = typeof cfg;
