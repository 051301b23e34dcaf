import path from "node:path";
import { z } from "zod";

const flag = z
  .string()
  .optional()
  .default("true")
  .transform((v) => !["false", "0", "no", "off"].includes(v.toLowerCase()));

const envSchema = z.object({
  OUTPUT_DIR: z.string().min(1).default("output"),
  CHROME_PATH: z.string().optional().default(""),
  HEADLESS: flag,
  SLOW_MO_MS: z.coerce.number().int().min(0).default(500),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(20),
  FETCH_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  FETCH_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  HTTP_MAX_CONNECTIONS: z.coerce.number().int().min(1).max(64).default(20),
  TRANSPORT_RETRIES: z.coerce.number().int().min(0).default(5),
  TRANSPORT_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  NAVIGATION_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RUN_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type AppConfig = z.infer<typeof envSchema> & {
  outputDirAbsolute: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    ...parsed,
    outputDirAbsolute: path.isAbsolute(parsed.OUTPUT_DIR)
      ? parsed.OUTPUT_DIR
      : path.resolve(process.cwd(), parsed.OUTPUT_DIR),
  };
}
