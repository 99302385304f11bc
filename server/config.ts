import dotenv from "dotenv";
import { z } from "zod";
import { AppError } from "./errors";

const envSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  TWITTER_BEARER_TOKEN: z.string().optional(),
  NEWS_API_KEY: z.string().optional(),
  MONGODB_URI: z.string().url().optional(),
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  TWITTER_MAPPINGS_PATH: z.string().default("data/twittermappings.json"),
  LOGS_DIR: z.string().default("logs"),
  CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
});

export type NodeEnv = z.infer<typeof envSchema>["NODE_ENV"];

export interface AppConfig {
  geminiApiKey?: string;
  geminiModel: string;
  twitterBearerToken?: string;
  newsApiKey?: string;
  mongoUri?: string;
  port: number;
  nodeEnv: NodeEnv;
  mappingsPath: string;
  logsDir: string;
  cacheTtlHours: number;
}

/**
 * Build the configuration from an environment record. Empty values count as
 * unset so a blank `GEMINI_API_KEY=` line in .env behaves like a missing one.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new AppError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    geminiApiKey: parsed.GEMINI_API_KEY,
    geminiModel: parsed.GEMINI_MODEL,
    twitterBearerToken: parsed.TWITTER_BEARER_TOKEN,
    newsApiKey: parsed.NEWS_API_KEY,
    mongoUri: parsed.MONGODB_URI,
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    mappingsPath: parsed.TWITTER_MAPPINGS_PATH,
    logsDir: parsed.LOGS_DIR,
    cacheTtlHours: parsed.CACHE_TTL_HOURS,
  };
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    dotenv.config();
    config = loadConfig(process.env);
  }
  return config;
}
