import { z } from "zod";
import * as fs from "fs";

const DEFAULT_MODELS = ["gemini-2.5-flash", "gemini-2.0-flash", "gemini-1.5-flash"];

const optionalString = z.string().trim().optional().transform((value) => (value ? value : undefined));

const booleanFlag = (fallback: boolean) =>
  z.string().optional().transform((value) => {
    if (value === undefined || value.trim() === "") return fallback;
    return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
  });

const envSchema = z.object({
  GOOGLE_CLOUD_PROJECT: optionalString,
  VERTEXAI_LOCATION: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_MODELS: optionalString,
  GOOGLE_MAPS_API_KEY: optionalString,
  YOUTUBE_API_KEY: optionalString,
  YOUTUBE_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  YOUTUBE_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  DATABASE_URL: optionalString,
  PORT: z.coerce.number().int().min(1).max(65535).default(8082),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  ALLOW_TEMPLATE_FALLBACK: booleanFlag(true),
  K_SERVICE: optionalString,
});

export interface GeminiConfig {
  apiKey?: string;
  project?: string;
  location: string;
  credentialsPath?: string;
  models: string[];
}

export interface AppConfig {
  readonly env: "development" | "production" | "test";
  readonly port: number;
  readonly gemini: GeminiConfig;
  readonly mapsApiKey?: string;
  readonly youtube: {
    apiKey?: string;
    cacheTtlMs: number;
    cacheMaxEntries: number;
  };
  readonly databaseUrl?: string;
  readonly allowTemplateFallback: boolean;
  readonly isCloudRun: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const models = parsed.GEMINI_MODELS
    ? parsed.GEMINI_MODELS.split(",").map((m) => m.trim()).filter(Boolean)
    : DEFAULT_MODELS;

  return Object.freeze({
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    gemini: {
      apiKey: parsed.GEMINI_API_KEY,
      project: parsed.GOOGLE_CLOUD_PROJECT,
      location: parsed.VERTEXAI_LOCATION ?? "us-central1",
      credentialsPath: parsed.GOOGLE_APPLICATION_CREDENTIALS,
      models: models.length > 0 ? models : DEFAULT_MODELS,
    },
    mapsApiKey: parsed.GOOGLE_MAPS_API_KEY,
    youtube: {
      apiKey: parsed.YOUTUBE_API_KEY,
      cacheTtlMs: parsed.YOUTUBE_CACHE_TTL_SECONDS * 1000,
      cacheMaxEntries: parsed.YOUTUBE_CACHE_MAX_ENTRIES,
    },
    databaseUrl: parsed.DATABASE_URL,
    allowTemplateFallback: parsed.ALLOW_TEMPLATE_FALLBACK,
    isCloudRun: parsed.K_SERVICE !== undefined,
  });
}

/**
 * Lists configuration problems that stop the server from starting.
 * An empty list means the environment is usable.
 */
export function validateEnvironment(
  config: AppConfig,
  fileExists: (filePath: string) => boolean = fs.existsSync,
): string[] {
  const problems: string[] = [];

  if (!config.gemini.apiKey && !config.gemini.project) {
    problems.push("Set GEMINI_API_KEY, or GOOGLE_CLOUD_PROJECT for Vertex AI");
  }
  if (!config.mapsApiKey) {
    problems.push("GOOGLE_MAPS_API_KEY is not set");
  }
  // Cloud Run provides credentials through the metadata server
  if (!config.isCloudRun && config.gemini.credentialsPath && !fileExists(config.gemini.credentialsPath)) {
    problems.push(`Credentials file not found at: ${config.gemini.credentialsPath}`);
  }

  return problems;
}
