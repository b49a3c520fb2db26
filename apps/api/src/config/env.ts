import { z } from "zod";

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(4000),
  DATABASE_PATH: z.string().min(1).default("./data/eventfolio.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ADMIN_EMAILS: commaList,
  IDENTITY_PROJECT_ID: z.string().min(1).default("eventfolio-dev"),
  IDENTITY_ISSUER: z.string().url().optional(),
  IDENTITY_KEYS_URL: z
    .string()
    .url()
    .default("https://www.googleapis.com/robot/v1/metadata/x509/securetoken@system.gserviceaccount.com"),
  IDENTITY_KEY_FETCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(3000),
  IDENTITY_KEY_FETCH_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  IDENTITY_KEY_FETCH_BACKOFF_MS: z.coerce.number().int().min(0).default(250),
  WEB_URL: z.string().url().default("http://localhost:3000")
});

export interface AppConfig {
  port: number;
  databasePath: string;
  logLevel: string;
  adminEmails: string[];
  identity: {
    projectId: string;
    issuer: string;
    keysUrl: string;
    keyFetchTimeoutMs: number;
    keyFetchAttempts: number;
    keyFetchBackoffMs: number;
  };
  webUrl: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  return {
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    logLevel: env.LOG_LEVEL,
    adminEmails: env.ADMIN_EMAILS,
    identity: {
      projectId: env.IDENTITY_PROJECT_ID,
      issuer: env.IDENTITY_ISSUER ?? `https://securetoken.google.com/${env.IDENTITY_PROJECT_ID}`,
      keysUrl: env.IDENTITY_KEYS_URL,
      keyFetchTimeoutMs: env.IDENTITY_KEY_FETCH_TIMEOUT_MS,
      keyFetchAttempts: env.IDENTITY_KEY_FETCH_ATTEMPTS,
      keyFetchBackoffMs: env.IDENTITY_KEY_FETCH_BACKOFF_MS
    },
    webUrl: env.WEB_URL.replace(/\/+$/, "")
  };
}
