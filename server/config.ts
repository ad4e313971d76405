import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  // Force in-memory storage for local/dev regardless of DATABASE_URL
  USE_MEM_STORAGE: z.string().optional(),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional(),
  // Claim group that grants access to /api/admin
  ADMIN_GROUP: z.string().optional(),
  // Rows requested per page when draining a table scan
  SCAN_PAGE_SIZE: z.string().optional(),
  // Public site used in preview pages and share links
  PUBLIC_SITE_URL: z.string().url().optional(),
  PREVIEW_IMAGE_URL: z.string().url().optional(),
  SITE_NAME: z.string().optional(),
  // CORS configuration
  CORS_ORIGINS: z.string().optional(),
  CORS_CREDENTIALS: z.string().optional(),
  // DB monitoring
  DB_SLOW_QUERY_MS: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

function toPort(val: string | undefined, fallback: number): number {
  const parsedPort = parseInt(val ?? "", 10);
  return Number.isFinite(parsedPort) ? parsedPort : fallback;
}

function parseCsvList(val: string | undefined): string[] {
  if (!val) return [];
  return val
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function isTruthy(val: string | undefined): boolean {
  return ["1", "true", "yes"].includes((val ?? "").toLowerCase());
}

function clampInt(val: string | undefined, fallback: number, min: number, max: number): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return fallback;
  return Math.min(max, Math.max(min, raw));
}

const publicSiteUrl = (env.PUBLIC_SITE_URL ?? "http://localhost:5000").replace(/\/+$/, "");

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",
  port: toPort(env.PORT, 5000),
  databaseUrl: env.DATABASE_URL,
  useMemStorage: isTruthy(env.USE_MEM_STORAGE),
  firebase: {
    projectId: env.FIREBASE_PROJECT_ID,
    clientEmail: env.FIREBASE_CLIENT_EMAIL,
    privateKey: env.FIREBASE_PRIVATE_KEY,
  },
  adminGroup: env.ADMIN_GROUP ?? "Admins",
  scanPageSize: clampInt(env.SCAN_PAGE_SIZE, 100, 1, 1000),
  site: {
    name: env.SITE_NAME ?? "Quote Desk",
    url: publicSiteUrl,
    previewImageUrl: env.PREVIEW_IMAGE_URL ?? `${publicSiteUrl}/images/preview.png`,
  },
  dbSlowQueryMs: Math.min(10_000, Math.max(50, parseInt(env.DB_SLOW_QUERY_MS ?? "200", 10) || 200)),
  cors: {
    allowedOrigins:
      parseCsvList(env.CORS_ORIGINS).length > 0
        ? parseCsvList(env.CORS_ORIGINS)
        : [
            "http://localhost:5000",
            "http://127.0.0.1:5000",
            "http://localhost:5173",
            "http://127.0.0.1:5173",
          ],
    credentials: isTruthy(env.CORS_CREDENTIALS ?? (env.NODE_ENV === "development" ? "true" : "false")),
  },
} as const;

export function hasFirebaseEnv(): boolean {
  const fb = config.firebase;
  return Boolean(fb.projectId && fb.clientEmail && fb.privateKey);
}

export function warnMissingCriticalEnv(): string[] {
  const missing: string[] = [];
  if (!config.databaseUrl && !config.useMemStorage) missing.push("DATABASE_URL");
  if (config.isProd && !hasFirebaseEnv()) missing.push("FIREBASE_PROJECT_ID/FIREBASE_CLIENT_EMAIL/FIREBASE_PRIVATE_KEY");
  if (missing.length) {
    console.warn(`Missing critical env vars: ${missing.join(", ")}`);
  }
  return missing;
}
