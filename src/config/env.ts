import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

function boundedInteger(name: string, { min, max, fallback }: { min: number; max: number; fallback: number }) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim().length === 0) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be a number`
        });
        return z.NEVER;
      }
      const normalized = Math.floor(parsed);
      if (normalized < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be at least ${min}`
        });
        return z.NEVER;
      }
      if (normalized > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be less than or equal to ${max}`
        });
        return z.NEVER;
      }
      return normalized;
    });
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

/**
 * Blank selects `info`. Shared with the logger, which reads the level on every call.
 */
export const logLevelSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = value?.trim().toLowerCase() ?? "";
    if (normalized.length === 0) {
      return "info" as const;
    }
    const level = LOG_LEVELS.find((candidate) => candidate === normalized);
    if (!level) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`
      });
      return z.NEVER;
    }
    return level;
  });

const serverSchema = z
  .object({
    SEARCH_PROVIDER_TIMEOUT_MS: boundedInteger("SEARCH_PROVIDER_TIMEOUT_MS", {
      min: 100,
      max: 120_000,
      fallback: 12_000
    }),
    SEARCH_MAX_RESULTS: boundedInteger("SEARCH_MAX_RESULTS", {
      min: 1,
      max: 100,
      fallback: 15
    }),
    SEARCH_RETRY_ATTEMPTS: boundedInteger("SEARCH_RETRY_ATTEMPTS", {
      min: 1,
      max: 5,
      fallback: 1
    }),
    SEARCH_USER_AGENT: optionalString.transform((value) => value ?? "research-lens/1.0"),
    SEARCH_DISABLED_PRESETS: z
      .string()
      .optional()
      .transform((value) =>
        (value ?? "")
          .split(",")
          .map((entry) => entry.trim().toLowerCase())
          .filter((entry) => entry.length > 0)
      ),
    SEARXNG_URL: z
      .string()
      .optional()
      .transform((value) => {
        const trimmed = value?.trim() ?? "";
        return trimmed.length > 0 ? trimmed.replace(/\/+$/, "") : undefined;
      })
      .pipe(z.string().url().optional()),
    SEARXNG_USERNAME: optionalString,
    SEARXNG_PASSWORD: optionalString,
    FIREBASE_PROJECT_ID: optionalString,
    FIREBASE_CLIENT_EMAIL: optionalString.pipe(z.string().email().optional()),
    FIREBASE_PRIVATE_KEY: optionalString.transform((value) => value?.replace(/\\n/g, "\n")),
    LOG_LEVEL: logLevelSchema
  })
  .superRefine((env, ctx) => {
    const firebaseKeys = [
      env.FIREBASE_PROJECT_ID,
      env.FIREBASE_CLIENT_EMAIL,
      env.FIREBASE_PRIVATE_KEY
    ];
    const provided = firebaseKeys.filter((value) => value !== undefined).length;
    if (provided > 0 && provided < firebaseKeys.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL and FIREBASE_PRIVATE_KEY must be set together"
      });
    }
  });

export type ServerEnv = z.infer<typeof serverSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

let serverEnvCache: ServerEnv | null = null;

function parseServerEnv(): ServerEnv {
  if (serverEnvCache) {
    return serverEnvCache;
  }

  const parsed = serverSchema.safeParse({
    SEARCH_PROVIDER_TIMEOUT_MS: process.env.SEARCH_PROVIDER_TIMEOUT_MS,
    SEARCH_MAX_RESULTS: process.env.SEARCH_MAX_RESULTS,
    SEARCH_RETRY_ATTEMPTS: process.env.SEARCH_RETRY_ATTEMPTS,
    SEARCH_USER_AGENT: process.env.SEARCH_USER_AGENT,
    SEARCH_DISABLED_PRESETS: process.env.SEARCH_DISABLED_PRESETS,
    SEARXNG_URL: process.env.SEARXNG_URL,
    SEARXNG_USERNAME: process.env.SEARXNG_USERNAME,
    SEARXNG_PASSWORD: process.env.SEARXNG_PASSWORD,
    FIREBASE_PROJECT_ID: process.env.FIREBASE_PROJECT_ID,
    FIREBASE_CLIENT_EMAIL: process.env.FIREBASE_CLIENT_EMAIL,
    FIREBASE_PRIVATE_KEY: process.env.FIREBASE_PRIVATE_KEY,
    LOG_LEVEL: process.env.LOG_LEVEL
  });

  if (!parsed.success) {
    throw new Error(
      `Invalid server environment variables: ${parsed.error.message}`
    );
  }

  serverEnvCache = parsed.data;
  return serverEnvCache;
}

export function getServerEnv(): ServerEnv {
  return parseServerEnv();
}

export function hasFirebaseCredentials(env: ServerEnv = getServerEnv()): boolean {
  return Boolean(env.FIREBASE_PROJECT_ID && env.FIREBASE_CLIENT_EMAIL && env.FIREBASE_PRIVATE_KEY);
}

export function resetEnvCache(): void {
  serverEnvCache = null;
}
