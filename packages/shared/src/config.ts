import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import { z } from "zod";

import { ValidationError } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DataDirEnvSchema = z.object({
  ZONING_DATA_DIR: z
    .string()
    .trim()
    .min(1)
    .optional(),
});

const EnvConfigSchema = DataDirEnvSchema.extend({
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional()
    .default("info"),
});

export type EnvConfig = {
  logLevel: LogLevel;
  /** Directory holding the by-law JSON tables; null means the bundled data. */
  zoningDataDir: string | null;
};

let dotEnvLoaded = false;

function ensureDotEnv(): void {
  if (dotEnvLoaded) return;
  dotEnvLoaded = true;
  loadDotEnv({ path: path.resolve(process.cwd(), ".env") });
}

/**
 * Read engine settings from the environment. `.env` in the working directory
 * is loaded first when reading from `process.env`; explicit values already in
 * the environment win.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (env === process.env) ensureDotEnv();

  const parsed = EnvConfigSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    ZONING_DATA_DIR: env.ZONING_DATA_DIR || undefined,
  });
  if (!parsed.success) throw invalidEnvironment(parsed.error);

  return {
    logLevel: parsed.data.LOG_LEVEL,
    zoningDataDir: resolveDataDir(parsed.data.ZONING_DATA_DIR),
  };
}

/**
 * Read only `ZONING_DATA_DIR`. Library code that needs the data directory
 * uses this so that an unrelated setting such as `LOG_LEVEL` cannot fail it.
 */
export function loadZoningDataDir(env: NodeJS.ProcessEnv = process.env): string | null {
  if (env === process.env) ensureDotEnv();

  const parsed = DataDirEnvSchema.safeParse({
    ZONING_DATA_DIR: env.ZONING_DATA_DIR || undefined,
  });
  if (!parsed.success) throw invalidEnvironment(parsed.error);

  return resolveDataDir(parsed.data.ZONING_DATA_DIR);
}

function resolveDataDir(dir: string | undefined): string | null {
  return dir ? path.resolve(dir) : null;
}

function invalidEnvironment(error: z.ZodError): ValidationError {
  return new ValidationError(
    "Invalid environment configuration",
    error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  );
}
