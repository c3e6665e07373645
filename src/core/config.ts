/**
 * Runtime configuration read from the environment.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ErrorCode, ProductSyncError } from "./errors.js";
import { formatZodError, safeValidate } from "../utils/validation.js";

export const DEFAULT_API_BASE_URL = "https://apis.roblox.com";
export const ENV_FILE = ".env";

/**
 * Loads `.env` into the environment. Variables already set win; a missing
 * file is ignored.
 *
 * @returns the names of the variables the file defines
 */
export function loadEnvFile(
  filePath: string = ENV_FILE,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const result = dotenv.config({ path: filePath, processEnv: env });
  return result.parsed ? Object.keys(result.parsed) : [];
}

const EnvSchema = z.object({
  RBX_API_KEY: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined)),
  RBX_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  RBX_RATE_LIMIT_RETRIES: z.coerce.number().int().min(0).max(50).default(5),
  RBX_CREATE_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
});

export interface SyncConfig {
  /** Sent as `x-api-key`; absent means unauthenticated requests */
  apiKey?: string;
  apiBaseUrl: string;
  maxRateLimitRetries: number;
  createConcurrency: number;
}

/**
 * @throws {ProductSyncError} CONFIGURATION_ERROR listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const result = safeValidate(EnvSchema, env);
  if (!result.success) {
    throw new ProductSyncError(
      `Invalid environment: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR
    );
  }

  const parsed = result.data;
  return {
    apiKey: parsed.RBX_API_KEY,
    apiBaseUrl: parsed.RBX_API_BASE_URL.replace(/\/$/, ""),
    maxRateLimitRetries: parsed.RBX_RATE_LIMIT_RETRIES,
    createConcurrency: parsed.RBX_CREATE_CONCURRENCY,
  };
}
