/**
 * Configuration loader: builds the AppConfig once from environment variables
 *
 * The entry point loads `.env` (dotenv) before calling this; nothing else in
 * the project reads credentials from the environment.
 */

import type { AppConfig, BulkMode, BulkOperationName, LogLevel } from "@/types";
import {
  ENV_INTERCOM_ACCESS_TOKEN,
  ENV_INTERCOM_ADMIN_ID,
  ENV_INTERCOM_INBOX_ID,
  ENV_INTERCOM_BASE_URL,
  ENV_LOG_LEVEL,
  ENV_BULK_MODE,
  ENV_BULK_OPERATION,
  ENV_BULK_PARALLEL_WORKERS,
  ENV_BULK_BATCH_SIZE,
  ENV_BULK_MAX_ITEMS,
  ENV_BULK_DELAY_MS,
  ENV_BULK_SEARCH_STATE,
  ENV_BULK_TAG_IDS,
  ENV_BULK_NEW_STATE,
  ENV_BULK_CUSTOM_FIELDS,
  DEFAULT_BULK_MODE,
  DEFAULT_BULK_OPERATION,
  DEFAULT_NEW_STATE,
  DEFAULT_LOG_LEVEL,
  INTERCOM_DEFAULT_BASE_URL,
  BULK_MODES,
  LOG_LEVELS,
} from "@/constants";
import { parseIntegerOrNull } from "@/utils";
import { ConfigError } from "./errors";

type Env = Record<string, string | undefined>;

const OPERATION_NAMES: readonly BulkOperationName[] = ["close", "tag", "state", "custom-fields"];

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readEnum<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${allowed.join(", ")} (got "${raw}")`, [name]);
  }
  return match;
}

function readPositiveInt(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = parseIntegerOrNull(raw);
  if (value === null || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`, [name]);
  }
  return value;
}

function readNonNegativeInt(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = parseIntegerOrNull(raw);
  if (value === null || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer (got "${raw}")`, [name]);
  }
  return value;
}

function readList(env: Env, name: string): string[] {
  const raw = readString(env, name);
  if (raw === undefined) {
    return [];
  }
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function readJsonObject(env: Env, name: string): Record<string, unknown> {
  const raw = readString(env, name);
  if (raw === undefined) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `${name} must be a JSON object: ${err instanceof Error ? err.message : String(err)}`,
      [name],
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${name} must be a JSON object`, [name]);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Build the application configuration
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigError} Listing every missing required variable, or the first invalid one
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const accessToken = readString(env, ENV_INTERCOM_ACCESS_TOKEN);
  const adminId = readString(env, ENV_INTERCOM_ADMIN_ID);
  const inboxId = readString(env, ENV_INTERCOM_INBOX_ID);

  const missing: string[] = [];
  if (!accessToken) missing.push(ENV_INTERCOM_ACCESS_TOKEN);
  if (!adminId) missing.push(ENV_INTERCOM_ADMIN_ID);
  if (!inboxId) missing.push(ENV_INTERCOM_INBOX_ID);

  if (!accessToken || !adminId || !inboxId) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }

  const logLevels = Object.keys(LOG_LEVELS).filter(
    (level): level is LogLevel => level in LOG_LEVELS,
  );

  return {
    intercom: {
      accessToken,
      adminId,
      baseUrl: readString(env, ENV_INTERCOM_BASE_URL) ?? INTERCOM_DEFAULT_BASE_URL,
    },
    inboxId,
    logLevel: readEnum(env, ENV_LOG_LEVEL, logLevels, DEFAULT_LOG_LEVEL),
    run: {
      mode: readEnum<BulkMode>(env, ENV_BULK_MODE, BULK_MODES, DEFAULT_BULK_MODE),
      operation: readEnum<BulkOperationName>(
        env,
        ENV_BULK_OPERATION,
        OPERATION_NAMES,
        DEFAULT_BULK_OPERATION,
      ),
      parallelWorkers: readPositiveInt(env, ENV_BULK_PARALLEL_WORKERS),
      batchSize: readPositiveInt(env, ENV_BULK_BATCH_SIZE),
      maxItems: readPositiveInt(env, ENV_BULK_MAX_ITEMS),
      delayMs: readNonNegativeInt(env, ENV_BULK_DELAY_MS),
      searchState: readString(env, ENV_BULK_SEARCH_STATE),
    },
    operationParams: {
      tagIds: readList(env, ENV_BULK_TAG_IDS),
      newState: readString(env, ENV_BULK_NEW_STATE) ?? DEFAULT_NEW_STATE,
      customFields: readJsonObject(env, ENV_BULK_CUSTOM_FIELDS),
    },
  };
}
