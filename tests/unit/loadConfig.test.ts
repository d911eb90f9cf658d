/**
 * Unit tests for environment configuration loading
 */

import { describe, it, expect } from "vitest";
import { loadAppConfig, ConfigError } from "@/config";

const REQUIRED = {
  INTERCOM_ACCESS_TOKEN: "test-token",
  INTERCOM_ADMIN_ID: "admin-1",
  INTERCOM_INBOX_ID: "team-1",
};

function catchConfigError(env: Record<string, string | undefined>): ConfigError {
  try {
    loadAppConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected loadAppConfig to throw");
}

describe("loadAppConfig", () => {
  it("should apply defaults when only required variables are set", () => {
    expect(loadAppConfig(REQUIRED)).toEqual({
      intercom: {
        accessToken: "test-token",
        adminId: "admin-1",
        baseUrl: "https://api.intercom.io",
      },
      inboxId: "team-1",
      logLevel: "info",
      run: {
        mode: "hybrid",
        operation: "close",
        parallelWorkers: undefined,
        batchSize: undefined,
        maxItems: undefined,
        delayMs: undefined,
        searchState: undefined,
      },
      operationParams: {
        tagIds: [],
        newState: "closed",
        customFields: {},
      },
    });
  });

  it("should list every missing required variable in one error", () => {
    const error = catchConfigError({ INTERCOM_ADMIN_ID: "admin-1" });

    expect(error.variables).toEqual(["INTERCOM_ACCESS_TOKEN", "INTERCOM_INBOX_ID"]);
    expect(error.message).toBe(
      "Missing required environment variables: INTERCOM_ACCESS_TOKEN, INTERCOM_INBOX_ID",
    );
  });

  it("should treat blank values as missing", () => {
    const error = catchConfigError({ ...REQUIRED, INTERCOM_ACCESS_TOKEN: "   " });
    expect(error.variables).toEqual(["INTERCOM_ACCESS_TOKEN"]);
  });

  it("should read run and operation settings", () => {
    const config = loadAppConfig({
      ...REQUIRED,
      INTERCOM_BASE_URL: "https://api.eu.example.test",
      LOG_LEVEL: "DEBUG",
      BULK_MODE: "Maximal",
      BULK_OPERATION: "custom-fields",
      BULK_PARALLEL_WORKERS: "8",
      BULK_BATCH_SIZE: "25",
      BULK_MAX_ITEMS: "1000",
      BULK_DELAY_MS: "0",
      BULK_SEARCH_STATE: "snoozed",
      BULK_TAG_IDS: "t1, t2,,",
      BULK_NEW_STATE: "open",
      BULK_CUSTOM_FIELDS: '{"priority":"high","reviewed":true}',
    });

    expect(config.intercom.baseUrl).toBe("https://api.eu.example.test");
    expect(config.logLevel).toBe("debug");
    expect(config.run).toEqual({
      mode: "maximal",
      operation: "custom-fields",
      parallelWorkers: 8,
      batchSize: 25,
      maxItems: 1000,
      delayMs: 0,
      searchState: "snoozed",
    });
    expect(config.operationParams).toEqual({
      tagIds: ["t1", "t2"],
      newState: "open",
      customFields: { priority: "high", reviewed: true },
    });
  });

  it("should reject an unknown mode", () => {
    const error = catchConfigError({ ...REQUIRED, BULK_MODE: "turbo" });
    expect(error.message).toBe(
      'BULK_MODE must be one of conservative, hybrid, maximal (got "turbo")',
    );
    expect(error.variables).toEqual(["BULK_MODE"]);
  });

  it("should reject non-positive worker counts", () => {
    expect(catchConfigError({ ...REQUIRED, BULK_PARALLEL_WORKERS: "0" }).message).toBe(
      'BULK_PARALLEL_WORKERS must be a positive integer (got "0")',
    );
    expect(catchConfigError({ ...REQUIRED, BULK_BATCH_SIZE: "ten" }).variables).toEqual([
      "BULK_BATCH_SIZE",
    ]);
  });

  it("should reject custom fields that are not a JSON object", () => {
    expect(catchConfigError({ ...REQUIRED, BULK_CUSTOM_FIELDS: "[1,2]" }).message).toBe(
      "BULK_CUSTOM_FIELDS must be a JSON object",
    );
    expect(catchConfigError({ ...REQUIRED, BULK_CUSTOM_FIELDS: "{oops" }).variables).toEqual([
      "BULK_CUSTOM_FIELDS",
    ]);
  });
});
