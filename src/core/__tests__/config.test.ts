/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { DEFAULT_API_BASE_URL, loadConfig, loadEnvFile } from "../config.js";
import { ErrorCode, ProductSyncError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      apiBaseUrl: DEFAULT_API_BASE_URL,
      maxRateLimitRetries: 5,
      createConcurrency: 4,
    });
  });

  it("reads and coerces overrides", () => {
    const config = loadConfig({
      RBX_API_KEY: "  test-secret  ",
      RBX_API_BASE_URL: "http://localhost:8080/",
      RBX_RATE_LIMIT_RETRIES: "2",
      RBX_CREATE_CONCURRENCY: "1",
    });

    expect(config).toEqual({
      apiKey: "test-secret",
      apiBaseUrl: "http://localhost:8080",
      maxRateLimitRetries: 2,
      createConcurrency: 1,
    });
  });

  it("treats a blank key as absent", () => {
    expect(loadConfig({ RBX_API_KEY: "   " }).apiKey).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ RBX_CREATE_CONCURRENCY: "zero" })).toThrow(ProductSyncError);
    expect(() => loadConfig({ RBX_CREATE_CONCURRENCY: "zero" })).toThrow(/RBX_CREATE_CONCURRENCY/);
  });

  it("tags configuration failures", () => {
    let caught: unknown;
    try {
      loadConfig({ RBX_API_BASE_URL: "not a url" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR });
  });
});

describe("loadEnvFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "env-file-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("feeds the api key from a .env file into the config", async () => {
    const envPath = path.join(tempDir, ".env");
    await fs.writeFile(envPath, "RBX_API_KEY=test-secret\nRBX_CREATE_CONCURRENCY=2\n");
    const env: NodeJS.ProcessEnv = {};

    expect(loadEnvFile(envPath, env)).toEqual(["RBX_API_KEY", "RBX_CREATE_CONCURRENCY"]);
    expect(loadConfig(env)).toMatchObject({ apiKey: "test-secret", createConcurrency: 2 });
  });

  it("keeps variables that are already set", async () => {
    const envPath = path.join(tempDir, ".env");
    await fs.writeFile(envPath, "RBX_API_KEY=from-file\n");
    const env: NodeJS.ProcessEnv = { RBX_API_KEY: "from-shell" };

    loadEnvFile(envPath, env);

    expect(env.RBX_API_KEY).toBe("from-shell");
  });

  it("ignores a missing file", () => {
    const env: NodeJS.ProcessEnv = {};

    expect(loadEnvFile(path.join(tempDir, "missing.env"), env)).toEqual([]);
    expect(env).toEqual({});
  });
});
