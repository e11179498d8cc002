import { describe, expect, it, vi } from "vitest";
import { loadModeEnvFile, parseDotEnvLine, parseEnv } from "../../src/config/env.js";

const requiredEnv = {
  OPENAI_API_KEY: "test-key",
  POSTGRES_URL: "postgres://test/db"
};

describe("parseDotEnvLine", () => {
  it("skips comments and blank lines and unquotes values", () => {
    expect(parseDotEnvLine("# comment")).toBeNull();
    expect(parseDotEnvLine("   ")).toBeNull();
    expect(parseDotEnvLine("=value")).toBeNull();
    expect(parseDotEnvLine(' LLM_DEFAULT_MODEL = "gemma3:27b" ')).toEqual(["LLM_DEFAULT_MODEL", "gemma3:27b"]);
    expect(parseDotEnvLine("QDRANT_URL='http://qdrant:6333'")).toEqual(["QDRANT_URL", "http://qdrant:6333"]);
  });
});

describe("loadModeEnvFile", () => {
  it("loads the file for the explicit mode without overriding existing variables", () => {
    const processEnv: NodeJS.ProcessEnv = { APP_MODE: "local", PORT: "4000" };
    const existsSync = vi.fn(() => true);
    const readFileSync = vi.fn().mockReturnValue("PORT=5000\nPIPELINE_CONCURRENCY=4\n# note\n");

    const loaded = loadModeEnvFile({ cwd: "/srv/app", processEnv, existsSync, readFileSync });

    expect(loaded).toBe("/srv/app/.env.local");
    expect(processEnv).toEqual({ APP_MODE: "local", PORT: "4000", PIPELINE_CONCURRENCY: "4" });
  });

  it("returns null when no mode file exists", () => {
    const processEnv: NodeJS.ProcessEnv = {};

    expect(loadModeEnvFile({ cwd: "/srv/app", processEnv, existsSync: () => false })).toBeNull();
    expect(processEnv).toEqual({});
  });
});

describe("parseEnv", () => {
  it("applies defaults for a local configuration", () => {
    const env = parseEnv({ ...requiredEnv, APP_MODE: "local" });

    expect(env).toMatchObject({
      APP_MODE: "local",
      PORT: 3000,
      ENABLE_INFRA_BOOTSTRAP: false,
      LLM_DEFAULT_MODEL: "gemma3:27b",
      EMBEDDING_MODEL: "bge-m3",
      QDRANT_COLLECTION: "ppee_applications",
      PIPELINE_CONCURRENCY: 2,
      TASK_RETENTION_MS: 3_600_000,
      EXTERNAL_CALL_RETRIES: 2,
      FULL_SCAN_BATCH_SIZE: 1
    });
    expect(env.QDRANT_URL).toBeUndefined();
  });

  it("coerces numbers and boolean flags", () => {
    const env = parseEnv({
      ...requiredEnv,
      APP_MODE: "local",
      PORT: "8080",
      ENABLE_INFRA_BOOTSTRAP: "yes",
      RUN_STARTUP_CHECKS: "off",
      OPENAI_BASE_URL: "  "
    });

    expect(env.PORT).toBe(8080);
    expect(env.ENABLE_INFRA_BOOTSTRAP).toBe(true);
    expect(env.RUN_STARTUP_CHECKS).toBe(false);
    expect(env.OPENAI_BASE_URL).toBeUndefined();
  });

  it("requires a Qdrant URL in prod mode and lists every problem", () => {
    expect(() => parseEnv({ APP_MODE: "prod", POSTGRES_URL: "postgres://test/db" })).toThrow(
      "Invalid environment configuration:\n- OPENAI_API_KEY: Required"
    );
    expect(() => parseEnv({ ...requiredEnv, APP_MODE: "prod" })).toThrow(
      "Invalid environment configuration:\n- QDRANT_URL: QDRANT_URL is required in prod mode"
    );
  });
});
