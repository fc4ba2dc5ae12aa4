import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as v from "valibot";

import { formatEnvIssues, parseEnv } from "./env";
import { envSchema } from "./schema";

describe("parseEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("should apply defaults when nothing is set", () => {
    process.env = {};

    const env = parseEnv();

    expect(env.PORT).toBe(8000);
    expect(env.HOST).toBe("0.0.0.0");
    expect(env.NODE_ENV).toBe("development");
    expect(env.LOG_LEVEL).toBeUndefined();
    expect(env.WHITEPAPER_ANALYZER_URL).toBe("http://localhost:8101");
    expect(env.SERVICE_ANALYZER_URL).toBe("http://localhost:8102");
    expect(env.ANALYZER_TIMEOUT_MS).toBe(30000);
    expect(env.HEALTH_CHECK_INTERVAL_MS).toBe(30000);
    expect(env.ALERT_CHECK_INTERVAL_MS).toBe(60000);
    expect(env.HEALTH_MAX_RSS_MB).toBe(1024);
    expect(env.AWS_REGION).toBeUndefined();
  });

  it("should parse valid environment variables", () => {
    process.env = {
      PORT: "3000",
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
      WHITEPAPER_ANALYZER_URL: "http://whitepaper.internal:9000",
      ANALYZER_TIMEOUT_MS: "5000",
      AWS_REGION: "eu-west-1",
    };

    const env = parseEnv();

    expect(env.PORT).toBe(3000);
    expect(env.NODE_ENV).toBe("production");
    expect(env.LOG_LEVEL).toBe("warn");
    expect(env.WHITEPAPER_ANALYZER_URL).toBe("http://whitepaper.internal:9000");
    expect(env.ANALYZER_TIMEOUT_MS).toBe(5000);
    expect(env.AWS_REGION).toBe("eu-west-1");
  });

  it("should exit when PORT is not a number", () => {
    process.env = { PORT: "not-a-number" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should exit when PORT is out of range", () => {
    process.env = { PORT: "65536" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should exit when NODE_ENV is invalid", () => {
    process.env = { NODE_ENV: "staging" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should exit when LOG_LEVEL is invalid", () => {
    process.env = { LOG_LEVEL: "verbose" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should exit when an analyzer URL is malformed", () => {
    process.env = { SERVICE_ANALYZER_URL: "not a url" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should exit when the health interval is below one second", () => {
    process.env = { HEALTH_CHECK_INTERVAL_MS: "10" };

    expect(() => parseEnv()).toThrow("process.exit(1)");
  });

  it("should accept valid LOG_LEVEL values", () => {
    const validLevels = ["debug", "info", "warn", "error"] as const;

    for (const level of validLevels) {
      process.env = { LOG_LEVEL: level };

      const env = parseEnv();
      expect(env.LOG_LEVEL).toBe(level);
    }
  });

  it("should read from an explicit source", () => {
    const env = parseEnv({ PORT: "9100", HOST: "127.0.0.1" });

    expect(env.PORT).toBe(9100);
    expect(env.HOST).toBe("127.0.0.1");
  });

  it("should print the failing variable before exiting", () => {
    expect(() => parseEnv({ ANALYZER_TIMEOUT_MS: "0" })).toThrow("process.exit(1)");

    expect(console.error).toHaveBeenCalledWith("Environment variable validation failed:");
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^ {2}- ANALYZER_TIMEOUT_MS: /));
  });
});

describe("formatEnvIssues", () => {
  it("should prefix each issue with its variable name", () => {
    const result = v.safeParse(envSchema, { NODE_ENV: "staging" });

    expect(result.success).toBe(false);
    const lines = formatEnvIssues(result.issues ?? []);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^ {2}- NODE_ENV: /);
  });
});
