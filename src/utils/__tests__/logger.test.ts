import { describe, it, expect, afterEach, vi } from "vitest";
import * as utils from "../index.js";
import { createLogger } from "../logger.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("createLogger", () => {
  it("is reachable through the utils barrel", () => {
    expect(utils.createLogger).toBe(createLogger);
  });

  it("uses an explicit level", () => {
    const logger = createLogger("dispatcher", { level: "warn" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  it("reads LOG_LEVEL case-insensitively", () => {
    vi.stubEnv("LOG_LEVEL", "ERROR");
    expect(createLogger("codeql-cli").level).toBe("error");
  });

  it("falls back to info in production for an unknown LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    vi.stubEnv("NODE_ENV", "production");
    expect(createLogger("hybrid-search").level).toBe("info");
  });
});
