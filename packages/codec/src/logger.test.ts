import { describe, expect, it, vi } from "vitest";
import { NOOP_LOGGER, createConsoleLogger, shouldLog } from "./logger";

function recordingSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createConsoleLogger", () => {
  it("drops messages below the minimum level", () => {
    const sink = recordingSink();
    const logger = createConsoleLogger({ level: "warn", sink });

    logger.debug("instantiating generic", { key: "Pair<u8>" });
    logger.info("loaded type registry");
    logger.warn("ignoring trailing bytes after decoded value", { remaining: 1 });

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[scale-kit] ignoring trailing bytes after decoded value", { remaining: 1 });
  });

  it("prefixes lines and leaves out absent metadata", () => {
    const sink = recordingSink();
    const logger = createConsoleLogger({ prefix: "registry", level: "debug", sink });

    logger.debug("dropping ignored variant");
    logger.error("failed", { code: "UNEXPECTED_EOF" });

    expect(sink.debug).toHaveBeenCalledWith("[registry] dropping ignored variant");
    expect(sink.error).toHaveBeenCalledWith("[registry] failed", { code: "UNEXPECTED_EOF" });
  });
});

describe("shouldLog", () => {
  it("orders levels from debug to error", () => {
    expect(shouldLog("error", "debug")).toBe(true);
    expect(shouldLog("info", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
  });
});

describe("NOOP_LOGGER", () => {
  it("accepts every level without output", () => {
    expect(() => NOOP_LOGGER.error("ignored", { any: 1 })).not.toThrow();
  });
});
