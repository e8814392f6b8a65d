import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, parseLogLevel, setLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("maps level names", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" Info ")).toBe("info");
    expect(parseLogLevel("WARNING")).toBe("warn");
    expect(parseLogLevel("warn")).toBe("warn");
    expect(parseLogLevel("CRITICAL")).toBe("error");
    expect(parseLogLevel("verbose")).toBeUndefined();
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes scoped lines at or above the threshold", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");
    const log = createLogger("unit");
    log.info("hidden");
    log.warn("shown");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - unit - WARN - shown$/);
  });
});
