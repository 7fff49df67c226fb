import { describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const sink = vi.fn();
    const logger = createLogger("warn", sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown", 1);
    logger.error("also shown");

    expect(sink.mock.calls).toEqual([
      ["[warn]", "shown", 1],
      ["[error]", "also shown"],
    ]);
  });

  it("emits everything at debug", () => {
    const sink = vi.fn();
    createLogger("debug", sink).debug("request");

    expect(sink).toHaveBeenCalledWith("[debug]", "request");
  });
});

describe("isLogLevel", () => {
  it("recognises the supported levels", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("fatal")).toBe(false);
  });
});
