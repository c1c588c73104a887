import { describe, it, expect, vi, afterEach } from "vitest";
import { getLogLevel, isLogLevel, logger, setLogLevel } from "../src/utils/logger";

describe("logger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("drops messages below the current level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("warn");

    logger.debug("hidden");
    logger.warn("shown", 1);

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[yolo-decode]", "shown", 1);
  });

  it("prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("silent");
    logger.error("hidden");
    expect(error).not.toHaveBeenCalled();
  });

  it("recognizes level names", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
