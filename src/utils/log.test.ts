import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./log";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("Board").warn("Swap rejected", { x: 1 });
    expect(warn).toHaveBeenCalledWith("[Board] Swap rejected", { x: 1 });
  });

  it("drops lines below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("Board", "error");
    log.debug("hidden");
    log.error("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[Board] shown");
  });

  it("is quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("Board", "silent").error("nothing");
    expect(error).not.toHaveBeenCalled();
  });
});
