import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "./log";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("prefixes debug output with the scope in dev", () => {
    vi.stubEnv("DEV", true);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("Navigation").debug("Built 3 pages", { extra: 1 });

    expect(logSpy).toHaveBeenCalledWith("[Navigation] Built 3 pages", { extra: 1 });
  });

  it("drops debug output outside dev", () => {
    vi.stubEnv("DEV", false);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("Navigation").debug("Built 3 pages");

    expect(logSpy).not.toHaveBeenCalled();
  });

  it("always emits warnings", () => {
    vi.stubEnv("DEV", false);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("Config").warn("Something is off");

    expect(warnSpy).toHaveBeenCalledWith("[Config] Something is off");
  });
});
