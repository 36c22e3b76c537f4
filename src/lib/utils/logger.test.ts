import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, LogLevel, LogEventType, parseLogLevel, type LogEntry } from "./logger.ts";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should default to WARNING", () => {
    expect(new Logger().getLevel()).toBe(LogLevel.WARNING);
  });

  it("should keep entries below the level off the console", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = new Logger();

    log.info("hidden");
    log.warning("shown");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[WARNING] shown");
  });

  it("should notify listeners of every entry regardless of level", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = new Logger();
    const entries: LogEntry[] = [];
    log.onLog((entry) => entries.push(entry));

    log.debug("quiet", LogEventType.HEADER_READ);
    log.warning("loud", LogEventType.GENERIC);

    expect(entries.map((e) => [e.level, e.message, e.eventType])).toEqual([
      [LogLevel.DEBUG, "quiet", LogEventType.HEADER_READ],
      [LogLevel.WARNING, "loud", LogEventType.GENERIC],
    ]);
  });

  it("should write every level to stderr methods", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new Logger();
    logger.setLevel(LogLevel.DEBUG);

    logger.debug("d");
    logger.info("i");
    logger.warning("w");
    logger.error("e");

    expect(error.mock.calls).toEqual([["[DEBUG] d"], ["[ERROR] e"]]);
    expect(warn.mock.calls).toEqual([["[INFO] i"], ["[WARNING] w"]]);
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("should leave stdout untouched at every level", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = new Logger();
    logger.setLevel(LogLevel.DEBUG);

    logger.debug("Header read, expecting 16 data field bytes");
    logger.info("i");
    logger.warning("w");
    logger.error("e");

    expect(stdout).not.toHaveBeenCalled();
  });

  it("should pass data through to listeners", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger();
    logger.setLevel(LogLevel.DEBUG);
    const entries: LogEntry[] = [];
    logger.onLog((entry) => entries.push(entry));

    logger.debug("header", LogEventType.HEADER_READ, { bodySize: 16 });

    expect(entries[0]?.data).toEqual({ bodySize: 16 });
  });

  it("should stop notifying after unsubscribe", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger();
    const entries: LogEntry[] = [];
    const unsubscribe = logger.onLog((entry) => entries.push(entry));

    logger.error("first");
    unsubscribe();
    logger.error("second");

    expect(entries.map((e) => e.message)).toEqual(["first"]);
  });
});

describe("parseLogLevel", () => {
  it("should accept level names in any case", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("Info")).toBe(LogLevel.INFO);
    expect(parseLogLevel("warn")).toBe(LogLevel.WARNING);
    expect(parseLogLevel(" ERROR ")).toBe(LogLevel.ERROR);
  });

  it("should return null for unknown names", () => {
    expect(parseLogLevel("verbose")).toBeNull();
  });
});
