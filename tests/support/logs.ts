import { afterEach, beforeEach, vi } from "vitest";
import { LogLevel, LoggerEvents, StructuredLogger } from "../../src/common/logger";

export interface CapturedLine {
  level: string;
  message: string;
  [key: string]: unknown;
}

/**
 * Call at suite level: collects every emitted log line for the current test
 * and keeps the console quiet meanwhile.
 */
export function captureLogs(level: LogLevel = LogLevel.DEBUG) {
  const lines: CapturedLine[] = [];
  const listener = (json: string) => {
    lines.push(JSON.parse(json));
  };

  beforeEach(() => {
    lines.length = 0;
    LoggerEvents.on("log", listener);
    for (const method of ["log", "debug", "info", "warn", "error"] as const) {
      vi.spyOn(console, method).mockImplementation(() => undefined);
    }
  });
  afterEach(() => {
    LoggerEvents.off("log", listener);
    vi.restoreAllMocks();
  });

  return {
    logger: new StructuredLogger(level),
    lines,
    messages: (lvl: string) => lines.filter((l) => l.level === lvl).map((l) => l.message),
  };
}
