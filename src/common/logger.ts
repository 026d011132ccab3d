import EventEmitter from "events";

export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

type LogContext = Record<string, unknown>;

type LogFormatter = (message: LogMessage) => string;

export interface Logger {
  log: (message: string) => void;

  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  getLevel: () => LogLevel;
  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LogMessage extends LogContext {
  level?: LogLevel;
  message?: string;
  ts?: string;
  error?: SerializedError | string | unknown;
}

interface SerializedError {
  stack?: string;
  message: string;
  name: string;
}

export interface LoggerContext {
  str: (key: string, value?: string | null) => LoggerContext;
  num: (key: string, value?: number | null) => LoggerContext;
  any: (key: string, value?: unknown, stringify?: boolean) => LoggerContext;
  array: (key: string, value?: unknown[]) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

const contextLevels = resolveContextLevels();

const LOG_CONTEXT_FOR: Record<LogLevel, boolean> = {
  [LogLevel.TRACE]: contextLevels.includes("trace"),
  [LogLevel.DEBUG]: contextLevels.includes("debug"),
  [LogLevel.INFO]: contextLevels.includes("info"),
  [LogLevel.WARN]: contextLevels.includes("warn"),
  [LogLevel.ERROR]: contextLevels.includes("error"),
};

function resolveContextLevels(): string[] {
  const contextLevelsEnv = process.env.GLOBAL_LOG_CONTEXT_FOR_LEVELS;
  if (contextLevelsEnv) {
    return contextLevelsEnv.split(",");
  }
  return ["trace", "debug", "info", "warn", "error"];
}

const logTimestamp = Boolean(process.env.GLOBAL_LOG_TIMESTAMP);

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

// Every formatted line is also published here (tests and log shippers listen)
export const LoggerEvents = new EventEmitter();

export class StructuredLogger implements Logger {
  protected _loglevel: LogLevel;
  protected _ctx: LogContext;
  private formatter: LogFormatter;

  public log: (message: string) => void;
  public trace: (message: string) => void;
  public debug: (message: string) => void;
  public info: (message: string) => void;
  public warn: (message: string) => void;
  public error: (message: string) => void;

  constructor(level?: LogLevel, ctx?: LogContext) {
    this.formatter =
      process.env.GLOBAL_LOG_FORMAT === "simple"
        ? this.formatSimple.bind(this)
        : this.formatJson.bind(this);

    this._loglevel = level ?? LogLevel.INFO;
    this._ctx = ctx ?? {};

    const emit = (lvl: LogLevel, sink: (line: string) => void) =>
      LEVEL_ORDER.indexOf(lvl) < LEVEL_ORDER.indexOf(this._loglevel)
        ? () => {}
        : (message: string) => this._write(lvl, message, sink);

    this.log = (message: string) =>
      console.log(this.formatter({ message, ...this._ctx }));
    // NOT USING console.trace: it prints a stacktrace for every message
    this.trace = emit(LogLevel.TRACE, (line) => console.log(line));
    this.debug = emit(LogLevel.DEBUG, (line) => console.debug(line));
    this.info = emit(LogLevel.INFO, (line) => console.info(line));
    this.warn = emit(LogLevel.WARN, (line) => console.warn(line));
    this.error = emit(LogLevel.ERROR, (line) => console.error(line));
  }

  isTraceEnabled() {
    return this._loglevel === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this._loglevel === LogLevel.DEBUG || this.isTraceEnabled();
  }

  getLevel() {
    return this._loglevel;
  }

  private _write(level: LogLevel, message: string, sink: (line: string) => void) {
    const payload: LogMessage = LOG_CONTEXT_FOR[level]
      ? { message, ...this._ctx, level }
      : { message, level };
    sink(this.formatter(payload));
  }

  setCtx(key: string, value?: unknown) {
    this._ctx[key] = value;
  }

  with(): LoggerContext {
    return new StructuredLogContext(
      new StructuredLogger(this._loglevel, { ...this._ctx })
    );
  }

  formatJson(message: LogMessage): string {
    if (logTimestamp) {
      message.ts = new Date().toISOString();
    }
    const json = safeStringify(message);
    LoggerEvents.emit("log", json);
    return json;
  }

  formatSimple(message: LogMessage): string {
    LoggerEvents.emit("log", safeStringify(message));

    const { message: text, level, error, ...rest } = message;
    const ts = logTimestamp ? ` [${new Date().toISOString()}] ` : "";
    const withContext =
      level !== undefined && LOG_CONTEXT_FOR[level] && Object.keys(rest).length > 0;
    const context = withContext ? "\n" + safeStringify(rest) + "\n" : "";

    switch (level) {
      case LogLevel.TRACE:
        return `\x1b[37m TRACE \x1b[0m ${ts} ${text}\n${context}`;
      case LogLevel.DEBUG:
        return `\x1b[36m DEBUG \x1b[0m ${ts} ${text}\n${context}`;
      case LogLevel.INFO:
        return `\x1b[32m INFO \x1b[0m  ${ts} ${text}\n${context}`;
      case LogLevel.WARN:
        return `\x1b[33m WARN \x1b[0m  ${ts} ${text}\n${context}`;
      case LogLevel.ERROR: {
        const stack = isSerializedError(error) ? error.stack : undefined;
        const detail =
          error === undefined || stack ? "" : "\n" + safeStringify({ error });
        return `\x1b[31m ERROR \x1b[0m ${ts} ${text}\n${context}${detail}${
          stack ? "\n" + prettyFormatStack(stack) : ""
        }`;
      }
      default:
        return `${text}${context}`;
    }
  }
}

export class StructuredLogContext implements LoggerContext {
  private _logger: StructuredLogger;

  constructor(logger: StructuredLogger) {
    this._logger = logger;
  }

  str(key: string, value?: string | null) {
    return this.any(key, value);
  }

  num(key: string, value?: number | null) {
    return this.any(key, value);
  }

  array(key: string, value?: unknown[]) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      const serialized: SerializedError = {
        name: e.name,
        message: e.message,
        stack: e.stack,
      };
      return this.any("error", serialized);
    } else if (typeof e === "string") {
      return this.str("error", e);
    }
    return this.any("error", e);
  }

  any(key: string, value?: unknown, stringify?: boolean) {
    this._logger.setCtx(key, stringify ? JSON.stringify(value) : value);
    return this;
  }

  logger() {
    return this._logger;
  }
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.toLowerCase();
  return LEVEL_ORDER.find((level) => level === wanted);
}

export function getLogger(): StructuredLogger {
  return new StructuredLogger(
    parseLevel(process.env.GLOBAL_LOG_LEVEL) ?? LogLevel.INFO
  );
}

function isSerializedError(value: unknown): value is SerializedError {
  return typeof value === "object" && value !== null && "message" in value;
}

function prettyFormatStack(stack: string) {
  return stack
    .split("\n")
    .map((line) => line.replace(/\s+at\s+/, "\n  at "))
    .join("");
}

function safeStringify(obj: unknown) {
  return JSON.stringify(obj, (_k, v) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
