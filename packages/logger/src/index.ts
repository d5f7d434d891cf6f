export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly symbol?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(moduleSuffix: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `LOG_LEVEL` or "info". */
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
};

const resolveLevel = (explicit?: LogLevel): LogLevel => {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine: LogSink = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (ts: string, moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { symbol, ...rest } = meta ?? {};

  return {
    ts,
    level,
    module: moduleName,
    msg,
    ...(typeof symbol === "string" ? { symbol } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const level = resolveLevel(options.level);
  const sink = options.sink ?? writeLine;
  const now = options.now ?? (() => new Date());

  const log = (entryLevel: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
      return;
    }
    const entry = buildEntry(now().toISOString(), moduleName, entryLevel, msg, meta);
    sink(entryLevel, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (moduleSuffix) =>
      createLogger(`${moduleName}/${moduleSuffix}`, { level, sink, now }),
  };
};
