export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Logger that merges `bindings` into every entry's metadata. */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Output sink. Defaults to console.log. */
  output?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    pretty = process.env.NODE_ENV !== "production",
    output = console.log,
  } = options;

  const minRank = LEVEL_RANK[level];

  function write(msgLevel: LogLevel, msg: string, meta: LogMeta | undefined) {
    if (LEVEL_RANK[msgLevel] < minRank) return;
    const ts = new Date().toISOString();
    if (pretty) {
      const entries = meta ? Object.entries(meta) : [];
      const metaStr =
        entries.length > 0
          ? " " + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")
          : "";
      output(`[${ts}] ${msgLevel.toUpperCase().padEnd(5)} ${msg}${metaStr}`);
    } else {
      output(JSON.stringify({ ts, level: msgLevel, msg, ...meta }));
    }
  }

  function bind(bindings: LogMeta): Logger {
    const merge = (meta?: LogMeta): LogMeta | undefined =>
      Object.keys(bindings).length > 0 || meta ? { ...bindings, ...meta } : undefined;

    return {
      debug: (msg, meta) => write("debug", msg, merge(meta)),
      info: (msg, meta) => write("info", msg, merge(meta)),
      warn: (msg, meta) => write("warn", msg, merge(meta)),
      error: (msg, meta) => write("error", msg, merge(meta)),
      child: (extra) => bind({ ...bindings, ...extra }),
    };
  }

  return bind({});
}

/** Logger that drops everything; the default where a component takes an optional logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
