// runtime/src/logger.ts
// Structured logger for the engine and its libraries (no third-party imports).
// - Levels: trace, debug, info, warn, error, fatal, silent
// - JSON lines or pretty key=value output
// - Child loggers with merged context (`store`, `stats:drift`, ...)
// - Timers: const done = log.time("bias.numeric"); ...; done({ rows })
// - Bounded in-memory history for diagnostics and tests

/* ================================= Types ================================ */

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type LogData = Record<string, unknown>;

export type LogRecord = {
  time: string;               // ISO timestamp
  ts: number;                 // epoch ms
  level: LogLevelName;
  name?: string;
  msg: string;
  data?: LogData;
};

export type LogSink = (rec: LogRecord, line: string) => void;

export type LoggerOptions = {
  name?: string;              // namespace, children append ":<child>"
  level?: LogLevelName;       // default from LOG_LEVEL or "info"
  json?: boolean;             // default from LOG_JSON
  context?: LogData;          // static fields added to every record
  bufferSize?: number;        // history size (default 200)
  sink?: LogSink;             // default writes to the console
};

export type Timer = (extra?: LogData) => number;

export type Logger = {
  level(): LogLevelName;
  isEnabled(lvl: LogLevelName): boolean;

  log(lvl: LogLevelName, msg: string, data?: LogData): void;
  trace(msg: string, data?: LogData): void;
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  fatal(msg: string, data?: LogData): void;

  child(nameOrCtx: string | LogData): Logger;
  time(label: string, base?: LogData, level?: LogLevelName): Timer;
  history(): LogRecord[];
  name(): string | undefined;
};

/* ============================ Implementation ============================ */

const LEVEL_NAMES: readonly LogLevelName[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];
const SEVERITY: Record<LogLevelName, number> = {
  trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60, silent: 1000,
};

export function parseLevel(v?: string): LogLevelName | undefined {
  const wanted = v?.trim().toLowerCase();
  if (!wanted) return undefined;
  return LEVEL_NAMES.find((name) => name === wanted);
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

function envFlag(v?: string): boolean | undefined {
  const s = v?.trim().toLowerCase();
  if (s === undefined) return undefined;
  return TRUTHY.has(s) ? true : FALSY.has(s) ? false : undefined;
}

/** JSON.stringify that survives cycles, bigints, errors and NaN/Infinity. */
function toJson(value: unknown): string {
  const visited = new WeakSet<object>();
  return JSON.stringify(value, (_key, v: unknown) => {
    switch (typeof v) {
      case "bigint":
        return v.toString();
      case "number":
        return Number.isFinite(v) ? v : String(v);
      case "object":
        if (v === null) return v;
        if (v instanceof Error) return { name: v.name, message: v.message };
        if (visited.has(v)) return "[Circular]";
        visited.add(v);
        return v;
      default:
        return v;
    }
  });
}

const NEEDS_QUOTES = /\s|["=]/;

function pretty(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return NEEDS_QUOTES.test(value) ? JSON.stringify(value) : value;
  if (typeof value === "object") return toJson(value);
  return String(value);
}

function withFields(base: LogData | undefined, ...more: Array<LogData | undefined>): LogData | undefined {
  let out: LogData | undefined;
  for (const part of [base, ...more]) if (part) out = { ...out, ...part };
  return out;
}

function writeToConsole(rec: LogRecord, line: string): void {
  switch (rec.level) {
    case "fatal":
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

/* ============================== Factory ================================ */

export function createLogger(opts: LoggerOptions = {}): Logger {
  const name = opts.name;
  const json = opts.json ?? envFlag(process.env.LOG_JSON) ?? false;
  const context = opts.context ? { ...opts.context } : undefined;
  const capacity = Math.max(1, Math.floor(opts.bufferSize ?? 200));
  const sink = opts.sink ?? writeToConsole;
  const recent: LogRecord[] = [];
  const threshold: LogLevelName = opts.level ?? parseLevel(process.env.LOG_LEVEL) ?? "info";

  const isEnabled = (lvl: LogLevelName): boolean =>
    threshold !== "silent" && SEVERITY[lvl] >= SEVERITY[threshold];

  function format(rec: LogRecord): string {
    if (json) return toJson({ time: rec.time, level: rec.level, name: rec.name, msg: rec.msg, ...rec.data });
    const head = [rec.time, rec.level.toUpperCase().padEnd(5)];
    if (rec.name) head.push(rec.name);
    head.push(rec.msg);
    for (const [k, v] of Object.entries(rec.data ?? {})) head.push(`${k}=${pretty(v)}`);
    return head.join(" ");
  }

  function log(lvl: LogLevelName, msg: string, data?: LogData): void {
    if (!isEnabled(lvl)) return;
    const now = new Date();
    const rec: LogRecord = { time: now.toISOString(), ts: now.getTime(), level: lvl, name, msg, data: withFields(context, data) };
    recent.push(rec);
    if (recent.length > capacity) recent.shift();
    sink(rec, format(rec));
  }

  const at = (lvl: LogLevelName) => (msg: string, data?: LogData) => log(lvl, msg, data);

  return {
    level: () => threshold,
    isEnabled,
    log,
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    fatal: at("fatal"),

    child(nameOrCtx) {
      const sub = typeof nameOrCtx === "string" ? nameOrCtx : undefined;
      return createLogger({
        name: sub === undefined ? name : name ? `${name}:${sub}` : sub,
        level: threshold,
        json,
        context: withFields(context, typeof nameOrCtx === "string" ? undefined : nameOrCtx),
        bufferSize: capacity,
        sink,
      });
    },

    time(label, base, level = "debug") {
      const started = Date.now();
      return (extra) => {
        const ms = Date.now() - started;
        log(level, label, withFields(base, extra, { ms }));
        return ms;
      };
    },

    history: () => recent.slice(),
    name: () => name,
  };
}

/** Logger that records nothing; the default for libraries given no logger. */
export function silentLogger(): Logger {
  return createLogger({ level: "silent", sink: () => undefined, bufferSize: 1 });
}
