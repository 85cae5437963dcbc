export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isJsonFormat = process.env.LOG_FORMAT === "json";

function resolveMinLevel(): LogLevel {
  if (process.env.DEBUG) return "debug";
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return configured === "debug" || configured === "info" || configured === "warn" || configured === "error"
    ? configured
    : "info";
}

const minLevel = resolveMinLevel();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

// Error instances stringify to "{}"
function serializable(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, serializable(v)]));
  }
  return value;
}

function formatData(args: unknown[]): unknown | undefined {
  if (args.length === 0) return undefined;
  return args.length === 1 ? serializable(args[0]) : args.map(serializable);
}

function consoleFor(level: LogLevel): (...data: unknown[]) => void {
  switch (level) {
    case "error":
      return console.error;
    case "warn":
      return console.warn;
    case "debug":
      return isJsonFormat ? console.log : console.debug;
    default:
      return console.log;
  }
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (!enabled(level)) return;
    const consoleFn = consoleFor(level);

    if (!isJsonFormat) {
      consoleFn(prefix, message, ...args);
      return;
    }

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
    };
    const data = formatData(args);
    if (data !== undefined) entry.data = data;
    consoleFn(JSON.stringify(entry));
  };

  return {
    info: (msg, ...args) => write("info", msg, args),
    warn: (msg, ...args) => write("warn", msg, args),
    error: (msg, ...args) => write("error", msg, args),
    debug: (msg, ...args) => write("debug", msg, args),
  };
}
