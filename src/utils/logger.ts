type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function parseLevel(value: string | undefined): Level {
  const normalized = (value || "").toLowerCase();
  return normalized === "debug" || normalized === "warn" || normalized === "error" ? normalized : "info";
}

let threshold: Level = parseLevel(process.env.LOG_LEVEL);

function serialize(v: unknown): string {
  try {
    return typeof v === "string" ? v : JSON.stringify(v);
  } catch {
    return String(v);
  }
}

export function setLogLevel(level: string | undefined): void {
  threshold = parseLevel(level);
}

export function log(level: Level, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const base = `[shiny-hunter] ${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
  const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>) {
    log("debug", message, meta);
  },
  info(message: string, meta?: Record<string, unknown>) {
    log("info", message, meta);
  },
  warn(message: string, meta?: Record<string, unknown>) {
    log("warn", message, meta);
  },
  error(message: string, meta?: Record<string, unknown>) {
    log("error", message, meta);
  },
};

/**
 * Format a number as 0x-prefixed, zero-padded uppercase hex.
 */
export function hex(value: number, width: number = 8): string {
  return `0x${(value >>> 0).toString(16).toUpperCase().padStart(width, "0")}`;
}
