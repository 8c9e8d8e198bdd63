export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(scope: string): Logger;
};

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return "";
  }
  if (typeof meta === "string") {
    return ` ${meta}`;
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return " [meta:unserializable]";
  }
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const write = (messageLevel: LogLevel, message: string, meta?: unknown): void => {
    if (rank[messageLevel] < rank[level]) {
      return;
    }

    const line = `[${new Date().toISOString()}] [${messageLevel.toUpperCase()}] [${scope}] ${message}${formatMeta(meta)}`;
    if (messageLevel === "error") {
      console.error(line);
    } else if (messageLevel === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level)
  };
}
