type LogLevel = "debug" | "info" | "warn" | "error";

interface LoggerPayload {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, payload?: LoggerPayload): void;
  info(message: string, payload?: LoggerPayload): void;
  warn(message: string, payload?: LoggerPayload): void;
  error(message: string, payload?: LoggerPayload): void;
}

function isDebugEnabled(): boolean {
  if (process.env.ICONFORGE_DEBUG === "1" || process.env.ICONFORGE_DEBUG === "true") {
    return true;
  }
  const debug = process.env.DEBUG || "";
  return debug.includes("iconforge");
}

function formatLine(level: LogLevel, scope: string, message: string, payload?: LoggerPayload): string {
  const timestamp = new Date().toISOString();
  const payloadText = payload ? ` ${JSON.stringify(payload)}` : "";
  return `[${timestamp}] [${scope}] [${level.toUpperCase()}] ${message}${payloadText}`;
}

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function createLogger(scope: string, write: (line: string) => void = writeToStderr): Logger {
  const debugEnabled = isDebugEnabled();

  return {
    debug(message: string, payload?: LoggerPayload) {
      if (!debugEnabled) return;
      write(formatLine("debug", scope, message, payload));
    },
    info(message: string, payload?: LoggerPayload) {
      write(formatLine("info", scope, message, payload));
    },
    warn(message: string, payload?: LoggerPayload) {
      write(formatLine("warn", scope, message, payload));
    },
    error(message: string, payload?: LoggerPayload) {
      write(formatLine("error", scope, message, payload));
    },
  };
}
