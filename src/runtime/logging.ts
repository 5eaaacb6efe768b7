import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors stderr console output into `logFile`. The MCP host usually hides a
 * server's stderr, so the file is the only durable trace of a session.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- session started (pid ${process.pid}) ---\n`);

  const original = {
    warn: console.warn,
    error: console.error,
  };

  const mirror =
    (level: keyof typeof original) =>
    (...args: unknown[]) => {
      original[level].apply(console, args);
      const message = args.map(stringify).join(" ");
      stream.write(`[${new Date().toISOString()}] ${message}\n`);
    };

  console.warn = mirror("warn");
  console.error = mirror("error");

  let active = true;
  const shutdown = () => {
    if (!active) return;
    active = false;
    console.warn = original.warn;
    console.error = original.error;
    stream.write(`[${new Date().toISOString()}] --- session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
