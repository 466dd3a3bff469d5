import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  context?: Record<string, unknown>;
  now?: () => Date;
};

export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const now = params.now ?? (() => new Date());
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const timestamp = now().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "secreview";
  const filePath = path.join(dir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    const merged = params.context || meta ? { ...params.context, ...meta } : undefined;
    const payload = {
      timestamp: now().toISOString(),
      level: level === "warn" ? "warning" : level,
      message,
      meta: merged
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

type UiLoggerParams = {
  appLogger: Logger;
  // Receives console-bound lines; a spinner can swallow info lines as status updates.
  print?: (line: string, level: Exclude<LogLevel, "debug">) => void;
  quiet?: boolean;
  verbose?: boolean;
};

export function createUiLogger(params: UiLoggerParams): Logger {
  const print = params.print ?? ((line: string) => console.error(line));
  const emit = (level: Exclude<LogLevel, "debug">, line: string) => {
    if (params.quiet && level === "info") return;
    print(line, level);
  };
  return {
    debug: (message, meta) => {
      params.appLogger.debug(message, meta);
      if (params.verbose && !params.quiet) print(pc.dim(message), "info");
    },
    info: (message, meta) => {
      params.appLogger.info(message, meta);
      emit("info", message);
    },
    warn: (message, meta) => {
      params.appLogger.warn(message, meta);
      emit("warn", pc.yellow(message));
    },
    error: (message, meta) => {
      params.appLogger.error(message, meta);
      emit("error", pc.red(message));
    }
  };
}
