import path from "node:path";
import { appendFile } from "node:fs/promises";
import { ensureDir } from "./fs.js";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export type Logger = {
  info: (msg: string) => Promise<void>;
  warn: (msg: string) => Promise<void>;
  error: (msg: string) => Promise<void>;
  flush: () => Promise<void>;
};

export function defaultLogPath(): string {
  return path.resolve(process.cwd(), process.env.LOG_FILE ?? "logs/flow.log");
}

export async function createFileLogger(opts?: { logFile?: string; echo?: boolean }): Promise<Logger> {
  const logFile = opts?.logFile ?? defaultLogPath();
  const echo = opts?.echo ?? true;
  await ensureDir(path.dirname(logFile));

  // Appends are chained so lines land in call order.
  let chain = Promise.resolve();

  async function write(level: LogLevel, msg: string): Promise<void> {
    const line = `${new Date().toISOString()} ${level} ${msg}\n`;

    if (echo) {
      if (level === "ERROR") console.error(msg);
      else if (level === "WARN") console.warn(msg);
      else console.log(msg);
    }

    chain = chain.then(() => appendFile(logFile, line, "utf8"));
    await chain;
  }

  return {
    info: (msg) => write("INFO", msg),
    warn: (msg) => write("WARN", msg),
    error: (msg) => write("ERROR", msg),
    flush: async () => {
      await chain;
    }
  };
}
