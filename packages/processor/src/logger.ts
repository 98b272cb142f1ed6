import { appendFile, mkdir } from "node:fs/promises";
import { logFilePath, logsDir } from "@inboxcast/shared";

export type LogLevel = "info" | "warn" | "error";

let logFile: string | null = null;

/**
 * Initialize the logger with the base directory.
 */
export async function initLogger(base?: string): Promise<void> {
  await mkdir(logsDir(base), { recursive: true });
  logFile = logFilePath(base);
}

/** Stop appending to the log file (console output continues). */
export function resetLogger(): void {
  logFile = null;
}

/**
 * Timestamped entry on stderr, appended to processor.log once initialized.
 * stdout is left to the command's own output.
 */
export async function log(level: LogLevel, message: string): Promise<void> {
  const ts = new Date().toISOString();
  const line = `[${ts}] [${level.toUpperCase()}] ${message}\n`;

  process.stderr.write(line);

  if (logFile) {
    try {
      await appendFile(logFile, line);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[${ts}] [WARN] Could not write ${logFile}: ${reason}\n`);
    }
  }
}
