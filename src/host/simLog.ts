import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;

/** Initialize file logging. Call once at startup with the log directory. */
export function initSimLog(logDir: string): void {
  mkdirSync(logDir, { recursive: true });
  logPath = join(logDir, "rainfield.log");
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(line: string): void {
  console.error(line);
  if (!logPath) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (err) {
    // Keep going on stderr alone
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`${timestamp()} [rainfield] log file disabled: ${reason}`);
    logPath = null;
  }
}

/** Log an informational message to stderr and the log file. */
export function simLog(msg: string): void {
  write(`${timestamp()} [rainfield] ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function simLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write(`${timestamp()} [rainfield] ${label}: ${msg}`);
}

/**
 * Install global handlers for uncaught exceptions and unhandled rejections.
 * Logs the error, then exits non-zero so the crash is still visible.
 */
export function installCrashHandlers(): void {
  process.on("uncaughtException", (err) => {
    simLogError("uncaughtException", err);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    simLogError("unhandledRejection", reason);
    process.exit(1);
  });
}
