import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/**
 * Debug logger. Disabled unless the `DEBUG` environment variable is set, in
 * which case every message is appended to a per-process log file under the OS
 * temp directory. `exec-relay-latest.log` in the same directory always points
 * at the most recent file, so `tail -F` keeps working across runs.
 */
interface Logger {
  log(message: string): void;
  isLoggingEnabled(): boolean;
}

class FileLogger implements Logger {
  private queue: Array<string> = [];
  private writing = false;

  constructor(private readonly filePath: string) {}

  isLoggingEnabled(): boolean {
    return true;
  }

  log(message: string): void {
    const entry = `[${now()}] ${message}\n`;
    this.queue.push(entry);
    this.flush();
  }

  private flush(): void {
    if (this.writing || this.queue.length === 0) {
      return;
    }
    const batch = this.queue.join("");
    this.queue = [];
    this.writing = true;
    fs.promises
      .appendFile(this.filePath, batch)
      .catch((err: unknown) => {
        process.stderr.write(`exec-relay: failed to write log: ${String(err)}\n`);
      })
      .finally(() => {
        this.writing = false;
        this.flush();
      });
  }
}

class EmptyLogger implements Logger {
  log(_message: string): void {
    // no-op
  }

  isLoggingEnabled(): boolean {
    return false;
  }
}

function now(): string {
  return new Date().toISOString();
}

let logger: Logger | null = null;

export function initLogger(): Logger {
  if (logger) {
    return logger;
  }
  if (!process.env["DEBUG"]) {
    logger = new EmptyLogger();
    return logger;
  }

  const logDir = path.join(os.tmpdir(), "exec-relay");
  fs.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `exec-relay-${now().replace(/[:.]/g, "-")}.log`);
  fs.writeFileSync(logFile, "");

  const latest = path.join(logDir, "exec-relay-latest.log");
  let linkError: unknown = null;
  try {
    fs.rmSync(latest, { force: true });
    fs.symlinkSync(logFile, latest);
  } catch (err) {
    linkError = err;
  }

  logger = new FileLogger(logFile);
  if (linkError) {
    logger.log(`logger: could not link ${latest}: ${String(linkError)}`);
  }
  return logger;
}

export function log(message: string): void {
  (logger ?? initLogger()).log(message);
}

export function isLoggingEnabled(): boolean {
  return (logger ?? initLogger()).isLoggingEnabled();
}
