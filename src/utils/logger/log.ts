import * as fsSync from "fs";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

const LOG_NAME = "tty-textarea";

/**
 * Appends queued lines to the session log file, one write in flight at a
 * time. A `null` path means logging is off and every call is dropped.
 */
class LogSink {
  private pending: Array<string> = [];
  private writing = false;

  constructor(private readonly filePath: string | null) {}

  get enabled(): boolean {
    return this.filePath !== null;
  }

  write(message: string): void {
    if (this.filePath === null) {
      return;
    }
    this.pending.push(`[${timestamp()}] ${message}\n`);
    this.drain(this.filePath).catch((err: unknown) => {
      process.emitWarning(
        `${LOG_NAME}: failed to write log file ${this.filePath}: ${String(err)}`,
      );
    });
  }

  private async drain(filePath: string): Promise<void> {
    while (!this.writing && this.pending.length > 0) {
      this.writing = true;
      const chunk = this.pending.join("");
      this.pending = [];
      try {
        await fs.appendFile(filePath, chunk);
      } finally {
        this.writing = false;
      }
    }
  }
}

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
    `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

// os.tmpdir() is per-user on Mac and Windows; on Linux stay out of /tmp.
function logDirectory(): string {
  return process.platform === "darwin" || process.platform === "win32"
    ? path.join(os.tmpdir(), LOG_NAME)
    : path.join(os.homedir(), ".local", LOG_NAME);
}

function openSessionLog(): string {
  const dir = logDirectory();
  fsSync.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, `${LOG_NAME}-${timestamp()}.log`);
  fsSync.writeFileSync(file, "");

  if (process.platform !== "win32") {
    const latest = path.join(dir, `${LOG_NAME}-latest.log`);
    fsSync.rmSync(latest, { force: true });
    fsSync.symlinkSync(file, latest, "file");
  }
  return file;
}

let sink: LogSink | undefined;

/**
 * Opens the session log when `DEBUG` is set and points
 * `tty-textarea-latest.log` at it, so `tail -F` keeps following new sessions.
 * Idempotent; `log()` calls it on first use.
 */
export function initLogger(): void {
  if (sink === undefined) {
    sink = new LogSink(process.env["DEBUG"] ? openSessionLog() : null);
  }
}

export function log(message: string): void {
  initLogger();
  sink?.write(message);
}

/** Guard for messages that are expensive to build. */
export function isLoggingEnabled(): boolean {
  initLogger();
  return sink?.enabled ?? false;
}
