import { createWriteStream, existsSync, mkdirSync, type WriteStream } from "node:fs";
import { dirname, join, resolve } from "node:path";

/**
 * Line-oriented append stream. Open and write errors are kept rather than
 * thrown from the stream: `error` exposes the first one and `close()`
 * rejects with it.
 */
export class AppendFile {
  readonly path: string;
  // the file did not exist before this writer opened it
  readonly isNew: boolean;
  private readonly stream: WriteStream;
  private failure: Error | undefined;

  constructor(path: string) {
    this.path = resolve(path);
    mkdirSync(dirname(this.path), { recursive: true });
    this.isNew = !existsSync(this.path);
    this.stream = createWriteStream(this.path, { flags: "a" });
    this.stream.on("error", (error) => {
      this.failure ??= error;
    });
  }

  get error(): Error | undefined {
    return this.failure;
  }

  // Dropped once the file has failed
  writeLine(line: string): void {
    if (!this.failure) {
      this.stream.write(`${line}\n`);
    }
  }

  close(): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolvePromise, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => {
        if (this.failure) {
          reject(this.failure);
        } else {
          resolvePromise();
        }
      });
    });
  }
}

// <logDir>/<logName>-20260102T030405Z.log: one file per run
export function runLogPath(logDir: string, logName: string, startedAt: Date = new Date()): string {
  const stamp = startedAt.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return join(resolve(logDir), `${logName}-${stamp}.log`);
}
