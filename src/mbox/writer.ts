import fs from "node:fs";
import process from "node:process";
import type { MboxMessage } from "./reader";
import { MailboxLockedError } from "../errors";

export type MboxWriterOptions = {
  /** Start from an empty file instead of appending to existing content. */
  truncate?: boolean;
};

// Body lines that would read as a new envelope are quoted (mboxo style).
function quoteFromLines(raw: Buffer): Buffer {
  const text = raw.toString("latin1");
  if (!/^From /m.test(text)) return raw;
  return Buffer.from(text.replace(/^From /gm, ">From "), "latin1");
}

export class MboxWriter {
  private fd: number | null;
  private locked = false;

  private constructor(
    readonly path: string,
    fd: number
  ) {
    this.fd = fd;
  }

  static open(filePath: string, options: MboxWriterOptions = {}): MboxWriter {
    return new MboxWriter(filePath, fs.openSync(filePath, options.truncate ? "w" : "a"));
  }

  get lockPath(): string {
    return `${this.path}.lock`;
  }

  lock(): void {
    if (this.locked) return;
    let lockFd: number;
    try {
      lockFd = fs.openSync(this.lockPath, "wx");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw new MailboxLockedError(this.lockPath);
      }
      throw err;
    }
    fs.writeSync(lockFd, `${process.pid}\n`);
    fs.closeSync(lockFd);
    this.locked = true;
  }

  /** Empties the file; appends then start again from the beginning. */
  truncate(): void {
    fs.ftruncateSync(this.handle(), 0);
  }

  unlock(): void {
    if (!this.locked) return;
    this.locked = false;
    fs.rmSync(this.lockPath, { force: true });
  }

  append(message: Pick<MboxMessage, "envelope" | "raw">): void {
    const fd = this.handle();
    const envelope = message.envelope.startsWith("From ") ? message.envelope : `From ${message.envelope}`;
    const body = quoteFromLines(message.raw);

    fs.writeSync(fd, Buffer.from(`${envelope}\n`, "latin1"));
    fs.writeSync(fd, body);
    const endsWithNewline = body.length === 0 || body[body.length - 1] === 0x0a;
    fs.writeSync(fd, endsWithNewline ? "\n" : "\n\n");
  }

  close(): void {
    if (this.fd == null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }

  private handle(): number {
    if (this.fd == null) throw new Error(`Mailbox ${this.path} is closed`);
    return this.fd;
  }
}

/**
 * Takes the dot-lock on `filePath`, empties the file and runs `fn`. A mailbox locked
 * by someone else is left untouched. The lock is released
 * and the file closed on every exit path, so an interrupted run leaves a valid partial
 * archive and no stale lock.
 */
export async function withLockedWriter<T>(
  filePath: string,
  fn: (writer: MboxWriter) => Promise<T>
): Promise<T> {
  const writer = MboxWriter.open(filePath);
  try {
    writer.lock();
    writer.truncate();
    return await fn(writer);
  } finally {
    try {
      writer.unlock();
    } finally {
      writer.close();
    }
  }
}
