import fs from "node:fs";
import type { RawHeaders } from "./decode_header";
import { parseHeaderBlock } from "./headers";
import { MessageNotFoundError } from "../errors";

export type MessageKey = number;

export type MboxMessage = {
  key: MessageKey;
  /** The `From ` envelope line, without its line ending. */
  envelope: string;
  /** Message bytes after the envelope line, separator blank line removed. */
  raw: Buffer;
  headers: RawHeaders;
};

export type MboxReaderOptions = {
  chunkSize?: number;
};

const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;
const MARKER = Buffer.from("\nFrom ");
const LEADING_MARKER = Buffer.from("From ");

function trimSeparator(buf: Buffer): Buffer {
  const n = buf.length;
  if (n >= 4 && buf.subarray(n - 4).equals(Buffer.from("\r\n\r\n"))) return buf.subarray(0, n - 2);
  if (n >= 2 && buf[n - 1] === 0x0a && buf[n - 2] === 0x0a) return buf.subarray(0, n - 1);
  return buf;
}

/**
 * Sequential reader over a Unix mbox file. Every line starting with `From ` opens a
 * new message; only message start offsets are kept in memory, so key enumeration
 * costs one scan of the file in fixed-size chunks.
 */
export class MboxReader {
  private fd: number | null;
  private readonly fileSize: number;
  private readonly chunkSize: number;
  private readonly starts: number[] = [];
  private scanPos = 0;
  private overlap: Buffer = Buffer.alloc(0);
  private scanDone = false;

  private constructor(
    readonly path: string,
    fd: number,
    options: MboxReaderOptions
  ) {
    this.fd = fd;
    this.fileSize = fs.fstatSync(fd).size;
    this.chunkSize = Math.max(MARKER.length, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  static open(filePath: string, options: MboxReaderOptions = {}): MboxReader {
    return new MboxReader(filePath, fs.openSync(filePath, "r"), options);
  }

  size(): number {
    return this.fileSize;
  }

  /** Keys in file order. A key is yielded once the extent of its message is known. */
  *keys(): Generator<MessageKey> {
    let next = 0;
    while (true) {
      while (next >= this.completedCount() && !this.scanDone) this.scanChunk();
      if (next >= this.completedCount()) return;
      yield next++;
    }
  }

  get(key: MessageKey): MboxMessage {
    if (!Number.isInteger(key) || key < 0 || key >= this.completedCount()) {
      throw new MessageNotFoundError(key);
    }
    const start = this.starts[key] ?? 0;
    const end = this.starts[key + 1] ?? this.fileSize;
    const bytes = this.readRange(start, end);

    const eol = bytes.indexOf(0x0a);
    const envelopeBytes = eol === -1 ? bytes : bytes.subarray(0, eol);
    const raw = eol === -1 ? Buffer.alloc(0) : trimSeparator(bytes.subarray(eol + 1));

    return {
      key,
      envelope: envelopeBytes.toString("latin1").replace(/\r$/, ""),
      raw,
      headers: parseHeaderBlock(raw)
    };
  }

  close(): void {
    if (this.fd == null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }

  private completedCount(): number {
    return this.scanDone ? this.starts.length : Math.max(0, this.starts.length - 1);
  }

  private handle(): number {
    if (this.fd == null) throw new Error(`Mailbox ${this.path} is closed`);
    return this.fd;
  }

  private readRange(start: number, end: number): Buffer {
    const buf = Buffer.alloc(end - start);
    let filled = 0;
    while (filled < buf.length) {
      const n = fs.readSync(this.handle(), buf, filled, buf.length - filled, start + filled);
      if (n === 0) break;
      filled += n;
    }
    return buf.subarray(0, filled);
  }

  private scanChunk(): void {
    if (this.scanPos >= this.fileSize) {
      this.scanDone = true;
      return;
    }

    const chunk = this.readRange(this.scanPos, Math.min(this.fileSize, this.scanPos + this.chunkSize));
    if (this.scanPos === 0 && chunk.subarray(0, LEADING_MARKER.length).equals(LEADING_MARKER)) {
      this.starts.push(0);
    }

    const scanBuf = this.overlap.length > 0 ? Buffer.concat([this.overlap, chunk]) : chunk;
    const base = this.scanPos - this.overlap.length;
    let idx = scanBuf.indexOf(MARKER);
    while (idx !== -1) {
      this.starts.push(base + idx + 1);
      idx = scanBuf.indexOf(MARKER, idx + 1);
    }

    // Keep enough tail bytes to catch a marker split across chunks, but never a full one.
    this.overlap = Buffer.from(scanBuf.subarray(Math.max(0, scanBuf.length - (MARKER.length - 1))));
    this.scanPos += chunk.length;
    if (chunk.length === 0 || this.scanPos >= this.fileSize) this.scanDone = true;
  }
}
