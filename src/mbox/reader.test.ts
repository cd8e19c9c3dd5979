import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MboxReader } from "./reader";
import { MessageNotFoundError } from "../errors";
import { makeTempDir, mboxText, messageText, writeMbox } from "../testing/mbox_fixture";

const MESSAGES = [
  { from: "alice@example.com", subject: "first", body: "hello" },
  { from: "bob@example.org", subject: "second", body: "line one\n\nline two" },
  { from: "carol@example.net", subject: "third", body: "bye" }
];

describe("MboxReader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("enumerates keys in file order and reads each message", async () => {
    const file = await writeMbox(dir, "a.mbox", MESSAGES);
    const reader = MboxReader.open(file);
    try {
      const keys = [...reader.keys()];
      expect(keys).toEqual([0, 1, 2]);
      const second = reader.get(1);
      expect(second.envelope).toBe("From sender@example.com Mon Jan  1 00:00:00 2024");
      expect(second.raw.toString()).toBe(messageText(MESSAGES[1] ?? {}));
      expect(second.headers.get("subject")).toBe("second");
    } finally {
      reader.close();
    }
  });

  it("finds the same boundaries when markers straddle chunk edges", async () => {
    const file = await writeMbox(dir, "a.mbox", MESSAGES);
    for (const chunkSize of [6, 7, 11, 64]) {
      const reader = MboxReader.open(file, { chunkSize });
      try {
        const subjects = [...reader.keys()].map((k) => reader.get(k).headers.get("subject"));
        expect(subjects).toEqual(["first", "second", "third"]);
      } finally {
        reader.close();
      }
    }
  });

  it("ignores content before the first envelope line", async () => {
    const file = path.join(dir, "junk.mbox");
    await fs.writeFile(file, `stray preamble\n\n${mboxText(MESSAGES.slice(0, 1))}`);
    const reader = MboxReader.open(file);
    try {
      expect([...reader.keys()]).toEqual([0]);
      expect(reader.get(0).headers.get("subject")).toBe("first");
    } finally {
      reader.close();
    }
  });

  it("yields nothing for an empty file", async () => {
    const file = path.join(dir, "empty.mbox");
    await fs.writeFile(file, "");
    const reader = MboxReader.open(file);
    try {
      expect([...reader.keys()]).toEqual([]);
      expect(reader.size()).toBe(0);
    } finally {
      reader.close();
    }
  });

  it("rejects keys it has not handed out", async () => {
    const file = await writeMbox(dir, "a.mbox", MESSAGES);
    const reader = MboxReader.open(file);
    try {
      expect(() => reader.get(0)).toThrow(MessageNotFoundError);
      [...reader.keys()];
      expect(() => reader.get(3)).toThrow(MessageNotFoundError);
      expect(() => reader.get(-1)).toThrow(MessageNotFoundError);
    } finally {
      reader.close();
    }
  });

  it("lets a second key sequence reuse the first scan", async () => {
    const file = await writeMbox(dir, "a.mbox", MESSAGES);
    const reader = MboxReader.open(file, { chunkSize: 16 });
    try {
      const first = reader.keys();
      expect(first.next().value).toBe(0);
      expect([...reader.keys()]).toEqual([0, 1, 2]);
      expect([...first]).toEqual([1, 2]);
    } finally {
      reader.close();
    }
  });
});
