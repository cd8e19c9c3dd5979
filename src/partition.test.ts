import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { partitionByYear, partitionWithProgress, sampleClassifications } from "./partition";
import { MboxReader } from "./mbox/reader";
import { MboxWriter, withLockedWriter } from "./mbox/writer";
import { makeTempDir, mboxText, writeMbox, type FixtureMessage } from "./testing/mbox_fixture";

const ARCHIVE: FixtureMessage[] = [
  { subject: "m0", date: "Mon, 04 Jan 2020 09:00:00 +0000" },
  { subject: "m1", date: "Tue, 02 Feb 2021 10:00:00 +0000" },
  { subject: "m2", date: "no date info here" },
  { subject: "m3" },
  { subject: "m4", date: "garbled-2021-xx" },
  { subject: "m5", date: "Sun, 01 Jan 2022 00:00:00 +0000" },
  { subject: "m6", date: "=?UTF-8?B?MjAxOQ==?=" },
  { subject: "m7", date: "31 Dec 2021" },
  { subject: "m8", date: "Thu, 05 Mar 1885 10:20:30 +0000", body: "Quoted:\n>From the archives\nold news" },
  { subject: "m9", date: "1999-12-31" }
];

describe("partitionByYear", () => {
  let dir: string;
  let source: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    source = await writeMbox(dir, "source.mbox", ARCHIVE);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function split(year: string, output: string): Promise<number> {
    const reader = MboxReader.open(source);
    try {
      return await withLockedWriter(output, (writer) => partitionByYear(reader, writer, year, { log: () => {} }));
    } finally {
      reader.close();
    }
  }

  it("copies the matching messages in archive order", async () => {
    const output = path.join(dir, "2021.mbox");
    expect(await split("2021", output)).toBe(3);
    expect(fs.readFileSync(output, "utf8")).toBe(mboxText([ARCHIVE[1] ?? {}, ARCHIVE[4] ?? {}, ARCHIVE[7] ?? {}]));
  });

  it("classifies encoded Date headers after decoding them", async () => {
    const output = path.join(dir, "2019.mbox");
    expect(await split("2019", output)).toBe(1);
    expect(fs.readFileSync(output, "utf8")).toContain("Subject: m6\n");
  });

  it("writes an empty archive when nothing matches", async () => {
    const output = path.join(dir, "1950.mbox");
    expect(await split("1950", output)).toBe(0);
    expect(fs.readFileSync(output, "utf8")).toBe("");
  });

  it("produces byte-identical output when re-run", async () => {
    const output = path.join(dir, "1885.mbox");
    expect(await split("1885", output)).toBe(1);
    const first = fs.readFileSync(output);
    expect(await split("1885", output)).toBe(1);
    expect(fs.readFileSync(output).equals(first)).toBe(true);
    expect(first.toString("utf8")).toBe(mboxText([ARCHIVE[8] ?? {}]));
  });

  it("stops at an aborted signal and leaves a closed, unlocked file", async () => {
    const output = path.join(dir, "aborted.mbox");
    const controller = new AbortController();
    controller.abort();
    const reader = MboxReader.open(source);
    try {
      const result = await withLockedWriter(output, (writer) =>
        partitionWithProgress(reader, writer, "2021", { signal: controller.signal })
      );
      expect(result).toEqual({ processed: 0, matched: 0 });
    } finally {
      reader.close();
    }
    expect(fs.existsSync(`${output}.lock`)).toBe(false);
    expect(fs.readFileSync(output, "utf8")).toBe("");
  });

  it("reports progress and debug matches", async () => {
    const lines: string[] = [];
    const progress: Array<[number, number]> = [];
    const reader = MboxReader.open(source);
    const writer = MboxWriter.open(path.join(dir, "debug.mbox"), { truncate: true });
    try {
      await partitionWithProgress(reader, writer, "2021", {
        debug: true,
        log: (l) => lines.push(l),
        yieldEvery: 4,
        onProgress: (p, m) => progress.push([p, m])
      });
    } finally {
      writer.close();
      reader.close();
    }
    expect(progress).toEqual([
      [4, 1],
      [8, 3]
    ]);
    expect(lines.filter((l) => l.startsWith("Matched:"))).toEqual([
      "Matched: Tue, 02 Feb 2021 10:00:00 +0000 -> 2021",
      "Matched: garbled-2021-xx -> 2021",
      "Matched: 31 Dec 2021 -> 2021"
    ]);
  });
});

describe("sampleClassifications", () => {
  it("traces the first messages without writing anything", async () => {
    const dir = await makeTempDir();
    try {
      const source = await writeMbox(dir, "source.mbox", ARCHIVE);
      const reader = MboxReader.open(source);
      const lines: string[] = [];
      try {
        const entries = sampleClassifications(reader, 3, (l) => lines.push(l));
        expect(entries).toEqual([
          { subject: "m0", date: "Mon, 04 Jan 2020 09:00:00 +0000", year: "2020" },
          { subject: "m1", date: "Tue, 02 Feb 2021 10:00:00 +0000", year: "2021" },
          { subject: "m2", date: "no date info here", year: null }
        ]);
      } finally {
        reader.close();
      }
      expect(lines.slice(0, 6)).toEqual([
        "\nMessage 1:",
        "  Subject: m0...",
        "  Date header: Mon, 04 Jan 2020 09:00:00 +0000",
        "Parsing date: Mon, 04 Jan 2020 09:00:00 +0000",
        "  Found year via regex: 2020",
        "  Extracted year: 2020"
      ]);
      expect(fs.readdirSync(dir)).toEqual(["source.mbox"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
