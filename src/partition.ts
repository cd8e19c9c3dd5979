import { classifyYear, type YearLabel } from "./classify/year";
import { decodeHeader } from "./mbox/decode_header";
import type { MboxReader } from "./mbox/reader";
import type { MboxWriter } from "./mbox/writer";
import { yieldToEventLoop } from "./utils/cli";

export type PartitionOptions = {
  signal?: AbortSignal;
  debug?: boolean;
  log?: (line: string) => void;
  /** Records between event-loop yields, which is where an abort is noticed. */
  yieldEvery?: number;
  onProgress?: (processed: number, matched: number) => void;
};

export type PartitionResult = {
  processed: number;
  matched: number;
};

/**
 * Copies every message whose Date header classifies as `targetYear` to `writer`,
 * in archive order and byte for byte. Messages with no usable date are skipped.
 * An aborted signal stops the run after the current message.
 */
export async function partitionWithProgress(
  reader: MboxReader,
  writer: MboxWriter,
  targetYear: YearLabel,
  options: PartitionOptions = {}
): Promise<PartitionResult> {
  const log = options.log ?? console.log;
  const yieldEvery = Math.max(1, options.yieldEvery ?? 500);
  const result: PartitionResult = { processed: 0, matched: 0 };

  for (const key of reader.keys()) {
    if (options.signal?.aborted) break;

    const message = reader.get(key);
    const date = decodeHeader(message.headers.get("date"));
    const year = classifyYear(date, { debug: options.debug, log });
    result.processed++;

    if (date && year === targetYear) {
      writer.append(message);
      result.matched++;
      if (options.debug && result.matched <= 5) log(`Matched: ${date} -> ${year}`);
    }

    if (result.processed % yieldEvery === 0) {
      options.onProgress?.(result.processed, result.matched);
      await yieldToEventLoop();
    }
  }

  return result;
}

/** Number of messages written. */
export async function partitionByYear(
  reader: MboxReader,
  writer: MboxWriter,
  targetYear: YearLabel,
  options: PartitionOptions = {}
): Promise<number> {
  const { matched } = await partitionWithProgress(reader, writer, targetYear, options);
  return matched;
}

export type SampleEntry = {
  subject: string;
  date: string;
  year: YearLabel | null;
};

/** Dry run over the first `sampleCount` messages, tracing each classification. Writes nothing. */
export function sampleClassifications(
  reader: MboxReader,
  sampleCount: number,
  log: (line: string) => void = console.log
): SampleEntry[] {
  const entries: SampleEntry[] = [];
  for (const key of reader.keys()) {
    if (entries.length >= sampleCount) break;
    const message = reader.get(key);
    const date = decodeHeader(message.headers.get("date"));
    const subject = decodeHeader(message.headers.get("subject"));

    log(`\nMessage ${entries.length + 1}:`);
    log(`  Subject: ${subject.slice(0, 50)}...`);
    log(`  Date header: ${date}`);
    const year = classifyYear(date, { debug: true, log });
    log(`  Extracted year: ${year ?? "None"}`);

    entries.push({ subject, date, year });
  }
  return entries;
}
