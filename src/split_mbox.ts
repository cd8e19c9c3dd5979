#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { MboxReader } from "./mbox/reader";
import { withLockedWriter } from "./mbox/writer";
import { partitionWithProgress, sampleClassifications } from "./partition";
import { parseBooleanFlag, toErrorMessage } from "./utils/cli";

dotenv.config();

type SplitOptions = {
  source: string;
  year: string;
  output: string;
  debug?: boolean;
  sample?: number;
  signal?: AbortSignal;
  log?: (line: string) => void;
};

type SplitSummary = {
  total: number;
  processed: number;
  matched: number;
  interrupted: boolean;
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function countMessages(reader: MboxReader): number {
  let total = 0;
  for (const _key of reader.keys()) total++;
  return total;
}

export async function runSplitMbox(options: SplitOptions): Promise<SplitSummary> {
  const log = options.log ?? console.log;
  const config = loadConfig();
  const source = path.resolve(options.source);
  const output = path.resolve(options.output);
  const sample = options.sample ?? 0;

  if (!(await fileExists(source))) {
    throw new Error(`Source file '${options.source}' not found.`);
  }
  await fs.rm(output, { force: true });

  const summary: SplitSummary = { total: 0, processed: 0, matched: 0, interrupted: false };
  const reader = MboxReader.open(source, { chunkSize: config.readChunkBytes });

  try {
    summary.total = countMessages(reader);
    log(`Processing ${summary.total} messages...`);

    if (sample > 0) {
      const sampleCount = Math.min(sample, summary.total);
      log(`\nSAMPLE MODE: Showing date parsing for ${sampleCount} messages`);
      summary.processed = sampleClassifications(reader, sampleCount, log).length;
    } else {
      const result = await withLockedWriter(output, (writer) =>
        partitionWithProgress(reader, writer, options.year, {
          signal: options.signal,
          debug: options.debug,
          log
        })
      );
      summary.processed = result.processed;
      summary.matched = result.matched;
      summary.interrupted = Boolean(options.signal?.aborted);

      if (summary.interrupted) log("\nOperation interrupted by user");
      log(`Processed ${summary.processed} messages`);
      log(`Extracted ${summary.matched} messages from year ${options.year} to ${options.output}`);
    }
  } finally {
    reader.close();
  }

  log("Done.");
  return summary;
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name("split_mbox")
    .description("Copy the messages of one year from an mbox file into a new mbox file.")
    .argument("<source>", "Source mbox file")
    .argument("<year>", "Year to filter by, e.g. 2024")
    .argument("<output>", "Output mbox file (replaced if it exists)")
    .option("--debug [value]", "Show date parsing details", "0")
    .option("--sample <n>", "Show date parsing for the first N messages without writing output", "0");

  program.parse(process.argv);
  const [source = "", year = "", output = ""] = program.args;
  const opts = program.opts<{ debug: string | boolean; sample: string }>();

  const sample = Number(opts.sample);
  if (!Number.isInteger(sample) || sample < 0) {
    throw new Error(`--sample expects a non-negative integer, got '${opts.sample}'`);
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on("SIGINT", onSigint);

  try {
    await runSplitMbox({
      source,
      year: year.trim(),
      output,
      debug: parseBooleanFlag(opts.debug),
      sample,
      signal: controller.signal
    });
  } finally {
    process.off("SIGINT", onSigint);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(`Error: ${toErrorMessage(err)}`);
    process.exitCode = 1;
  });
}
