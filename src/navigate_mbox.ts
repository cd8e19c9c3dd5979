#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import readline from "node:readline";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { NavigatorSession } from "./index/session";
import { MboxReader } from "./mbox/reader";
import { dispatch, type CommandContext } from "./navigator/commands";
import { toErrorMessage } from "./utils/cli";

dotenv.config();

const PROMPT = "(mbox) ";

async function runNavigator(mboxFile: string): Promise<void> {
  const config = loadConfig();
  const mboxPath = path.resolve(mboxFile);

  try {
    await fs.access(mboxPath);
  } catch {
    throw new Error(`File not found: ${mboxFile}`);
  }

  const reader = MboxReader.open(mboxPath, { chunkSize: config.readChunkBytes });
  let rl: readline.Interface | null = null;

  try {
    console.log("Indexing… (this may take a minute on very large files)");
    const session = NavigatorSession.open(reader, {
      onProgress: (n) => console.log(`[index] ${n.toLocaleString("en-US")} messages`),
      progressEvery: 10000
    });
    console.log(`Loaded ${session.rows.length.toLocaleString("en-US")} messages from ${mboxPath}\n`);
    console.log("Type 'help' for command list, 'quit' to exit\n");

    const ctx: CommandContext = { session, config, out: (line) => console.log(line) };

    // Created after indexing so that an interrupt during the build simply ends the process.
    const prompt = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });
    rl = prompt;
    let interrupted = false;
    prompt.on("SIGINT", () => {
      interrupted = true;
      prompt.close();
    });

    prompt.prompt();
    for await (const line of prompt) {
      if ((await dispatch(ctx, line)) === "quit") break;
      prompt.prompt();
    }
    if (interrupted) console.log("\nInterrupted. Bye!");
  } finally {
    rl?.close();
    reader.close();
  }
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name("navigate_mbox")
    .description("Navigate a .mbox file interactively")
    .argument("<mbox_file>", "Path to the mbox file");

  program.parse(process.argv);
  const [mboxFile = ""] = program.args;
  await runNavigator(mboxFile);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(toErrorMessage(err));
    process.exitCode = 1;
  });
}
