import process from "node:process";
import { z } from "zod";

function envNumber(defaultValue: number, min: number) {
  return z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.coerce.number().int().min(min).default(defaultValue)
  );
}

const envSchema = z.object({
  MBOX_PAGE_SIZE: envNumber(20, 1),
  MBOX_SEARCH_LIMIT: envNumber(100, 1),
  MBOX_READ_CHUNK_BYTES: envNumber(4 * 1024 * 1024, 1024),
  MBOX_TERMINAL_WIDTH: envNumber(process.stdout.columns || 120, 40)
});

export type AppConfig = {
  pageSize: number;
  searchLimit: number;
  readChunkBytes: number;
  terminalWidth: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return {
    pageSize: parsed.data.MBOX_PAGE_SIZE,
    searchLimit: parsed.data.MBOX_SEARCH_LIMIT,
    readChunkBytes: parsed.data.MBOX_READ_CHUNK_BYTES,
    terminalWidth: parsed.data.MBOX_TERMINAL_WIDTH
  };
}
