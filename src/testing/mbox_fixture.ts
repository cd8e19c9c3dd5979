import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export type FixtureMessage = {
  envelope?: string;
  from?: string;
  to?: string;
  date?: string;
  subject?: string;
  body?: string;
};

export function messageText(m: FixtureMessage): string {
  const headers: string[] = [];
  if (m.from !== undefined) headers.push(`From: ${m.from}`);
  if (m.to !== undefined) headers.push(`To: ${m.to}`);
  if (m.date !== undefined) headers.push(`Date: ${m.date}`);
  if (m.subject !== undefined) headers.push(`Subject: ${m.subject}`);
  return `${headers.join("\n")}\n\n${m.body ?? "Body"}\n`;
}

export function mboxText(messages: FixtureMessage[]): string {
  return messages
    .map((m) => `From ${m.envelope ?? "sender@example.com Mon Jan  1 00:00:00 2024"}\n${messageText(m)}\n`)
    .join("");
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "mbox-test-"));
}

export async function writeMbox(dir: string, name: string, messages: FixtureMessage[]): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, mboxText(messages));
  return filePath;
}
