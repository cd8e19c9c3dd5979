import { simpleParser } from "mailparser";

export const NO_PLAIN_TEXT = "[No plain-text body found]";

// mailparser picks the first inline text/plain part; HTML-only messages yield no text.
export async function extractPlainText(raw: Buffer): Promise<string> {
  const parsed = await simpleParser(raw, { skipHtmlToText: true });
  const text = parsed.text ?? "";
  return text.trim() ? text : NO_PLAIN_TEXT;
}
