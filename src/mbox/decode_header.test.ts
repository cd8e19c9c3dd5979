import { describe, it, expect } from "vitest";
import { decodeHeader, decodeHeaderSet } from "./decode_header";

describe("decodeHeader", () => {
  it("returns empty string for absent input", () => {
    expect(decodeHeader(undefined)).toBe("");
    expect(decodeHeader(null)).toBe("");
  });

  it("leaves plain text alone", () => {
    expect(decodeHeader("Quarterly report")).toBe("Quarterly report");
  });

  it("decodes base64 encoded words", () => {
    expect(decodeHeader("=?UTF-8?B?SGVsbG8gV29ybGQ=?=")).toBe("Hello World");
  });

  it("decodes quoted-printable encoded words", () => {
    expect(decodeHeader("=?ISO-8859-1?Q?Caf=E9_au_lait?=")).toBe("Café au lait");
  });
});

describe("decodeHeaderSet", () => {
  it("fills missing headers with empty strings", () => {
    const set = decodeHeaderSet(new Map([["subject", "=?UTF-8?B?SGVsbG8gV29ybGQ=?="]]));
    expect(set).toEqual({ from: "", to: "", cc: "", date: "", subject: "Hello World" });
  });
});
