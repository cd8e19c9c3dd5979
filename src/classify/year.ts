import { strptime } from "./strptime";

export type YearLabel = string;

export type YearStrategy = (dateText: string) => YearLabel | null;

export type ClassifyOptions = {
  debug?: boolean;
  log?: (line: string) => void;
};

export const STRUCTURED_LAYOUTS: readonly string[] = [
  "%a, %d %b %Y",
  "%d %b %Y",
  "%b %d %Y",
  "%Y-%m-%d",
  "%a, %d %b %Y %H:%M:%S",
  "%a %b %d %H:%M:%S %Y",
  "%d %b %Y %H:%M:%S"
];

// Prefix lengths cut off trailing zones and comments the layouts do not describe.
const PREFIX_LENGTHS = [25, 30];

export const scanYear: YearStrategy = (dateText) => {
  for (const pattern of [/20\d\d/, /19\d\d/]) {
    const m = pattern.exec(dateText);
    if (m) return m[0];
  }
  return null;
};

export const parseStructuredYear: YearStrategy = (dateText) => {
  for (const layout of STRUCTURED_LAYOUTS) {
    for (const length of [...PREFIX_LENGTHS, dateText.length]) {
      const parsed = strptime(dateText.slice(0, length), layout);
      if (parsed) return String(parsed.year).padStart(4, "0");
    }
  }
  return null;
};

export const bareYearToken: YearStrategy = (dateText) => {
  for (const word of dateText.split(/\s+/)) {
    if (/^\d{4}$/.test(word)) return word;
  }
  return null;
};

const STRATEGIES: ReadonlyArray<[string, YearStrategy]> = [
  ["regex", scanYear],
  ["structured parse", parseStructuredYear],
  ["bare token", bareYearToken]
];

/**
 * Best-effort year of a Date header. Strategies run cheapest first and the
 * first label wins; null means "unknown", never an error.
 */
export function classifyYear(dateText: string, options: ClassifyOptions = {}): YearLabel | null {
  const log = options.debug ? (options.log ?? console.log) : undefined;
  if (!dateText) return null;

  log?.(`Parsing date: ${dateText}`);
  for (const [name, strategy] of STRATEGIES) {
    const year = strategy(dateText);
    if (year != null) {
      log?.(`  Found year via ${name}: ${year}`);
      return year;
    }
  }

  log?.("  Failed to parse date");
  return null;
}
