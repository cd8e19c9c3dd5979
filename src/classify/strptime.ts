export type ParsedFields = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"];
const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

// Longest alternatives first so "june" is not cut short by "jun".
function namesPattern(names: string[]): string {
  const all = new Set<string>();
  for (const n of names) {
    all.add(n);
    all.add(n.slice(0, 3));
  }
  return [...all].sort((a, b) => b.length - a.length).join("|");
}

type Directive = "a" | "b" | "d" | "m" | "Y" | "H" | "M" | "S";

const DIRECTIVES: Record<Directive, string> = {
  a: `(?<a>${namesPattern(WEEKDAYS)})`,
  b: `(?<b>${namesPattern(MONTHS)})`,
  d: "(?<d>3[01]|[12]\\d|0[1-9]|[1-9]| [1-9])",
  m: "(?<m>1[0-2]|0[1-9]|[1-9])",
  Y: "(?<Y>\\d\\d\\d\\d)",
  H: "(?<H>2[0-3]|[0-1]\\d|\\d)",
  M: "(?<M>[0-5]\\d|\\d)",
  S: "(?<S>6[0-1]|[0-5]\\d|\\d)"
};

function isDirective(c: string): c is Directive {
  return Object.prototype.hasOwnProperty.call(DIRECTIVES, c);
}

const compiled = new Map<string, RegExp>();

function compileLayout(layout: string): RegExp {
  const cached = compiled.get(layout);
  if (cached) return cached;

  let source = "";
  for (let i = 0; i < layout.length; i++) {
    const c = layout[i] ?? "";
    if (c === "%") {
      const d = layout[i + 1] ?? "";
      if (!isDirective(d)) throw new Error(`Unsupported directive %${d} in layout ${layout}`);
      source += DIRECTIVES[d];
      i++;
    } else if (/\s/.test(c)) {
      while (/\s/.test(layout[i + 1] ?? "")) i++;
      source += "\\s+";
    } else {
      source += c.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    }
  }

  const re = new RegExp(`^(?:${source})$`, "i");
  compiled.set(layout, re);
  return re;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function monthFromName(name: string): number {
  const prefix = name.slice(0, 3).toLowerCase();
  return MONTHS.findIndex((m) => m.startsWith(prefix)) + 1;
}

/**
 * Matches `text` in full against a layout made of the directives
 * `%a %b %d %m %Y %H %M %S`. Returns null when the text does not fit the layout
 * or names a date that does not exist (e.g. 30 Feb, year 0).
 */
export function strptime(text: string, layout: string): ParsedFields | null {
  const groups = compileLayout(layout).exec(text)?.groups;
  if (!groups) return null;

  const num = (key: Directive, fallback: number) => {
    const v = groups[key];
    return v === undefined ? fallback : Number(v.trim());
  };

  const year = num("Y", 1900);
  const month = groups.b !== undefined ? monthFromName(groups.b) : num("m", 1);
  const day = num("d", 1);
  if (year < 1 || month < 1 || day > daysInMonth(year, month)) return null;

  return {
    year,
    month,
    day,
    hour: num("H", 0),
    minute: num("M", 0),
    second: num("S", 0)
  };
}
