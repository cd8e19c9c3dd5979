import { z } from "zod";
import type { AppConfig } from "../config";
import { LookupError } from "../errors";
import { decodeHeaderSet } from "../mbox/decode_header";
import { SORT_FIELDS, type Page, type SortField } from "../index/query";
import { DISPLAY_COLUMNS, type NavigatorSession } from "../index/session";
import { extractPlainText } from "./body";
import { renderTable, wrapText } from "./table";
import { parseCount } from "../utils/cli";

export type CommandName = "ls" | "next" | "prev" | "cols" | "show" | "search" | "save" | "sort" | "info" | "help" | "quit";

export type CommandOutcome = "continue" | "quit";

export type CommandContext = {
  session: NavigatorSession;
  config: AppConfig;
  out: (line: string) => void;
};

type CommandSpec = {
  usage: string;
  summary: string;
  run: (ctx: CommandContext, arg: string) => Promise<CommandOutcome> | CommandOutcome;
};

const positionArg = z.string().trim().regex(/^\d+$/).transform(Number);

const saveArgs = z
  .string()
  .trim()
  .transform((s) => s.split(/\s+/))
  .pipe(z.tuple([positionArg, z.string().min(1)]));

const sortArgs = z
  .string()
  .trim()
  .transform((s) => s.split(/\s+/).filter(Boolean))
  .pipe(z.tuple([z.enum(["from", "date", "subject"])]).rest(z.string()));

function printPage(ctx: CommandContext, result: Page): void {
  const { session, config, out } = ctx;
  if (result.rows.length === 0) {
    out("No messages to show.");
    return;
  }
  out(`\nMessages ${result.start} to ${result.end - 1}`);
  const rows = result.rows.map((row, i) => ({ position: result.start + i, row }));
  for (const line of renderTable(rows, session.displayColumns, config.terminalWidth)) out(line);
}

function listCommand(ctx: CommandContext, arg: string): CommandOutcome {
  printPage(ctx, ctx.session.list(parseCount(arg, ctx.config.pageSize)));
  return "continue";
}

export const COMMANDS: Record<CommandName, CommandSpec> = {
  ls: {
    usage: "ls [N]",
    summary: "list the next N messages (default page size)",
    run: listCommand
  },
  next: {
    usage: "next [N]",
    summary: "alias for ls",
    run: listCommand
  },
  prev: {
    usage: "prev [N]",
    summary: "page backward by N",
    run: (ctx, arg) => {
      printPage(ctx, ctx.session.pageBackward(parseCount(arg, ctx.config.pageSize)));
      return "continue";
    }
  },
  cols: {
    usage: "cols <col1,col2,...>",
    summary: `set columns to display (${DISPLAY_COLUMNS.join(",")})`,
    run: (ctx, arg) => {
      const { session, out } = ctx;
      if (!arg.trim()) {
        out(`Current display columns: ${session.displayColumns.join(",")}`);
        out(`Available columns: ${DISPLAY_COLUMNS.join(",")}`);
        return "continue";
      }
      const columns = session.setDisplayColumns(arg.split(","));
      if (!columns) {
        out(`No valid columns specified. Available columns: ${DISPLAY_COLUMNS.join(",")}`);
        return "continue";
      }
      out(`Display columns set to: ${columns.join(",")}`);
      return listCommand(ctx, "");
    }
  },
  show: {
    usage: "show <index>",
    summary: "display full message at that index",
    run: async (ctx, arg): Promise<CommandOutcome> => {
      const { session, config, out } = ctx;
      const idx = positionArg.safeParse(arg);
      if (!idx.success) {
        out("Usage: show <index>");
        return "continue";
      }
      const message = session.fetch(idx.data);
      const headers = decodeHeaderSet(message.headers);
      const rule = "=".repeat(config.terminalWidth);
      out(rule);
      out(`From: ${headers.from}`);
      out(`To: ${headers.to}`);
      out(`Cc: ${headers.cc}`);
      out(`Date: ${headers.date}`);
      out(`Subject: ${headers.subject}`);
      out("-".repeat(config.terminalWidth));
      for (const line of wrapText(await extractPlainText(message.raw), config.terminalWidth)) out(line);
      out(rule);
      return "continue";
    }
  },
  search: {
    usage: "search <text>",
    summary: "case-insensitive search in From / Subject",
    run: (ctx, arg) => {
      const { session, config, out } = ctx;
      const result = session.search(arg, config.searchLimit);
      if (!result) {
        out("search <text>");
        return "continue";
      }
      if (result.total === 0) {
        out("No matches found");
        return "continue";
      }
      out(`\nFound ${result.total} matches (showing first ${result.matches.length})`);
      for (const line of renderTable(result.matches, session.displayColumns, config.terminalWidth)) out(line);
      return "continue";
    }
  },
  save: {
    usage: "save <index> <outfile.eml>",
    summary: "save raw message to disk",
    run: async (ctx, arg): Promise<CommandOutcome> => {
      const parsed = saveArgs.safeParse(arg);
      if (!parsed.success) {
        ctx.out("Usage: save <index> <outfile.eml>");
        return "continue";
      }
      const [idx, outFile] = parsed.data;
      await ctx.session.save(idx, outFile);
      ctx.out(`Saved → ${outFile}`);
      return "continue";
    }
  },
  sort: {
    usage: "sort <field> [desc]",
    summary: `sort by field (${SORT_FIELDS.join("/")}), optionally descending`,
    run: (ctx, arg) => {
      const parsed = sortArgs.safeParse(arg);
      if (!parsed.success) {
        ctx.out(`Usage: sort <field> [desc] - where field is one of: ${SORT_FIELDS.join(", ")}`);
        return "continue";
      }
      const [field, direction] = parsed.data;
      const ascending = direction?.toLowerCase() !== "desc";
      sortBy(ctx, field, ascending);
      return listCommand(ctx, "");
    }
  },
  info: {
    usage: "info",
    summary: "show mailbox statistics",
    run: (ctx) => {
      const { out } = ctx;
      const stats = ctx.session.stats();
      out(`Path        : ${stats.path}`);
      out(`Messages    : ${stats.messages.toLocaleString("en-US")}`);
      out(
        `Size (MB)   : ${(stats.sizeBytes / 1024 ** 2).toLocaleString("en-US", {
          minimumFractionDigits: 2,
          maximumFractionDigits: 2
        })}`
      );
      if (stats.earliest && stats.latest) out(`Date Range  : ${stats.earliest} to ${stats.latest}`);
      out("\nMessage Sources:");
      for (const { domain, count } of stats.topDomains) out(`  @${domain}: ${count} messages`);
      return "continue";
    }
  },
  help: {
    usage: "help",
    summary: "list commands",
    run: (ctx) => {
      for (const spec of Object.values(COMMANDS)) ctx.out(`${spec.usage.padEnd(28)} – ${spec.summary}`);
      return "continue";
    }
  },
  quit: {
    usage: "quit",
    summary: "leave the navigator",
    run: (ctx) => {
      ctx.out("Good-bye!");
      return "quit";
    }
  }
};

function sortBy(ctx: CommandContext, field: SortField, ascending: boolean): void {
  ctx.session.sort(field, ascending);
  ctx.out(`Sorted by ${field} ${ascending ? "ascending" : "descending"}`);
}

function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export type ParsedCommand = { name: CommandName; arg: string };

export function parseCommandLine(line: string): ParsedCommand | null {
  const m = /^\s*(\S+)\s*([\s\S]*)$/.exec(line);
  if (!m) return null;
  const verb = (m[1] ?? "").toLowerCase();
  const name = verb === "exit" || verb === "eof" ? "quit" : verb;
  return isCommandName(name) ? { name, arg: (m[2] ?? "").trimEnd() } : null;
}

/** Runs one input line. Lookup and I/O failures are reported and the session goes on. */
export async function dispatch(ctx: CommandContext, line: string): Promise<CommandOutcome> {
  if (!line.trim()) return "continue";
  const parsed = parseCommandLine(line);
  if (!parsed) {
    ctx.out(`*** Unknown syntax: ${line.trim()}`);
    return "continue";
  }

  try {
    return await COMMANDS[parsed.name].run(ctx, parsed.arg);
  } catch (err) {
    if (err instanceof LookupError) ctx.out(err.message);
    else ctx.out(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return "continue";
  }
}
