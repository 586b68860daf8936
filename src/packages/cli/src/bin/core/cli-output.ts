/**
 * CLI output and error rendering helpers.
 *
 * Human output is tables (ascii-table3); --json or --output json prints one
 * envelope per command: {ok, command, data, meta} or {ok: false, error}.
 */
import { AsciiTable3 } from "ascii-table3";

export type OutputGlobals = {
  json?: boolean;
  output?: string;
  quiet?: boolean;
  root?: string;
};

export type OutputMeta = {
  root?: string;
  config?: string;
  address?: string;
};

type Row = { [key: string]: unknown };

function isRow(value: unknown): value is Row {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function wantsJson(globals: OutputGlobals | undefined): boolean {
  return !!globals?.json || globals?.output === "json";
}

function formatValue(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function formatArrayTable(rows: Row[], title = "Result"): string {
  if (rows.length === 0) {
    return "(no rows)";
  }
  const cols = Array.from(
    rows.reduce((set, row) => {
      Object.keys(row).forEach((k) => set.add(k));
      return set;
    }, new Set<string>()),
  );
  const table = new AsciiTable3(title);
  table.setStyle("unicode-round");
  table.setHeading(...cols);
  for (const row of rows) {
    table.addRow(...cols.map((col) => formatValue(row[col])));
  }
  return table.toString();
}

export function formatKeyValueTable(data: Row, title = "Result"): string {
  const table = new AsciiTable3(title);
  table.setStyle("unicode-round");
  table.setHeading("Field", "Value");
  for (const [key, value] of Object.entries(data)) {
    table.addRow(key, formatValue(value));
  }
  return table.toString();
}

// Human rendering of a command's data; undefined prints nothing.
export type HumanFormatter = (data: unknown) => string | undefined;

export function defaultFormatter(data: unknown): string | undefined {
  if (Array.isArray(data) && data.every(isRow)) {
    return formatArrayTable(data);
  }
  if (isRow(data)) {
    return formatKeyValueTable(data);
  }
  return data == null ? undefined : String(data);
}

export function emitSuccess(
  ctx: { globals: OutputGlobals; meta?: OutputMeta },
  commandName: string,
  data: unknown,
  format: HumanFormatter = defaultFormatter,
): void {
  if (wantsJson(ctx.globals)) {
    const payload = {
      ok: true,
      command: commandName,
      data,
      meta: {
        root: ctx.meta?.root ?? ctx.globals.root ?? "/",
        config: ctx.meta?.config ?? null,
        address: ctx.meta?.address ?? null,
      },
    };
    console.log(JSON.stringify(payload, null, 2));
    return;
  }

  if (ctx.globals.quiet) {
    return;
  }
  const text = format(data);
  if (text != null) {
    console.log(text);
  }
}

export function emitError(
  ctx: { globals?: OutputGlobals; meta?: OutputMeta },
  commandName: string,
  error: unknown,
  data?: unknown,
): void {
  const message = error instanceof Error ? error.message : `${error}`;
  if (wantsJson(ctx.globals)) {
    const payload = {
      ok: false,
      command: commandName,
      error: {
        code: error instanceof Error && error.name !== "Error" ? error.name : "command_failed",
        message,
      },
      ...(data === undefined ? {} : { data }),
      meta: {
        root: ctx.meta?.root ?? ctx.globals?.root ?? "/",
        config: ctx.meta?.config ?? null,
        address: ctx.meta?.address ?? null,
      },
    };
    console.error(JSON.stringify(payload, null, 2));
    return;
  }
  console.error(`ERROR: ${message}`);
}
