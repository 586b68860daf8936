import { basename } from "node:path";
import type { Command } from "commander";
import { renderAll, type RenderedFile } from "@clusterboot/bootstrap/render/index";
import { formatMode } from "../../core/utils";
import { withContext, type CliDeps } from "../core/context";
import { discoverAddress } from "./address";

type RenderedRow = {
  file: string;
  path: string;
  mode: string;
  content: string;
};

function toRow({ path, mode, content }: RenderedFile): RenderedRow {
  return { file: basename(path), path, mode: formatMode(mode), content };
}

export function selectRendered(files: RenderedFile[], name?: string): RenderedRow[] {
  const rows = files.map(toRow);
  if (!name) return rows;
  const match = rows.filter(({ file, path }) => file === name || path === name);
  if (match.length === 0) {
    throw new Error(
      `unknown file '${name}'; expected one of: ${rows.map(({ file }) => file).join(", ")}`,
    );
  }
  return match;
}

function isRenderedRows(data: unknown): data is RenderedRow[] {
  return (
    Array.isArray(data) &&
    data.every((row) => row != null && typeof row === "object" && "content" in row && "path" in row)
  );
}

// One file prints as-is; several get a header each.
export function formatRendered(data: unknown): string | undefined {
  if (!isRenderedRows(data)) return undefined;
  if (data.length === 1) return data[0].content.replace(/\n$/, "");
  return data
    .map(({ path, mode, content }) => `# ${path} (mode ${mode})\n${content}`)
    .join("\n")
    .replace(/\n$/, "");
}

export function registerRenderCommand(program: Command, deps: CliDeps): Command {
  return program
    .command("render [file]")
    .description("print the rendered nomad.hcl, consul.hcl, nomad.service or consul.service")
    .option("--address <ip>", "address to render instead of discovering one")
    .action(async (file: string | undefined, opts: { address?: string }, command: Command) => {
      await withContext(
        command,
        "render",
        deps,
        async (ctx) => {
          let address = opts.address?.trim();
          if (address) {
            ctx.meta.address = address;
          } else {
            address = (await discoverAddress(ctx)).address;
          }
          return selectRendered(renderAll(ctx.state, address), file);
        },
        formatRendered,
      );
    });
}
