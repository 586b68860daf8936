import { resolve } from "node:path";
import type { Command } from "commander";
import type { BootstrapDeps } from "@clusterboot/bootstrap/context";
import { buildDesiredState } from "@clusterboot/bootstrap/desired-state";
import type { DesiredState } from "@clusterboot/bootstrap/types";
import { resolveOverrides, type ConfigFlags } from "../../core/config-file";
import {
  defaultFormatter,
  emitError,
  emitSuccess,
  wantsJson,
  type HumanFormatter,
  type OutputGlobals,
  type OutputMeta,
} from "./cli-output";

export type GlobalOptions = OutputGlobals &
  ConfigFlags & {
    verbose?: boolean;
  };

export type CliDeps = {
  env: NodeJS.ProcessEnv;
  // handed to the bootstrapper; tests replace the host with fakes here
  bootstrap: BootstrapDeps;
};

export type CommandContext = {
  globals: GlobalOptions;
  state: DesiredState;
  // bootstrap deps with --root applied
  bootstrap: BootstrapDeps;
  meta: OutputMeta;
};

// A failure that still has a result to show, e.g. the step table of a failed apply.
export class CommandFailure extends Error {
  data: unknown;

  constructor(error: unknown, data: unknown) {
    super(error instanceof Error ? error.message : `${error}`, { cause: error });
    this.name = error instanceof Error ? error.name : "CommandFailure";
    this.data = data;
  }
}

export function globalsFrom(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function contextForGlobals(globals: GlobalOptions, deps: CliDeps): CommandContext {
  const { overrides, configPath } = resolveOverrides(globals, deps.env);
  const state = buildDesiredState(overrides);
  const root = globals.root ? resolve(globals.root) : (deps.bootstrap.root ?? "/");
  return {
    globals,
    state,
    bootstrap: { ...deps.bootstrap, root },
    meta: { root, ...(configPath ? { config: configPath } : {}) },
  };
}

export async function withContext(
  command: Command,
  commandName: string,
  deps: CliDeps,
  fn: (ctx: CommandContext) => Promise<unknown>,
  format: HumanFormatter = defaultFormatter,
): Promise<void> {
  let globals: GlobalOptions = {};
  let ctx: CommandContext | undefined;
  try {
    globals = globalsFrom(command);
    ctx = contextForGlobals(globals, deps);
    const data = await fn(ctx);
    emitSuccess(ctx, commandName, data, format);
  } catch (error) {
    const data = error instanceof CommandFailure ? error.data : undefined;
    if (data !== undefined && !wantsJson(globals) && !globals.quiet) {
      const text = format(data);
      if (text != null) console.log(text);
    }
    emitError({ globals, meta: ctx?.meta }, commandName, error, data);
    process.exitCode = 1;
  }
}
