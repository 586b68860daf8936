import type { Command } from "commander";
import { withContext, type CliDeps } from "../core/context";

export function registerConfigCommand(program: Command, deps: CliDeps): Command {
  return program
    .command("config")
    .description("show the resolved desired state (defaults, config file, environment and flags)")
    .action(async (_opts: unknown, command: Command) => {
      await withContext(
        command,
        "config",
        deps,
        async (ctx) => ctx.state,
        (data) => JSON.stringify(data, null, 2),
      );
    });
}
