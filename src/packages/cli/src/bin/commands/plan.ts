import type { Command } from "commander";
import { runBootstrap } from "@clusterboot/bootstrap/engine";
import { withContext, type CliDeps } from "../core/context";
import { formatReport, reportData } from "../core/report";

export function registerPlanCommand(program: Command, deps: CliDeps): Command {
  return program
    .command("plan")
    .description("show which steps would change the host, without changing anything")
    .option("--skip-activation", "leave the activation steps out of the plan")
    .action(async (opts: { skipActivation?: boolean }, command: Command) => {
      await withContext(
        command,
        "plan",
        deps,
        async (ctx) => {
          const report = await runBootstrap(ctx.state, ctx.bootstrap, {
            mode: "plan",
            skipActivation: !!opts.skipActivation,
          });
          ctx.meta.address = report.address.address;
          return reportData(report);
        },
        formatReport,
      );
    });
}
