import type { Command } from "commander";
import { runBootstrap } from "@clusterboot/bootstrap/engine";
import { operatorSummary } from "@clusterboot/bootstrap/summary";
import { CommandFailure, withContext, type CliDeps } from "../core/context";
import { formatReport, reportData } from "../core/report";

export function registerApplyCommand(program: Command, deps: CliDeps): Command {
  return program
    .command("apply")
    .description("converge this host into a single-node Nomad and Consul cluster")
    .option("--skip-activation", "write binaries, configs and units but do not start the agents")
    .action(async (opts: { skipActivation?: boolean }, command: Command) => {
      await withContext(
        command,
        "apply",
        deps,
        async (ctx) => {
          const skipActivation = !!opts.skipActivation;
          const report = await runBootstrap(ctx.state, ctx.bootstrap, {
            mode: "apply",
            skipActivation,
          });
          const address = report.address.address;
          ctx.meta.address = address;
          const activated = ctx.state.activation.enabled && !skipActivation;
          const data = reportData(
            report,
            report.ok && activated ? operatorSummary(ctx.state, address) : undefined,
          );
          if (report.error) {
            throw new CommandFailure(report.error, data);
          }
          return data;
        },
        formatReport,
      );
    });
}
