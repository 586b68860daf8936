import { Command } from "commander";
import pkg from "../../package.json";
import { registerAddressCommand } from "./commands/address";
import { registerApplyCommand } from "./commands/apply";
import { registerConfigCommand } from "./commands/config";
import { registerPlanCommand } from "./commands/plan";
import { registerRenderCommand } from "./commands/render";
import type { CliDeps } from "./core/context";

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("clusterboot")
    .description("bootstrap a single-node Nomad and Consul cluster on this host")
    .version(pkg.version)
    .option("--config <path>", "config file (default: $CLUSTERBOOT_CONFIG or /etc/clusterboot/config.json)")
    .option("--root <dir>", "prefix for every managed path (default: /)")
    .option("--advertise-addr <ip>", "address the agents advertise (default: discovered)")
    .option("--interface <name>", "only consider addresses on this interface")
    .option("--json", "output machine-readable JSON")
    .option("--output <format>", "output format (table|json)", "table")
    .option("-q, --quiet", "suppress human-formatted success output")
    .option("--verbose", "enable verbose debug logging to stderr")
    .showHelpAfterError();

  registerApplyCommand(program, deps);
  registerPlanCommand(program, deps);
  registerRenderCommand(program, deps);
  registerAddressCommand(program, deps);
  registerConfigCommand(program, deps);

  return program;
}
