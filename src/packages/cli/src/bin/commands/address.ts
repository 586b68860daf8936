import type { Command } from "commander";
import executeCode from "@clusterboot/backend/execute-code";
import { withDefaultTimeout } from "@clusterboot/bootstrap/context";
import { discoverHostAddress, type DiscoveredAddress } from "@clusterboot/bootstrap/host-address";
import { withContext, type CliDeps, type CommandContext } from "../core/context";

export async function discoverAddress(ctx: CommandContext): Promise<DiscoveredAddress> {
  const { exec = executeCode, interfaces } = ctx.bootstrap;
  const address = await discoverHostAddress({
    exec: withDefaultTimeout(exec, ctx.state.timeouts.commandMs),
    advertise: ctx.state.address.advertise,
    iface: ctx.state.address.interface,
    ...(interfaces ? { interfaces } : {}),
  });
  ctx.meta.address = address.address;
  return address;
}

export function registerAddressCommand(program: Command, deps: CliDeps): Command {
  return program
    .command("address")
    .description("show the address the agents will advertise")
    .action(async (_opts: unknown, command: Command) => {
      await withContext(command, "address", deps, async (ctx) => {
        const { address, source, interface: iface } = await discoverAddress(ctx);
        return { address, source, interface: iface ?? null };
      });
    });
}
