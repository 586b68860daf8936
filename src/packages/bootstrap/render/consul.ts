import type { AgentState, DesiredState } from "../types";
import { MANAGED_HEADER, hclBool, hclString } from "./hcl";

export type ConsulConfigInput = Pick<
  DesiredState,
  "logLevel" | "bootstrapExpect" | "datacenter" | "consul"
> & {
  agent: Pick<AgentState, "dataDir">;
  address: string;
};

export function renderConsulConfig({
  logLevel,
  bootstrapExpect,
  datacenter,
  consul,
  agent,
  address,
}: ConsulConfigInput): string {
  return `${MANAGED_HEADER}

log_level = ${hclString(logLevel)}

data_dir = ${hclString(agent.dataDir)}

server = true

bootstrap_expect = ${bootstrapExpect}

bind_addr = ${hclString(address)}

advertise_addr = ${hclString(address)}

ui = ${hclBool(consul.ui)}

# The UI and HTTP API listen here.
client_addr = ${hclString(consul.clientAddr)}

disable_update_check = ${hclBool(consul.disableUpdateCheck)}

enable_script_checks = ${hclBool(consul.enableScriptChecks)}

datacenter = ${hclString(datacenter)}
`;
}
