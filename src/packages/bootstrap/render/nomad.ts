import type { AgentState, DesiredState } from "../types";
import { MANAGED_HEADER, hclBool, hclString } from "./hcl";

export type NomadConfigInput = Pick<
  DesiredState,
  "logLevel" | "bootstrapExpect" | "nomad"
> & {
  agent: Pick<AgentState, "dataDir">;
  address: string;
};

export function renderNomadConfig({
  logLevel,
  bootstrapExpect,
  nomad,
  agent,
  address,
}: NomadConfigInput): string {
  const ip = hclString(address);
  return `${MANAGED_HEADER}

log_level = ${hclString(logLevel)}

data_dir = ${hclString(agent.dataDir)}

# Single node: this agent is both server and client.
server {
  enabled = true
  bootstrap_expect = ${bootstrapExpect}
}

client {
  enabled = true
  options = {
    "docker.auth.config" = ${hclString(nomad.dockerAuthConfig)}
    "docker.volumes.enabled" = ${hclString(hclBool(nomad.dockerVolumesEnabled))}
  }
}

bind_addr = "0.0.0.0"

advertise {
  http = ${ip}
  rpc  = ${ip}
  serf = ${ip}
}
`;
}
