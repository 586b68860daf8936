import { renderConsulConfig } from "./consul";
import { renderNomadConfig } from "./nomad";
import { renderUnit } from "./systemd";
import { serviceUnit } from "../units";
import type { AgentName, DesiredState } from "../types";

export type RenderedFile = {
  agent: AgentName;
  kind: "config" | "unit";
  path: string;
  content: string;
  mode: number;
};

export function renderAgentConfig(
  state: DesiredState,
  name: AgentName,
  address: string,
): string {
  const agent = state.agents[name];
  if (name === "nomad") {
    return renderNomadConfig({
      logLevel: state.logLevel,
      bootstrapExpect: state.bootstrapExpect,
      nomad: state.nomad,
      agent,
      address,
    });
  }
  return renderConsulConfig({
    logLevel: state.logLevel,
    bootstrapExpect: state.bootstrapExpect,
    datacenter: state.datacenter,
    consul: state.consul,
    agent,
    address,
  });
}

export function renderAgentUnit(state: DesiredState, name: AgentName): string {
  return renderUnit(serviceUnit(state.agents[name]));
}

export function renderAll(state: DesiredState, address: string): RenderedFile[] {
  const files: RenderedFile[] = [];
  for (const agent of Object.values(state.agents)) {
    files.push({
      agent: agent.name,
      kind: "config",
      path: agent.configFile,
      content: renderAgentConfig(state, agent.name, address),
      mode: agent.configMode,
    });
  }
  for (const agent of Object.values(state.agents)) {
    files.push({
      agent: agent.name,
      kind: "unit",
      path: agent.unitPath,
      content: renderAgentUnit(state, agent.name),
      mode: 0o644,
    });
  }
  return files;
}
