// What an operator needs after a successful apply.

import { journalHint } from "./steps";
import { AGENT_NAMES, type DesiredState } from "./types";

export type AgentSummary = {
  name: string;
  title: string;
  version: string;
  ui: string;
  logs: string;
};

export function operatorSummary(state: DesiredState, address: string): AgentSummary[] {
  return AGENT_NAMES.map((name) => {
    const agent = state.agents[name];
    return {
      name,
      title: agent.title,
      version: agent.release.version,
      ui: `http://${address}:${agent.uiPort}`,
      logs: journalHint(name),
    };
  });
}

export function formatSummary(summary: AgentSummary[]): string[] {
  return [
    ...summary.map(({ title, ui }) => `${title} UI: ${ui}`),
    ...summary.map(({ title, logs }) => `${title} logs: ${logs}`),
  ];
}
