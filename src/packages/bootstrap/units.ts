import type { UnitDescriptor } from "./render/systemd";
import type { AgentState } from "./types";

export function serviceUnit(agent: AgentState): UnitDescriptor {
  const common: Pick<UnitDescriptor, "Unit" | "Install"> = {
    Unit: [
      ["Description", agent.title],
      ["Documentation", agent.documentation],
      ["Wants", "network-online.target"],
      ["After", "network-online.target"],
    ],
    Install: [["WantedBy", "multi-user.target"]],
  };

  if (agent.name === "nomad") {
    return {
      ...common,
      Service: [
        ["ExecStart", `${agent.binaryPath} agent -config=${agent.configDir}`],
        ["ExecReload", "/bin/kill -HUP $MAINPID"],
        ["Restart", "on-failure"],
        ["KillSignal", "SIGINT"],
      ],
    };
  }
  return {
    ...common,
    Service: [
      ["ExecStart", `${agent.binaryPath} agent -config-dir=${agent.configDir}`],
      ["ExecReload", "/bin/kill -HUP $MAINPID"],
      ["KillMode", "process"],
      ["Restart", "on-failure"],
      ["KillSignal", "SIGTERM"],
    ],
  };
}
