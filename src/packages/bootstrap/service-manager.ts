/*
The service manager the agents are registered with.

Only systemd is implemented.  Steps talk to the ServiceManager interface so
tests can record calls instead of running systemctl.
*/

import type { ExecuteCode } from "@clusterboot/backend/execute-code";
import getLogger from "@clusterboot/backend/logger";

const logger = getLogger("bootstrap:service-manager");

export interface ServiceManager {
  daemonReload(): Promise<void>;
  isEnabled(unit: string): Promise<boolean>;
  enable(unit: string): Promise<void>;
  isActive(unit: string): Promise<boolean>;
  start(unit: string): Promise<void>;
  restart(unit: string): Promise<void>;
  // human readable status, for logs and error messages
  status(unit: string): Promise<string>;
}

export function unitName(name: string): string {
  return name.endsWith(".service") ? name : `${name}.service`;
}

export class SystemdServiceManager implements ServiceManager {
  private readonly exec: ExecuteCode;
  private readonly timeout: number;

  constructor(exec: ExecuteCode, timeout = 60_000) {
    this.exec = exec;
    this.timeout = timeout;
  }

  private systemctl = async (args: string[], err_on_exit = true) => {
    logger.debug("systemctl", { args });
    return await this.exec({
      command: "systemctl",
      args,
      timeout: this.timeout,
      err_on_exit,
    });
  };

  daemonReload = async (): Promise<void> => {
    await this.systemctl(["daemon-reload"]);
  };

  // `is-enabled` exits non-zero for disabled, static and missing units.
  isEnabled = async (unit: string): Promise<boolean> => {
    const { stdout, exit_code } = await this.systemctl(
      ["is-enabled", unitName(unit)],
      false,
    );
    return exit_code === 0 && stdout.trim() === "enabled";
  };

  enable = async (unit: string): Promise<void> => {
    await this.systemctl(["enable", unitName(unit)]);
  };

  isActive = async (unit: string): Promise<boolean> => {
    const { stdout, exit_code } = await this.systemctl(
      ["is-active", unitName(unit)],
      false,
    );
    return exit_code === 0 && stdout.trim() === "active";
  };

  start = async (unit: string): Promise<void> => {
    await this.systemctl(["start", unitName(unit)]);
  };

  restart = async (unit: string): Promise<void> => {
    await this.systemctl(["restart", unitName(unit)]);
  };

  status = async (unit: string): Promise<string> => {
    const { stdout, stderr } = await this.systemctl(
      ["status", "--no-pager", "--lines=20", unitName(unit)],
      false,
    );
    return (stdout || stderr).trim();
  };
}
