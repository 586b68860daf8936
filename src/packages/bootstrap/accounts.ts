// System accounts the agents run as, and ownership of their directories.

import type { ExecuteCode } from "@clusterboot/backend/execute-code";
import type { HostFs } from "./host-fs";
import type { AgentState } from "./types";

export async function accountExists(exec: ExecuteCode, user: string): Promise<boolean> {
  const { exit_code } = await exec({ command: "id", args: ["-u", user] });
  return exit_code === 0;
}

export async function groupExists(exec: ExecuteCode, group: string): Promise<boolean> {
  const { exit_code } = await exec({ command: "getent", args: ["group", group] });
  return exit_code === 0;
}

// The group is created on its own, so a group that already exists (or one
// named differently from the user) is used as is.
export async function ensureSystemAccount(
  exec: ExecuteCode,
  agent: Pick<AgentState, "user" | "group" | "configDir">,
): Promise<string[]> {
  const done: string[] = [];
  if (!(await groupExists(exec, agent.group))) {
    await exec({ command: "groupadd", args: ["--system", agent.group], err_on_exit: true });
    done.push(`created group ${agent.group}`);
  }
  if (!(await accountExists(exec, agent.user))) {
    await exec({
      command: "useradd",
      args: [
        "--system",
        "--gid",
        agent.group,
        "--no-create-home",
        "--home-dir",
        agent.configDir,
        "--shell",
        "/bin/false",
        agent.user,
      ],
      err_on_exit: true,
    });
    done.push(`created user ${agent.user}`);
  }
  return done;
}

export function ownerSpec({ user, group }: { user: string; group: string }): string {
  return `${user}:${group}`;
}

// "user:group" of a managed path, or undefined when it does not exist
export async function ownerOf(
  exec: ExecuteCode,
  fs: HostFs,
  path: string,
): Promise<string | undefined> {
  if (!(await fs.exists(path))) return undefined;
  const { stdout, exit_code } = await exec({
    command: "stat",
    args: ["-c", "%U:%G", fs.resolve(path)],
  });
  return exit_code === 0 ? stdout.trim() : undefined;
}

export async function chownRecursive(
  exec: ExecuteCode,
  fs: HostFs,
  owner: string,
  paths: string[],
): Promise<void> {
  if (paths.length === 0) return;
  await exec({
    command: "chown",
    args: ["-R", owner, ...paths.map(fs.resolve)],
    err_on_exit: true,
  });
}
