// OS packages, installed through apt.

import type { ExecuteCode } from "@clusterboot/backend/execute-code";

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

export async function isPackageInstalled(
  exec: ExecuteCode,
  name: string,
): Promise<boolean> {
  const { stdout, exit_code } = await exec({
    command: "dpkg-query",
    args: ["-W", "-f=${Status}", name],
  });
  return exit_code === 0 && stdout.includes("install ok installed");
}

export async function missingPackages(
  exec: ExecuteCode,
  names: string[],
): Promise<string[]> {
  const missing: string[] = [];
  for (const name of names) {
    if (!(await isPackageInstalled(exec, name))) {
      missing.push(name);
    }
  }
  return missing;
}

export async function installPackages(
  exec: ExecuteCode,
  names: string[],
  { timeout, env = process.env }: { timeout: number; env?: NodeJS.ProcessEnv },
): Promise<void> {
  if (names.length === 0) return;
  const aptEnv = { ...env, ...APT_ENV };
  await exec({
    command: "apt-get",
    args: ["update"],
    env: aptEnv,
    timeout,
    err_on_exit: true,
  });
  await exec({
    command: "apt-get",
    args: ["install", "-y", ...names],
    env: aptEnv,
    timeout,
    err_on_exit: true,
  });
}
