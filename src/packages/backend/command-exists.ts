import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";

// Resolve a command the way a shell would, by walking PATH.
export function which(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const name = command.trim();
  if (!name) return undefined;
  const candidates = name.includes("/")
    ? [isAbsolute(name) ? name : join(process.cwd(), name)]
    : `${env.PATH ?? ""}`
        .split(delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => join(dir, name));
  for (const candidate of candidates) {
    try {
      if (!statSync(candidate).isFile()) continue;
      accessSync(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not here
    }
  }
  return undefined;
}
