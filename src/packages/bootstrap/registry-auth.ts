/*
Registry auth config (docker's config.json) patching.

The document is merged, never replaced: only credHelpers[<registry>] is set.
Three starting states:

  absent           create {"auths": {}, "credHelpers": {<registry>: <helper>}}
  missing-section  back up, add an empty credHelpers, set the entry
  present          back up, set or overwrite the entry

The backup is <path>.bak and holds the content from just before the write.
A file created fresh gets its backup on the next run, like any other
existing file.
*/

import { dirname } from "node:path";
import type { ExecuteCode } from "@clusterboot/backend/execute-code";
import getLogger from "@clusterboot/backend/logger";
import { chownRecursive } from "./accounts";
import { registryHost } from "./desired-state";
import type { HostFs } from "./host-fs";
import type { RegistryAuthState } from "./types";

const logger = getLogger("bootstrap:registry-auth");

export type AuthDocument = { [key: string]: unknown };

export type AuthConfigState = "absent" | "missing-section" | "present";

// The file is malformed; only an operator can fix that.
export class RegistryAuthError extends Error {
  path: string;
  readonly retryable = false;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "RegistryAuthError";
    this.path = path;
  }
}

function isRecord(value: unknown): value is AuthDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function backupPath(path: string): string {
  return `${path}.bak`;
}

export function parseAuthConfig(text: string, path: string): AuthDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new RegistryAuthError(path, `not valid JSON (${err instanceof Error ? err.message : err})`);
  }
  if (!isRecord(parsed)) {
    throw new RegistryAuthError(path, "expected a JSON object");
  }
  if (parsed.credHelpers !== undefined && !isRecord(parsed.credHelpers)) {
    throw new RegistryAuthError(path, "credHelpers must be an object");
  }
  return parsed;
}

export function classifyAuthConfig(doc: AuthDocument | undefined): AuthConfigState {
  if (doc === undefined) return "absent";
  return isRecord(doc.credHelpers) ? "present" : "missing-section";
}

export function patchAuthConfig(
  doc: AuthDocument | undefined,
  host: string,
  helper: string,
): AuthDocument {
  if (doc === undefined) {
    return { auths: {}, credHelpers: { [host]: helper } };
  }
  const helpers = isRecord(doc.credHelpers) ? doc.credHelpers : {};
  return { ...doc, credHelpers: { ...helpers, [host]: helper } };
}

export function formatAuthConfig(doc: AuthDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function hasHelperEntry(
  doc: AuthDocument | undefined,
  host: string,
  helper: string,
): boolean {
  return doc !== undefined && isRecord(doc.credHelpers) && doc.credHelpers[host] === helper;
}

export type RegistryAuthObservation = {
  inSync: boolean;
  state: AuthConfigState;
  detail: string;
};

export async function observeRegistryAuth(
  fs: HostFs,
  registry: RegistryAuthState,
): Promise<RegistryAuthObservation> {
  const host = registryHost(registry);
  const path = registry.configPath;
  const current = await fs.readText(path);
  const doc = current === undefined ? undefined : parseAuthConfig(current, path);
  const state = classifyAuthConfig(doc);
  if (!hasHelperEntry(doc, host, registry.helper)) {
    return { inSync: false, state, detail: `${host} -> ${registry.helper} missing (${state})` };
  }
  // an existing file is only settled once <path>.bak holds exactly what is
  // there now; a re-run against any other file backs it up again
  const backup = await fs.readText(backupPath(path));
  if (backup === undefined) {
    return { inSync: false, state, detail: "no backup" };
  }
  if (backup !== current) {
    return { inSync: false, state, detail: "backup is stale" };
  }
  return { inSync: true, state, detail: `${host} -> ${registry.helper}` };
}

export type RegistryAuthResult = {
  state: AuthConfigState;
  host: string;
  backup?: string;
};

export async function applyRegistryAuth({
  fs,
  exec,
  registry,
}: {
  fs: HostFs;
  exec: ExecuteCode;
  registry: RegistryAuthState;
}): Promise<RegistryAuthResult> {
  const host = registryHost(registry);
  const path = registry.configPath;
  const current = await fs.readText(path);
  const doc = current === undefined ? undefined : parseAuthConfig(current, path);
  const state = classifyAuthConfig(doc);
  const mode = (await fs.mode(path)) ?? 0o644;

  await fs.ensureDir(dirname(path));
  let backup: string | undefined;
  if (current !== undefined) {
    backup = backupPath(path);
    await fs.copy(path, backup);
  }
  await fs.write(path, formatAuthConfig(patchAuthConfig(doc, host, registry.helper)), mode);
  if (registry.owner) {
    await chownRecursive(exec, fs, registry.owner, [dirname(path)]);
  }
  logger.info("registry auth config updated", { path, state, host });
  return { state, host, ...(backup ? { backup } : {}) };
}
