/*
Follow-up work that outlives a run.

A step that rewrites a unit, binary or config leaves behind the unit reload
and agent restart that change calls for, recorded in PENDING_PATH as soon as
the change is made.  The daemon-reload and activate steps clear their part
once done, so a run that stops in between leaves the rest to the next run.
The file is removed when nothing is left.
*/

import getLogger from "@clusterboot/backend/logger";
import type { HostFs } from "./host-fs";
import { AGENT_NAMES, type AgentName } from "./types";

const logger = getLogger("bootstrap:pending");

export const PENDING_PATH = "/var/lib/clusterboot/pending.json";

export type RestartReason = "binary" | "config" | "unit";

export const RESTART_REASONS: RestartReason[] = ["binary", "config", "unit"];

export type PendingActions = {
  reload: boolean;
  restart: Partial<Record<AgentName, RestartReason[]>>;
};

function isRecord(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// undefined when the text is not a pending-actions document
export function parsePending(text: string): PendingActions | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (!isRecord(raw) || typeof raw.reload !== "boolean" || !isRecord(raw.restart)) {
    return undefined;
  }
  const restart: PendingActions["restart"] = {};
  for (const name of AGENT_NAMES) {
    const reasons = raw.restart[name];
    if (reasons === undefined) continue;
    if (!Array.isArray(reasons)) return undefined;
    const known = RESTART_REASONS.filter((reason) => reasons.includes(reason));
    if (known.length > 0) restart[name] = known;
  }
  return { reload: raw.reload, restart };
}

function isEmpty(pending: PendingActions): boolean {
  return !pending.reload && AGENT_NAMES.every((name) => !pending.restart[name]?.length);
}

export async function readPending(fs: HostFs): Promise<PendingActions> {
  const text = await fs.readText(PENDING_PATH);
  if (text === undefined) return { reload: false, restart: {} };
  const pending = parsePending(text);
  if (pending) return pending;
  // unknown leftovers: do everything once more
  logger.warn("unreadable pending actions; reloading and restarting", { path: PENDING_PATH });
  return {
    reload: true,
    restart: Object.fromEntries(AGENT_NAMES.map((name) => [name, [...RESTART_REASONS]])),
  };
}

async function updatePending(fs: HostFs, change: (pending: PendingActions) => void): Promise<void> {
  const pending = await readPending(fs);
  change(pending);
  if (isEmpty(pending)) {
    await fs.remove(PENDING_PATH);
  } else {
    await fs.write(PENDING_PATH, `${JSON.stringify(pending)}\n`);
  }
}

export async function addRestart(fs: HostFs, name: AgentName, reason: RestartReason): Promise<void> {
  await updatePending(fs, (pending) => {
    const reasons = pending.restart[name] ?? [];
    pending.restart[name] = RESTART_REASONS.filter((r) => r === reason || reasons.includes(r));
  });
}

export async function clearRestart(fs: HostFs, name: AgentName): Promise<void> {
  await updatePending(fs, (pending) => {
    delete pending.restart[name];
  });
}

export async function requireReload(fs: HostFs): Promise<void> {
  await updatePending(fs, (pending) => {
    pending.reload = true;
  });
}

export async function clearReload(fs: HostFs): Promise<void> {
  await updatePending(fs, (pending) => {
    pending.reload = false;
  });
}
