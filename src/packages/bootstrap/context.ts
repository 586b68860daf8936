/*
Everything a reconciliation step can see: the desired state, the discovered
address, and the handles it uses to observe and change the host.
*/

import type { NetworkInterfaceInfo } from "node:os";
import executeCode, { type ExecuteCode } from "@clusterboot/backend/execute-code";
import getLogger from "@clusterboot/backend/logger";
import { httpsDownload, type Downloader } from "./artifacts";
import { discoverHostAddress, type DiscoveredAddress } from "./host-address";
import { HostFs } from "./host-fs";
import { SystemdServiceManager, type ServiceManager } from "./service-manager";
import type { DesiredState } from "./types";

const logger = getLogger("bootstrap:context");

export type BootstrapDeps = {
  // prefix for every managed path; "/" on a real host
  root?: string;
  exec?: ExecuteCode;
  download?: Downloader;
  services?: ServiceManager;
  env?: NodeJS.ProcessEnv;
  interfaces?: () => NodeJS.Dict<NetworkInterfaceInfo[]>;
};

export type BootstrapContext = {
  state: DesiredState;
  fs: HostFs;
  exec: ExecuteCode;
  download: Downloader;
  services: ServiceManager;
  env: NodeJS.ProcessEnv;
  address: DiscoveredAddress;
  // ids of steps that changed the host during this run
  changed: Set<string>;
  // ids of steps that would change the host (plan mode)
  pending: Set<string>;
};

// True when the step changed the host, or would have in plan mode.
export function touched(ctx: Pick<BootstrapContext, "changed" | "pending">, id: string): boolean {
  return ctx.changed.has(id) || ctx.pending.has(id);
}

export function withDefaultTimeout(exec: ExecuteCode, timeout: number): ExecuteCode {
  return async (opts) => await exec({ timeout, ...opts });
}

// The address is discovered before any step runs; failing to find one
// aborts the run with nothing changed.
export async function prepareContext(
  state: DesiredState,
  deps: BootstrapDeps = {},
): Promise<BootstrapContext> {
  const exec = withDefaultTimeout(deps.exec ?? executeCode, state.timeouts.commandMs);
  const address = await discoverHostAddress({
    exec,
    advertise: state.address.advertise,
    iface: state.address.interface,
    ...(deps.interfaces ? { interfaces: deps.interfaces } : {}),
  });
  logger.info("host address", address);
  return {
    state,
    fs: new HostFs(deps.root ?? "/"),
    exec,
    download: deps.download ?? httpsDownload,
    services: deps.services ?? new SystemdServiceManager(exec, state.timeouts.commandMs),
    env: deps.env ?? process.env,
    address,
    changed: new Set(),
    pending: new Set(),
  };
}
