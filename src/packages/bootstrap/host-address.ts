/*
Discover the address the agents advertise to their peers.

Order of preference:
  1. an explicit advertise address,
  2. the first global-scope IPv4 from `ip -o -4 addr show scope global`,
  3. the first global-scope IPv4 from os.networkInterfaces() (no iproute2).

Finding nothing is an error: rendering an empty address into the agent
configs produces agents that start but cannot be reached.
*/

import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";
import type { ExecuteCode } from "@clusterboot/backend/execute-code";
import getLogger from "@clusterboot/backend/logger";
import { isGlobalIPv4, stripPrefixLength } from "@clusterboot/util/ip-scope";

const logger = getLogger("bootstrap:host-address");

export type AddressSource = "advertise" | "ip" | "interfaces";

export type DiscoveredAddress = {
  address: string;
  source: AddressSource;
  interface?: string;
};

export class AddressDiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AddressDiscoveryError";
  }
}

type AddrEntry = { interface: string; address: string };

/*
Parse `ip -o -4 addr show` output.  One address per line:

  2: eth0    inet 10.0.0.5/24 brd 10.0.0.255 scope global dynamic eth0\ ...
*/
export function parseIpAddrOutput(text: string): AddrEntry[] {
  const entries: AddrEntry[] = [];
  for (const line of text.split("\n")) {
    const fields = line.trim().split(/\s+/);
    const inet = fields.indexOf("inet");
    if (inet < 1 || inet + 1 >= fields.length) continue;
    const iface = fields[1].replace(/:$/, "").split("@")[0];
    entries.push({ interface: iface, address: stripPrefixLength(fields[inet + 1]) });
  }
  return entries;
}

export function pickAddress(
  entries: AddrEntry[],
  iface?: string,
): AddrEntry | undefined {
  return entries.find(
    (entry) => (!iface || entry.interface === iface) && isGlobalIPv4(entry.address),
  );
}

export function interfaceEntries(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]>,
): AddrEntry[] {
  const entries: AddrEntry[] = [];
  for (const [name, infos] of Object.entries(interfaces)) {
    for (const info of infos ?? []) {
      if (info.internal || info.family !== "IPv4") continue;
      entries.push({ interface: name, address: info.address });
    }
  }
  return entries;
}

export async function discoverHostAddress({
  exec,
  advertise,
  iface,
  interfaces = networkInterfaces,
}: {
  exec: ExecuteCode;
  advertise?: string;
  iface?: string;
  interfaces?: () => NodeJS.Dict<NetworkInterfaceInfo[]>;
}): Promise<DiscoveredAddress> {
  if (advertise) {
    if (!isGlobalIPv4(advertise)) {
      throw new AddressDiscoveryError(
        `advertise address '${advertise}' is not a global-scope IPv4 address`,
      );
    }
    return { address: advertise, source: "advertise" };
  }

  try {
    const { stdout, exit_code, stderr } = await exec({
      command: "ip",
      args: ["-o", "-4", "addr", "show", "scope", "global"],
    });
    if (exit_code === 0) {
      const found = pickAddress(parseIpAddrOutput(stdout), iface);
      if (found) {
        logger.debug("address from ip addr", found);
        return { address: found.address, source: "ip", interface: found.interface };
      }
    } else {
      logger.debug("ip addr failed", { exit_code, stderr: stderr.trim() });
    }
  } catch (err) {
    logger.debug("ip addr unavailable", { err: `${err}` });
  }

  const found = pickAddress(interfaceEntries(interfaces()), iface);
  if (found) {
    logger.debug("address from os.networkInterfaces", found);
    return { address: found.address, source: "interfaces", interface: found.interface };
  }
  throw new AddressDiscoveryError(
    iface
      ? `no global-scope IPv4 address found on interface '${iface}'`
      : "no global-scope IPv4 address found",
  );
}
