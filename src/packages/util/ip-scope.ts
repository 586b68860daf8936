/*
IPv4 parsing and scope classification.

"Global scope" follows the kernel's meaning (what `ip addr show scope global`
lists): private RFC 1918 ranges ARE global, loopback, link-local, multicast
and reserved ranges are not.
*/

import { isIPv4 } from "node:net";

export type Ipv4Range = {
  network: bigint;
  mask: number;
  original: string;
};

const IPV4_BITS = 32;

export const NON_GLOBAL_IPV4 = [
  "0.0.0.0/8",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "224.0.0.0/4",
  "240.0.0.0/4",
];

export function parseIPv4(ip: string): bigint | null {
  const parts = ip.trim().split(".");
  if (parts.length !== 4) return null;
  let value = 0n;
  for (const part of parts) {
    if (!/^[0-9]{1,3}$/.test(part)) return null;
    const num = Number(part);
    if (num > 255) return null;
    value = (value << 8n) + BigInt(num);
  }
  return value;
}

function maskValue(value: bigint, mask: number): bigint {
  const shift = BigInt(IPV4_BITS - mask);
  return (value >> shift) << shift;
}

export function parseIpv4Range(entry: string): Ipv4Range | null {
  const [addrRaw, maskRaw] = entry.trim().split("/");
  const value = parseIPv4(addrRaw ?? "");
  if (value == null) return null;
  const mask = maskRaw ? Number.parseInt(maskRaw, 10) : IPV4_BITS;
  if (!Number.isInteger(mask) || mask < 0 || mask > IPV4_BITS) return null;
  return { network: maskValue(value, mask), mask, original: entry.trim() };
}

export function inRange(ip: string, range: Ipv4Range): boolean {
  const value = parseIPv4(ip);
  if (value == null) return false;
  return maskValue(value, range.mask) === range.network;
}

const nonGlobalRanges = NON_GLOBAL_IPV4.map((entry) => {
  const range = parseIpv4Range(entry);
  if (range == null) {
    throw new Error(`invalid built-in range ${entry}`);
  }
  return range;
});

export function isGlobalIPv4(ip: string | null | undefined): boolean {
  const value = `${ip ?? ""}`.trim();
  if (!isIPv4(value) || parseIPv4(value) == null) return false;
  return !nonGlobalRanges.some((range) => inRange(value, range));
}

// "10.0.0.5/24" -> "10.0.0.5"
export function stripPrefixLength(cidr: string): string {
  const trimmed = cidr.trim();
  const slash = trimmed.indexOf("/");
  return slash === -1 ? trimmed : trimmed.slice(0, slash);
}
