import type { NetworkInterfaceInfo } from "node:os";
import type { ExecuteCodeOptions, ExecuteCodeOutput } from "@clusterboot/backend/execute-code";
import {
  discoverHostAddress,
  interfaceEntries,
  parseIpAddrOutput,
  pickAddress,
} from "./host-address";

const IP_OUTPUT = `2: eth0    inet 169.254.3.4/16 brd 169.254.255.255 scope global eth0\\       valid_lft forever preferred_lft forever
3: ens5    inet 172.31.5.6/20 brd 172.31.15.255 scope global dynamic ens5\\       valid_lft 3000sec preferred_lft 3000sec
4: veth1@if3    inet 192.168.9.1/24 scope global veth1\\       valid_lft forever preferred_lft forever
`;

function ipExec(result: Partial<ExecuteCodeOutput> | Error) {
  return jest.fn(async (_opts: ExecuteCodeOptions): Promise<ExecuteCodeOutput> => {
    if (result instanceof Error) throw result;
    return { stdout: "", stderr: "", exit_code: 0, ...result };
  });
}

function info(address: string, internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask: "255.255.255.0",
    family: "IPv4",
    mac: "00:00:00:00:00:00",
    internal,
    cidr: `${address}/24`,
  };
}

describe("parseIpAddrOutput", () => {
  it("reads interface and address from each line", () => {
    expect(parseIpAddrOutput(IP_OUTPUT)).toEqual([
      { interface: "eth0", address: "169.254.3.4" },
      { interface: "ens5", address: "172.31.5.6" },
      { interface: "veth1", address: "192.168.9.1" },
    ]);
  });

  it("ignores blank and unrelated lines", () => {
    expect(parseIpAddrOutput("\n  \nnot an address line\n")).toEqual([]);
  });
});

describe("pickAddress", () => {
  const entries = parseIpAddrOutput(IP_OUTPUT);

  it("skips non global-scope ranges", () => {
    expect(pickAddress(entries)).toEqual({ interface: "ens5", address: "172.31.5.6" });
  });

  it("restricts to an interface", () => {
    expect(pickAddress(entries, "veth1")?.address).toBe("192.168.9.1");
    expect(pickAddress(entries, "eth0")).toBeUndefined();
  });
});

describe("interfaceEntries", () => {
  it("keeps external IPv4 addresses", () => {
    expect(
      interfaceEntries({
        lo: [info("127.0.0.1", true)],
        eth0: [
          {
            address: "fe80::1",
            netmask: "ffff:ffff:ffff:ffff::",
            family: "IPv6",
            mac: "00:00:00:00:00:00",
            internal: false,
            cidr: "fe80::1/64",
            scopeid: 2,
          },
          info("10.0.0.7"),
        ],
        missing: undefined,
      }),
    ).toEqual([{ interface: "eth0", address: "10.0.0.7" }]);
  });
});

describe("discoverHostAddress", () => {
  it("prefers an explicit advertise address", async () => {
    const exec = ipExec({ stdout: IP_OUTPUT });
    expect(await discoverHostAddress({ exec, advertise: "203.0.113.10" })).toEqual({
      address: "203.0.113.10",
      source: "advertise",
    });
    expect(exec).not.toHaveBeenCalled();
  });

  it("rejects a loopback advertise address", async () => {
    await expect(
      discoverHostAddress({ exec: ipExec({}), advertise: "127.0.0.1" }),
    ).rejects.toThrow("advertise address '127.0.0.1' is not a global-scope IPv4 address");
  });

  it("uses the first global address from ip", async () => {
    const exec = ipExec({ stdout: IP_OUTPUT });
    expect(await discoverHostAddress({ exec, interfaces: () => ({}) })).toEqual({
      address: "172.31.5.6",
      source: "ip",
      interface: "ens5",
    });
    expect(exec.mock.calls[0][0]).toEqual({
      command: "ip",
      args: ["-o", "-4", "addr", "show", "scope", "global"],
    });
  });

  it("falls back to os.networkInterfaces when ip is missing", async () => {
    const exec = ipExec(new Error("spawn ip ENOENT"));
    expect(
      await discoverHostAddress({
        exec,
        interfaces: () => ({ lo: [info("127.0.0.1", true)], eth1: [info("10.9.8.7")] }),
      }),
    ).toEqual({ address: "10.9.8.7", source: "interfaces", interface: "eth1" });
  });

  it("throws instead of returning an empty address", async () => {
    const exec = ipExec({ stdout: "", exit_code: 0 });
    await expect(
      discoverHostAddress({ exec, interfaces: () => ({ lo: [info("127.0.0.1", true)] }) }),
    ).rejects.toThrow("no global-scope IPv4 address found");
    await expect(
      discoverHostAddress({ exec, iface: "eth9", interfaces: () => ({}) }),
    ).rejects.toThrow("no global-scope IPv4 address found on interface 'eth9'");
  });
});
