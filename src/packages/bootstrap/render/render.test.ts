import { buildDesiredState } from "../desired-state";
import { renderAll } from "./index";
import { renderUnit } from "./systemd";

const state = buildDesiredState({ registry: { accountId: "123456789012" } }, { arch: "x64" });

function file(path: string): string {
  const found = renderAll(state, "10.1.2.3").find((f) => f.path === path);
  if (!found) throw new Error(`not rendered: ${path}`);
  return found.content;
}

const HEADER = "# Managed by clusterboot. Local edits are overwritten on the next apply.";

describe("agent configuration", () => {
  it("renders nomad.hcl", () => {
    expect(file("/etc/nomad.d/nomad.hcl")).toBe(`${HEADER}

log_level = "DEBUG"

data_dir = "/opt/nomad/data"

# Single node: this agent is both server and client.
server {
  enabled = true
  bootstrap_expect = 1
}

client {
  enabled = true
  options = {
    "docker.auth.config" = "/etc/nomad/ecr.json"
    "docker.volumes.enabled" = "true"
  }
}

bind_addr = "0.0.0.0"

advertise {
  http = "10.1.2.3"
  rpc  = "10.1.2.3"
  serf = "10.1.2.3"
}
`);
  });

  it("renders consul.hcl", () => {
    expect(file("/etc/consul.d/consul.hcl")).toBe(`${HEADER}

log_level = "DEBUG"

data_dir = "/opt/consul/data"

server = true

bootstrap_expect = 1

bind_addr = "10.1.2.3"

advertise_addr = "10.1.2.3"

ui = true

# The UI and HTTP API listen here.
client_addr = "0.0.0.0"

disable_update_check = true

enable_script_checks = true

datacenter = "dc1"
`);
  });

  it("is byte-identical across renders", () => {
    expect(renderAll(state, "10.1.2.3")).toEqual(renderAll(state, "10.1.2.3"));
  });

  it("orders configs before units with their modes", () => {
    expect(renderAll(state, "10.1.2.3").map(({ path, mode }) => [path, mode])).toEqual([
      ["/etc/nomad.d/nomad.hcl", 0o640],
      ["/etc/consul.d/consul.hcl", 0o640],
      ["/etc/systemd/system/nomad.service", 0o644],
      ["/etc/systemd/system/consul.service", 0o644],
    ]);
  });
});

describe("service units", () => {
  it("renders nomad.service", () => {
    expect(file("/etc/systemd/system/nomad.service")).toBe(`${HEADER}
[Unit]
Description=Nomad
Documentation=https://www.nomadproject.io/docs/
Wants=network-online.target
After=network-online.target

[Service]
ExecStart=/usr/local/bin/nomad agent -config=/etc/nomad.d
ExecReload=/bin/kill -HUP $MAINPID
Restart=on-failure
KillSignal=SIGINT

[Install]
WantedBy=multi-user.target
`);
  });

  it("renders consul.service", () => {
    expect(file("/etc/systemd/system/consul.service")).toBe(`${HEADER}
[Unit]
Description=Consul
Documentation=https://www.consul.io/docs/
Wants=network-online.target
After=network-online.target

[Service]
ExecStart=/usr/local/bin/consul agent -config-dir=/etc/consul.d
ExecReload=/bin/kill -HUP $MAINPID
KillMode=process
Restart=on-failure
KillSignal=SIGTERM

[Install]
WantedBy=multi-user.target
`);
  });

  it("skips empty sections and rejects multiline values", () => {
    expect(renderUnit({ Unit: [["Description", "x"]], Service: [], Install: [] })).toBe(
      `${HEADER}\n[Unit]\nDescription=x\n`,
    );
    expect(() =>
      renderUnit({ Unit: [["Description", "a\nb"]], Service: [], Install: [] }),
    ).toThrow("unit value for Description must be a single line");
  });
});
