import {
  buildDesiredState,
  ConfigError,
  normalizeArch,
  registryHost,
} from "./desired-state";

const ACCOUNT = "123456789012";

describe("normalizeArch", () => {
  it("maps node and uname names", () => {
    expect(normalizeArch("x64")).toBe("amd64");
    expect(normalizeArch("x86_64")).toBe("amd64");
    expect(normalizeArch("arm64")).toBe("arm64");
    expect(normalizeArch("aarch64")).toBe("arm64");
    expect(normalizeArch("ia32")).toBeUndefined();
    expect(normalizeArch()).toBeUndefined();
  });
});

describe("buildDesiredState", () => {
  it("fills in the defaults", () => {
    const state = buildDesiredState({ registry: { accountId: ACCOUNT } }, { arch: "x64" });
    expect(state.packages).toEqual(["ca-certificates", "amazon-ecr-credential-helper"]);
    expect(state.logLevel).toBe("DEBUG");
    expect(state.datacenter).toBe("dc1");
    expect(state.bootstrapExpect).toBe(1);
    expect(state.address).toEqual({});
    expect(state.agents.nomad).toEqual({
      name: "nomad",
      title: "Nomad",
      release: {
        baseUrl: "https://releases.hashicorp.com",
        version: "1.5.6",
        os: "linux",
        arch: "amd64",
      },
      binaryPath: "/usr/local/bin/nomad",
      configDir: "/etc/nomad.d",
      configFile: "/etc/nomad.d/nomad.hcl",
      configMode: 0o640,
      dataDir: "/opt/nomad/data",
      user: "nomad",
      group: "nomad",
      unitPath: "/etc/systemd/system/nomad.service",
      uiPort: 4646,
      documentation: "https://www.nomadproject.io/docs/",
    });
    expect(state.agents.consul.release.version).toBe("1.15.2");
    expect(state.agents.consul.configFile).toBe("/etc/consul.d/consul.hcl");
    expect(state.agents.consul.uiPort).toBe(8500);
    expect(state.registry).toEqual({
      enabled: true,
      configPath: "/home/ubuntu/.docker/config.json",
      accountId: ACCOUNT,
      region: "us-west-2",
      helper: "ecr-login",
      helperBinary: "docker-credential-ecr-login",
    });
    expect(state.activation).toEqual({ enabled: true, readyTimeoutMs: 30000, pollMs: 1000 });
    expect(state.retry).toEqual({ attempts: 3, delayMs: 2000 });
  });

  it("applies overrides", () => {
    const state = buildDesiredState(
      {
        advertiseAddr: " 10.0.0.5 ",
        interface: "ens5",
        logLevel: "info",
        releaseBaseUrl: "https://mirror.example.com/releases/",
        nomad: { version: "1.6.0", sha256: "A".repeat(64) },
        consul: { user: "svc" },
        registry: { accountId: ACCOUNT, region: "eu-central-1", owner: "ubuntu:ubuntu" },
      },
      { arch: "arm64" },
    );
    expect(state.address).toEqual({ advertise: "10.0.0.5", interface: "ens5" });
    expect(state.logLevel).toBe("INFO");
    expect(state.agents.nomad.release).toEqual({
      baseUrl: "https://mirror.example.com/releases",
      version: "1.6.0",
      os: "linux",
      arch: "arm64",
      sha256: "a".repeat(64),
    });
    expect(state.agents.consul.user).toBe("svc");
    expect(state.agents.consul.group).toBe("svc");
    expect(state.registry.owner).toBe("ubuntu:ubuntu");
    expect(registryHost(state.registry)).toBe(
      "123456789012.dkr.ecr.eu-central-1.amazonaws.com",
    );
  });

  it("requires a registry account id", () => {
    expect(() => buildDesiredState({}, { arch: "x64" })).toThrow(
      "invalid configuration: registry account id must be a 12 digit AWS account id",
    );
    expect(() =>
      buildDesiredState({ registry: { enabled: false } }, { arch: "x64" }),
    ).not.toThrow();
  });

  it("reports every problem at once", () => {
    let error: unknown;
    try {
      buildDesiredState(
        {
          advertiseAddr: "127.0.0.1",
          logLevel: "loud",
          bootstrapExpect: 0,
          nomad: { version: "latest", sha256: "abc" },
          registry: { accountId: ACCOUNT },
          retry: { attempts: 0 },
        },
        { arch: "s390x" },
      );
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.problems).toEqual([
      "unsupported architecture 's390x' (expected amd64 or arm64)",
      "log level 'LOUD' is not one of TRACE, DEBUG, INFO, WARN, ERROR",
      "bootstrap_expect must be a positive integer",
      "advertise address '127.0.0.1' is not a global-scope IPv4 address",
      "invalid nomad version 'latest'",
      "nomad sha256 must be 64 hex characters",
      "retry attempts must be a positive integer",
    ]);
  });
});
