/*
The desired state of a bootstrapped host.

Everything the bootstrapper writes or checks is derived from one
DesiredState value: defaults below, overlaid with the operator's overrides
(config file, environment, flags), then validated as a whole so a bad value
is reported before anything on the host is touched.
*/

import { isGlobalIPv4 } from "@clusterboot/util/ip-scope";
import {
  AGENT_LOG_LEVELS,
  type AgentLogLevel,
  type AgentName,
  type AgentState,
  type ConsulSettings,
  type DesiredState,
  type NomadSettings,
  type RegistryAuthState,
  type SoftwareArch,
} from "./types";

export const DEFAULT_RELEASE_BASE_URL = "https://releases.hashicorp.com";
export const DEFAULT_NOMAD_VERSION = "1.5.6";
export const DEFAULT_CONSUL_VERSION = "1.15.2";
export const DEFAULT_PACKAGES = ["ca-certificates", "amazon-ecr-credential-helper"];
export const DEFAULT_REGISTRY_CONFIG_PATH = "/home/ubuntu/.docker/config.json";
export const DEFAULT_REGISTRY_REGION = "us-west-2";
export const BIN_DIR = "/usr/local/bin";
export const UNIT_DIR = "/etc/systemd/system";

export class ConfigError extends Error {
  problems: string[];

  constructor(problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

type AgentOverrides = {
  version?: string;
  sha256?: string;
  user?: string;
  group?: string;
};

export type DesiredStateOverrides = {
  packages?: string[];
  advertiseAddr?: string;
  interface?: string;
  logLevel?: string;
  datacenter?: string;
  bootstrapExpect?: number;
  releaseBaseUrl?: string;
  arch?: string;
  nomad?: AgentOverrides & Partial<NomadSettings>;
  consul?: AgentOverrides & Partial<ConsulSettings>;
  registry?: Partial<RegistryAuthState>;
  activation?: Partial<DesiredState["activation"]>;
  retry?: Partial<DesiredState["retry"]>;
};

export function normalizeArch(raw?: string): SoftwareArch | undefined {
  if (!raw) return undefined;
  const value = raw.toLowerCase();
  if (value === "amd64" || value === "x86_64" || value === "x64") return "amd64";
  if (value === "arm64" || value === "aarch64") return "arm64";
  return undefined;
}

function parseLogLevel(raw: string): AgentLogLevel | undefined {
  return AGENT_LOG_LEVELS.find((level) => level === raw);
}

export function registryHost(registry: Pick<RegistryAuthState, "accountId" | "region">): string {
  return `${registry.accountId}.dkr.ecr.${registry.region}.amazonaws.com`;
}

function trimOr(value: string | undefined, fallback: string): string {
  const trimmed = `${value ?? ""}`.trim();
  return trimmed || fallback;
}

function agentState(
  name: AgentName,
  overrides: AgentOverrides,
  base: { baseUrl: string; arch: SoftwareArch },
): AgentState {
  const title = name === "nomad" ? "Nomad" : "Consul";
  const configDir = `/etc/${name}.d`;
  const sha256 = overrides.sha256?.trim().toLowerCase();
  return {
    name,
    title,
    release: {
      baseUrl: base.baseUrl,
      version: trimOr(
        overrides.version,
        name === "nomad" ? DEFAULT_NOMAD_VERSION : DEFAULT_CONSUL_VERSION,
      ),
      os: "linux",
      arch: base.arch,
      ...(sha256 ? { sha256 } : {}),
    },
    binaryPath: `${BIN_DIR}/${name}`,
    configDir,
    configFile: `${configDir}/${name}.hcl`,
    configMode: 0o640,
    dataDir: `/opt/${name}/data`,
    user: trimOr(overrides.user, name),
    group: trimOr(overrides.group, trimOr(overrides.user, name)),
    unitPath: `${UNIT_DIR}/${name}.service`,
    uiPort: name === "nomad" ? 4646 : 8500,
    documentation:
      name === "nomad" ? "https://www.nomadproject.io/docs/" : "https://www.consul.io/docs/",
  };
}

export function buildDesiredState(
  overrides: DesiredStateOverrides = {},
  platform: { arch?: string } = { arch: process.arch },
): DesiredState {
  const problems: string[] = [];

  const archRaw = overrides.arch ?? platform.arch;
  const arch = normalizeArch(archRaw);
  if (!arch) {
    problems.push(`unsupported architecture '${archRaw ?? ""}' (expected amd64 or arm64)`);
  }
  const baseUrl = trimOr(overrides.releaseBaseUrl, DEFAULT_RELEASE_BASE_URL).replace(/\/+$/, "");
  if (!/^https?:\/\//.test(baseUrl)) {
    problems.push(`release base url must be http(s): '${baseUrl}'`);
  }

  const logLevelRaw = trimOr(overrides.logLevel, "DEBUG").toUpperCase();
  const logLevel = parseLogLevel(logLevelRaw);
  if (!logLevel) {
    problems.push(`log level '${logLevelRaw}' is not one of ${AGENT_LOG_LEVELS.join(", ")}`);
  }
  const datacenter = trimOr(overrides.datacenter, "dc1");
  if (!/^[a-zA-Z0-9_-]+$/.test(datacenter)) {
    problems.push(`invalid datacenter name '${datacenter}'`);
  }
  const bootstrapExpect = overrides.bootstrapExpect ?? 1;
  if (!Number.isInteger(bootstrapExpect) || bootstrapExpect < 1) {
    problems.push("bootstrap_expect must be a positive integer");
  }

  const advertise = overrides.advertiseAddr?.trim() || undefined;
  if (advertise != null && !isGlobalIPv4(advertise)) {
    problems.push(`advertise address '${advertise}' is not a global-scope IPv4 address`);
  }

  const packages = (overrides.packages ?? DEFAULT_PACKAGES)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  for (const name of packages) {
    if (!/^[a-z0-9][a-z0-9+.-]+$/.test(name)) {
      problems.push(`invalid package name '${name}'`);
    }
  }

  const platformBase = { baseUrl, arch: arch ?? "amd64" };
  const agents: Record<AgentName, AgentState> = {
    nomad: agentState("nomad", overrides.nomad ?? {}, platformBase),
    consul: agentState("consul", overrides.consul ?? {}, platformBase),
  };
  for (const agent of Object.values(agents)) {
    if (!/^\d+\.\d+\.\d+([-+][0-9A-Za-z.+-]+)?$/.test(agent.release.version)) {
      problems.push(`invalid ${agent.name} version '${agent.release.version}'`);
    }
    const sha256 = agent.release.sha256;
    if (sha256 != null && !/^[a-f0-9]{64}$/.test(sha256)) {
      problems.push(`${agent.name} sha256 must be 64 hex characters`);
    }
  }

  const registryOverrides = overrides.registry ?? {};
  const registry: RegistryAuthState = {
    enabled: registryOverrides.enabled ?? true,
    configPath: trimOr(registryOverrides.configPath, DEFAULT_REGISTRY_CONFIG_PATH),
    accountId: `${registryOverrides.accountId ?? ""}`.trim(),
    region: trimOr(registryOverrides.region, DEFAULT_REGISTRY_REGION),
    helper: trimOr(registryOverrides.helper, "ecr-login"),
    helperBinary: trimOr(registryOverrides.helperBinary, "docker-credential-ecr-login"),
    ...(registryOverrides.owner?.trim() ? { owner: registryOverrides.owner.trim() } : {}),
  };
  if (registry.enabled) {
    if (!/^\d{12}$/.test(registry.accountId)) {
      problems.push("registry account id must be a 12 digit AWS account id");
    }
    if (!/^[a-z]{2}(-[a-z]+)+-\d$/.test(registry.region)) {
      problems.push(`invalid registry region '${registry.region}'`);
    }
    if (!registry.configPath.startsWith("/")) {
      problems.push("registry config path must be absolute");
    }
  }

  const activation = {
    enabled: overrides.activation?.enabled ?? true,
    readyTimeoutMs: overrides.activation?.readyTimeoutMs ?? 30_000,
    pollMs: overrides.activation?.pollMs ?? 1_000,
  };
  if (!(activation.readyTimeoutMs > 0) || !(activation.pollMs > 0)) {
    problems.push("activation timeouts must be positive");
  }
  const retry = {
    attempts: overrides.retry?.attempts ?? 3,
    delayMs: overrides.retry?.delayMs ?? 2_000,
  };
  if (!Number.isInteger(retry.attempts) || retry.attempts < 1) {
    problems.push("retry attempts must be a positive integer");
  }
  if (!(retry.delayMs >= 0)) {
    problems.push("retry delay must not be negative");
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    packages,
    address: {
      ...(advertise ? { advertise } : {}),
      ...(overrides.interface?.trim() ? { interface: overrides.interface.trim() } : {}),
    },
    logLevel: logLevel ?? "DEBUG",
    datacenter,
    bootstrapExpect,
    agents,
    nomad: {
      dockerAuthConfig: trimOr(overrides.nomad?.dockerAuthConfig, "/etc/nomad/ecr.json"),
      dockerVolumesEnabled: overrides.nomad?.dockerVolumesEnabled ?? true,
    },
    consul: {
      ui: overrides.consul?.ui ?? true,
      clientAddr: trimOr(overrides.consul?.clientAddr, "0.0.0.0"),
      disableUpdateCheck: overrides.consul?.disableUpdateCheck ?? true,
      enableScriptChecks: overrides.consul?.enableScriptChecks ?? true,
    },
    registry,
    activation,
    retry,
    timeouts: {
      aptMs: 10 * 60 * 1000,
      commandMs: 60 * 1000,
    },
  };
}
