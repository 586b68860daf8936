/*
The clusterboot config file, environment and flags.

The file is JSON with snake_case keys, for example

    {
      "log_level": "INFO",
      "nomad": { "version": "1.5.6" },
      "registry": { "account_id": "123456789012", "owner": "ubuntu:ubuntu" },
      "activation": { "ready_timeout": "45s" }
    }

Precedence: flags, then CLUSTERBOOT_* environment variables, then the file,
then the built-in defaults.
*/

import { existsSync, readFileSync } from "node:fs";
import { ConfigError, type DesiredStateOverrides } from "@clusterboot/bootstrap/desired-state";
import { durationToMs } from "./utils";

export const DEFAULT_CONFIG_PATH = "/etc/clusterboot/config.json";

export type ConfigFlags = {
  config?: string;
  advertiseAddr?: string;
  interface?: string;
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

// The explicit path (flag or env) must exist; the default path is optional.
export function configPath(
  flags: Pick<ConfigFlags, "config">,
  env = process.env,
): { path: string; explicit: boolean } {
  const explicit = flags.config?.trim() || env.CLUSTERBOOT_CONFIG?.trim();
  if (explicit) return { path: explicit, explicit: true };
  return { path: DEFAULT_CONFIG_PATH, explicit: false };
}

class Section {
  private readonly obj: JsonObject;
  private readonly prefix: string;
  private readonly problems: string[];

  constructor(obj: JsonObject, prefix: string, problems: string[]) {
    this.obj = obj;
    this.prefix = prefix;
    this.problems = problems;
  }

  private name = (key: string) => (this.prefix ? `${this.prefix}.${key}` : key);

  allow = (keys: string[]) => {
    for (const key of Object.keys(this.obj)) {
      if (!keys.includes(key)) this.problems.push(`unknown key '${this.name(key)}'`);
    }
  };

  string = (key: string): string | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "string") return value;
    if (typeof value === "number") return `${value}`;
    this.problems.push(`'${this.name(key)}' must be a string`);
    return undefined;
  };

  number = (key: string): number | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    this.problems.push(`'${this.name(key)}' must be a number`);
    return undefined;
  };

  boolean = (key: string): boolean | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    this.problems.push(`'${this.name(key)}' must be true or false`);
    return undefined;
  };

  strings = (key: string): string[] | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
      return value.map((item) => `${item}`);
    }
    this.problems.push(`'${this.name(key)}' must be a list of strings`);
    return undefined;
  };

  // "30s" style strings, or a number of milliseconds
  duration = (key: string): number | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && value >= 0) return value;
    if (typeof value === "string") {
      try {
        return durationToMs(value, 0);
      } catch (err) {
        this.problems.push(`'${this.name(key)}': ${err instanceof Error ? err.message : err}`);
        return undefined;
      }
    }
    this.problems.push(`'${this.name(key)}' must be a duration`);
    return undefined;
  };

  section = (key: string): Section | undefined => {
    const value = this.obj[key];
    if (value === undefined) return undefined;
    if (isObject(value)) return new Section(value, this.name(key), this.problems);
    this.problems.push(`'${this.name(key)}' must be an object`);
    return undefined;
  };
}

// Copy the fields of source that are set, so a layer never clears a value
// from a lower-precedence one.
function assignDefined<T extends object>(target: T, source: Partial<T>): T {
  const out = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

const AGENT_KEYS = ["version", "sha256", "user", "group"];

function agentOverrides(section: Section) {
  return {
    version: section.string("version"),
    sha256: section.string("sha256"),
    user: section.string("user"),
    group: section.string("group"),
  };
}

export function parseConfig(raw: unknown, source = "config"): DesiredStateOverrides {
  if (!isObject(raw)) {
    throw new ConfigError([`${source}: expected a JSON object`]);
  }
  const problems: string[] = [];
  const root = new Section(raw, "", problems);
  root.allow([
    "packages",
    "advertise_addr",
    "interface",
    "log_level",
    "datacenter",
    "bootstrap_expect",
    "release_base_url",
    "arch",
    "nomad",
    "consul",
    "registry",
    "activation",
    "retry",
  ]);

  const overrides: DesiredStateOverrides = {
    packages: root.strings("packages"),
    advertiseAddr: root.string("advertise_addr"),
    interface: root.string("interface"),
    logLevel: root.string("log_level"),
    datacenter: root.string("datacenter"),
    bootstrapExpect: root.number("bootstrap_expect"),
    releaseBaseUrl: root.string("release_base_url"),
    arch: root.string("arch"),
  };

  const nomad = root.section("nomad");
  if (nomad) {
    nomad.allow([...AGENT_KEYS, "docker_auth_config", "docker_volumes_enabled"]);
    overrides.nomad = {
      ...agentOverrides(nomad),
      dockerAuthConfig: nomad.string("docker_auth_config"),
      dockerVolumesEnabled: nomad.boolean("docker_volumes_enabled"),
    };
  }

  const consul = root.section("consul");
  if (consul) {
    consul.allow([
      ...AGENT_KEYS,
      "ui",
      "client_addr",
      "disable_update_check",
      "enable_script_checks",
    ]);
    overrides.consul = {
      ...agentOverrides(consul),
      ui: consul.boolean("ui"),
      clientAddr: consul.string("client_addr"),
      disableUpdateCheck: consul.boolean("disable_update_check"),
      enableScriptChecks: consul.boolean("enable_script_checks"),
    };
  }

  const registry = root.section("registry");
  if (registry) {
    registry.allow([
      "enabled",
      "config_path",
      "account_id",
      "region",
      "helper",
      "helper_binary",
      "owner",
    ]);
    overrides.registry = {
      enabled: registry.boolean("enabled"),
      configPath: registry.string("config_path"),
      accountId: registry.string("account_id"),
      region: registry.string("region"),
      helper: registry.string("helper"),
      helperBinary: registry.string("helper_binary"),
      owner: registry.string("owner"),
    };
  }

  const activation = root.section("activation");
  if (activation) {
    activation.allow(["enabled", "ready_timeout", "poll"]);
    overrides.activation = {
      enabled: activation.boolean("enabled"),
      readyTimeoutMs: activation.duration("ready_timeout"),
      pollMs: activation.duration("poll"),
    };
  }

  const retry = root.section("retry");
  if (retry) {
    retry.allow(["attempts", "delay"]);
    overrides.retry = {
      attempts: retry.number("attempts"),
      delayMs: retry.duration("delay"),
    };
  }

  if (problems.length > 0) {
    throw new ConfigError(problems.map((problem) => `${source}: ${problem}`));
  }
  return overrides;
}

export function loadConfigFile(path: string, explicit = true): DesiredStateOverrides {
  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigError([`config file not found: ${path}`]);
    }
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError([`invalid JSON in ${path}: ${err instanceof Error ? err.message : err}`]);
  }
  return parseConfig(parsed, path);
}

export function envOverrides(env = process.env): DesiredStateOverrides {
  const value = (name: string) => env[name]?.trim() || undefined;
  const accountId = value("CLUSTERBOOT_REGISTRY_ACCOUNT_ID");
  return {
    advertiseAddr: value("CLUSTERBOOT_ADVERTISE_ADDR"),
    interface: value("CLUSTERBOOT_INTERFACE"),
    releaseBaseUrl: value("CLUSTERBOOT_RELEASE_BASE_URL"),
    ...(accountId ? { registry: { accountId } } : {}),
  };
}

export function flagOverrides(flags: ConfigFlags): DesiredStateOverrides {
  return {
    advertiseAddr: flags.advertiseAddr?.trim() || undefined,
    interface: flags.interface?.trim() || undefined,
  };
}

// Later layers win; nested sections merge field by field.
export function mergeOverrides(...layers: DesiredStateOverrides[]): DesiredStateOverrides {
  let merged: DesiredStateOverrides = {};
  for (const layer of layers) {
    const { nomad, consul, registry, activation, retry, ...flat } = layer;
    merged = assignDefined(merged, flat);
    if (nomad) merged.nomad = assignDefined(merged.nomad ?? {}, nomad);
    if (consul) merged.consul = assignDefined(merged.consul ?? {}, consul);
    if (registry) merged.registry = assignDefined(merged.registry ?? {}, registry);
    if (activation) merged.activation = assignDefined(merged.activation ?? {}, activation);
    if (retry) merged.retry = assignDefined(merged.retry ?? {}, retry);
  }
  return merged;
}

export function resolveOverrides(
  flags: ConfigFlags,
  env = process.env,
): { overrides: DesiredStateOverrides; configPath?: string } {
  const { path, explicit } = configPath(flags, env);
  const file = loadConfigFile(path, explicit);
  const loaded = explicit || existsSync(path);
  return {
    overrides: mergeOverrides(file, envOverrides(env), flagOverrides(flags)),
    ...(loaded ? { configPath: path } : {}),
  };
}
