export type AgentName = "nomad" | "consul";

export const AGENT_NAMES: AgentName[] = ["nomad", "consul"];

export type SoftwareOs = "linux";
export type SoftwareArch = "amd64" | "arm64";

export type AgentLogLevel = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR";

export const AGENT_LOG_LEVELS: AgentLogLevel[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR"];

export type ReleaseSpec = {
  baseUrl: string;
  version: string;
  os: SoftwareOs;
  arch: SoftwareArch;
  // pinned archive checksum; when absent the release's SHA256SUMS is used
  sha256?: string;
};

export type AgentState = {
  name: AgentName;
  title: string;
  release: ReleaseSpec;
  binaryPath: string;
  configDir: string;
  configFile: string;
  configMode: number;
  dataDir: string;
  user: string;
  group: string;
  unitPath: string;
  uiPort: number;
  documentation: string;
};

export type NomadSettings = {
  dockerAuthConfig: string;
  dockerVolumesEnabled: boolean;
};

export type ConsulSettings = {
  ui: boolean;
  clientAddr: string;
  disableUpdateCheck: boolean;
  enableScriptChecks: boolean;
};

export type RegistryAuthState = {
  enabled: boolean;
  configPath: string;
  accountId: string;
  region: string;
  helper: string;
  helperBinary: string;
  owner?: string;
};

export type DesiredState = {
  packages: string[];
  address: {
    advertise?: string;
    interface?: string;
  };
  logLevel: AgentLogLevel;
  datacenter: string;
  bootstrapExpect: number;
  agents: Record<AgentName, AgentState>;
  nomad: NomadSettings;
  consul: ConsulSettings;
  registry: RegistryAuthState;
  activation: {
    enabled: boolean;
    readyTimeoutMs: number;
    pollMs: number;
  };
  retry: {
    attempts: number;
    delayMs: number;
  };
  timeouts: {
    aptMs: number;
    commandMs: number;
  };
};
