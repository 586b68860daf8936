/*
The bootstrap, as an ordered list of reconciliation steps.

  packages
  binary:<agent>      account:<agent>     dirs:<agent>
  config:<agent>      unit:<agent>        daemon-reload
  registry-auth       credential-helper
  activate:<agent>    verify:<agent>

Steps record what they changed in ctx.changed (by step id).  A change that
calls for a unit reload or an agent restart is also written to the pending
file, so a run that fails before activation still restarts the agent on the
next run.
*/

import { which } from "@clusterboot/backend/command-exists";
import getLogger from "@clusterboot/backend/logger";
import { until } from "@clusterboot/util/async-utils";
import {
  accountExists,
  chownRecursive,
  ensureSystemAccount,
  groupExists,
  ownerOf,
  ownerSpec,
} from "./accounts";
import { installBinary, installedVersion } from "./artifacts";
import { touched, type BootstrapContext } from "./context";
import { installPackages, missingPackages } from "./packages";
import {
  addRestart,
  clearReload,
  clearRestart,
  readPending,
  requireReload,
  RESTART_REASONS,
} from "./pending";
import { applyRegistryAuth, observeRegistryAuth } from "./registry-auth";
import { renderAgentConfig, renderAgentUnit } from "./render";
import { unitName } from "./service-manager";
import type { Observation, Step } from "./step";
import { AGENT_NAMES, type AgentName, type AgentState, type DesiredState } from "./types";

const logger = getLogger("bootstrap:steps");

const UNIT_MODE = 0o644;

export class CredentialHelperMissingError extends Error {
  constructor(binary: string) {
    super(`ECR credential helper is not installed or not in PATH (${binary})`);
    this.name = "CredentialHelperMissingError";
  }
}

export class ServiceNotReadyError extends Error {
  unit: string;
  status: string;

  constructor(unit: string, timeoutMs: number, status: string) {
    super(
      `${unit} is not active after ${timeoutMs}ms; see: ${journalHint(unit)}${status ? `\n${status}` : ""}`,
    );
    this.name = "ServiceNotReadyError";
    this.unit = unit;
    this.status = status;
  }
}

export function journalHint(unit: string): string {
  return `sudo journalctl -u ${unitName(unit)} -n 50 --no-pager`;
}

function summarize(problems: string[], okDetail: string): Observation {
  return problems.length === 0
    ? { inSync: true, detail: okDetail }
    : { inSync: false, detail: problems.join(", ") };
}

function mode(value: number | undefined): string {
  return value === undefined ? "missing" : `0${value.toString(8)}`;
}

const packagesStep: Step = {
  id: "packages",
  description: "Install OS packages",
  observe: async (ctx) => {
    const missing = await missingPackages(ctx.exec, ctx.state.packages);
    return summarize(
      missing.length > 0 ? [`missing ${missing.join(" ")}`] : [],
      `${ctx.state.packages.length} installed`,
    );
  },
  apply: async (ctx) => {
    const missing = await missingPackages(ctx.exec, ctx.state.packages);
    await installPackages(ctx.exec, missing, {
      timeout: ctx.state.timeouts.aptMs,
      env: ctx.env,
    });
    return `installed ${missing.join(" ")}`;
  },
};

function binaryStep(agent: AgentState): Step {
  const { version } = agent.release;
  return {
    id: `binary:${agent.name}`,
    description: `Install ${agent.title} ${version}`,
    observe: async (ctx) => {
      const installed = await installedVersion(ctx.exec, ctx.fs, agent);
      return summarize(
        installed === version ? [] : [`installed ${installed ?? "none"}, want ${version}`],
        `${agent.binaryPath} ${version}`,
      );
    },
    apply: async (ctx) => {
      const artifact = await installBinary({ fs: ctx.fs, agent, download: ctx.download });
      ctx.changed.add(`binary:${agent.name}`);
      await addRestart(ctx.fs, agent.name, "binary");
      return `installed ${version} (sha256 ${artifact.sha256.slice(0, 12)})`;
    },
  };
}

function accountStep(agent: AgentState): Step {
  return {
    id: `account:${agent.name}`,
    description: `System account ${agent.user}`,
    observe: async (ctx) => {
      const problems: string[] = [];
      if (!(await groupExists(ctx.exec, agent.group))) problems.push(`no group ${agent.group}`);
      if (!(await accountExists(ctx.exec, agent.user))) problems.push(`no user ${agent.user}`);
      return summarize(problems, ownerSpec(agent));
    },
    apply: async (ctx) => (await ensureSystemAccount(ctx.exec, agent)).join(", "),
  };
}

function dirsStep(agent: AgentState): Step {
  const dirs = [agent.configDir, agent.dataDir];
  return {
    id: `dirs:${agent.name}`,
    description: `${agent.title} directories`,
    observe: async (ctx) => {
      const missing: string[] = [];
      for (const dir of dirs) {
        if (!(await ctx.fs.isDirectory(dir))) missing.push(`missing ${dir}`);
      }
      return summarize(missing, dirs.join(" "));
    },
    apply: async (ctx) => {
      const created: string[] = [];
      for (const dir of dirs) {
        if (await ctx.fs.ensureDir(dir)) created.push(dir);
      }
      return `created ${created.join(" ")}`;
    },
  };
}

function configStep(agent: AgentState): Step {
  const owner = ownerSpec(agent);
  const render = (ctx: BootstrapContext) =>
    renderAgentConfig(ctx.state, agent.name, ctx.address.address);
  return {
    id: `config:${agent.name}`,
    description: `${agent.title} configuration ${agent.configFile}`,
    observe: async (ctx) => {
      const problems: string[] = [];
      if ((await ctx.fs.readText(agent.configFile)) !== render(ctx)) {
        problems.push("content differs");
      }
      const current = await ctx.fs.mode(agent.configFile);
      if (current !== undefined && current !== agent.configMode) {
        problems.push(`mode ${mode(current)}`);
      }
      for (const path of [agent.configDir, agent.configFile, agent.dataDir]) {
        const actual = await ownerOf(ctx.exec, ctx.fs, path);
        if (actual !== undefined && actual !== owner) {
          problems.push(`${path} owned by ${actual}`);
        }
      }
      return summarize(problems, `${agent.configFile} ${mode(agent.configMode)} ${owner}`);
    },
    apply: async (ctx) => {
      const changed = await ctx.fs.writeTextIfChanged(
        agent.configFile,
        render(ctx),
        agent.configMode,
      );
      await chownRecursive(ctx.exec, ctx.fs, owner, [agent.configDir, agent.dataDir]);
      await ctx.fs.chmod(agent.configFile, agent.configMode);
      if (changed) {
        ctx.changed.add(`config:${agent.name}`);
        await addRestart(ctx.fs, agent.name, "config");
        return "written";
      }
      return "ownership and mode fixed";
    },
  };
}

function unitStep(agent: AgentState): Step {
  return {
    id: `unit:${agent.name}`,
    description: `${agent.title} service unit ${agent.unitPath}`,
    observe: async (ctx) => {
      const problems: string[] = [];
      if ((await ctx.fs.readText(agent.unitPath)) !== renderAgentUnit(ctx.state, agent.name)) {
        problems.push("content differs");
      }
      const current = await ctx.fs.mode(agent.unitPath);
      if (current !== undefined && current !== UNIT_MODE) {
        problems.push(`mode ${mode(current)}`);
      }
      return summarize(problems, agent.unitPath);
    },
    apply: async (ctx) => {
      const changed = await ctx.fs.writeTextIfChanged(
        agent.unitPath,
        renderAgentUnit(ctx.state, agent.name),
        UNIT_MODE,
      );
      if (changed) {
        ctx.changed.add(`unit:${agent.name}`);
        await requireReload(ctx.fs);
        await addRestart(ctx.fs, agent.name, "unit");
        return "written";
      }
      return "mode fixed";
    },
  };
}

const daemonReloadStep: Step = {
  id: "daemon-reload",
  description: "Reload service manager units",
  observe: async (ctx) => {
    const units = AGENT_NAMES.filter((name) => touched(ctx, `unit:${name}`));
    if (units.length > 0) return { inSync: false, detail: `units changed: ${units.join(" ")}` };
    const { reload } = await readPending(ctx.fs);
    return reload
      ? { inSync: false, detail: "reload pending from an earlier run" }
      : { inSync: true, detail: "no unit changes" };
  },
  apply: async (ctx) => {
    await ctx.services.daemonReload();
    await clearReload(ctx.fs);
    return "reloaded";
  },
};

const registryAuthStep: Step = {
  id: "registry-auth",
  description: "Registry credential helper in docker config",
  observe: async (ctx) => {
    const { inSync, detail } = await observeRegistryAuth(ctx.fs, ctx.state.registry);
    return { inSync, detail: `${ctx.state.registry.configPath}: ${detail}` };
  },
  apply: async (ctx) => {
    const result = await applyRegistryAuth({
      fs: ctx.fs,
      exec: ctx.exec,
      registry: ctx.state.registry,
    });
    return result.backup
      ? `${result.state}: set ${result.host}, backup ${result.backup}`
      : `created with ${result.host}`;
  },
};

const credentialHelperStep: Step = {
  id: "credential-helper",
  description: "Credential helper on PATH",
  retry: false,
  observe: async (ctx) => {
    const binary = ctx.state.registry.helperBinary;
    const path = which(binary, ctx.env);
    return path ? { inSync: true, detail: path } : { inSync: false, detail: `${binary} not found` };
  },
  apply: async (ctx) => {
    throw new CredentialHelperMissingError(ctx.state.registry.helperBinary);
  },
};

// changes made in this run (or planned) and those left by earlier runs
async function restartReasons(ctx: BootstrapContext, name: AgentName): Promise<string[]> {
  const earlier = (await readPending(ctx.fs)).restart[name] ?? [];
  return RESTART_REASONS.filter(
    (reason) => earlier.includes(reason) || touched(ctx, `${reason}:${name}`),
  );
}

function activateStep(agent: AgentState): Step {
  const unit = unitName(agent.name);
  return {
    id: `activate:${agent.name}`,
    description: `Enable and start ${unit}`,
    observe: async (ctx) => {
      const problems: string[] = [];
      if (!(await ctx.services.isEnabled(unit))) problems.push("not enabled");
      if (!(await ctx.services.isActive(unit))) {
        problems.push("not active");
      } else {
        const reasons = await restartReasons(ctx, agent.name);
        if (reasons.length > 0) problems.push(`restart for ${reasons.join(" ")}`);
      }
      return summarize(problems, "enabled and active");
    },
    apply: async (ctx) => {
      const done: string[] = [];
      if (!(await ctx.services.isEnabled(unit))) {
        await ctx.services.enable(unit);
        done.push("enabled");
      }
      if (!(await ctx.services.isActive(unit))) {
        await ctx.services.start(unit);
        done.push("started");
      } else if ((await restartReasons(ctx, agent.name)).length > 0) {
        await ctx.services.restart(unit);
        done.push("restarted");
      }
      await clearRestart(ctx.fs, agent.name);
      return done.join(", ");
    },
  };
}

function verifyStep(agent: AgentState, activation: DesiredState["activation"]): Step {
  const unit = unitName(agent.name);
  return {
    id: `verify:${agent.name}`,
    description: `Wait for ${unit} to be active`,
    retry: false,
    observe: async (ctx) => {
      const active = await ctx.services.isActive(unit);
      return { inSync: active, detail: active ? "active" : "not active" };
    },
    apply: async (ctx) => {
      try {
        await until(async () => await ctx.services.isActive(unit), {
          start: activation.pollMs,
          max: activation.pollMs,
          decay: 1,
          timeout: activation.readyTimeoutMs,
          log: logger.debug,
        });
      } catch (err) {
        const status = await ctx.services.status(unit);
        logger.debug("unit not ready", { unit, err: `${err}`, status });
        throw new ServiceNotReadyError(unit, activation.readyTimeoutMs, status);
      }
      logger.debug("unit status", { unit, status: await ctx.services.status(unit) });
      return "active";
    },
  };
}

export type BuildStepsOptions = {
  // stop after the registry steps
  skipActivation?: boolean;
};

export function buildSteps(state: DesiredState, { skipActivation }: BuildStepsOptions = {}): Step[] {
  const agents = AGENT_NAMES.map((name) => state.agents[name]);
  const steps: Step[] = [
    ...(state.packages.length > 0 ? [packagesStep] : []),
    ...agents.map(binaryStep),
    ...agents.map(accountStep),
    ...agents.map(dirsStep),
    ...agents.map(configStep),
    ...agents.map(unitStep),
    daemonReloadStep,
  ];
  if (state.registry.enabled) {
    steps.push(registryAuthStep, credentialHelperStep);
  }
  if (state.activation.enabled && !skipActivation) {
    steps.push(...agents.map(activateStep));
    steps.push(...agents.map((agent) => verifyStep(agent, state.activation)));
  }
  return steps;
}
