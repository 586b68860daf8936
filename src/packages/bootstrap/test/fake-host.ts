/*
In-process stand-ins for the host: a command runner that answers the
commands the bootstrapper invokes, a service manager and a release server.
*/

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { strToU8, zipSync } from "fflate";
import type { ExecuteCodeOptions, ExecuteCodeOutput } from "@clusterboot/backend/execute-code";
import { ExecuteCodeError } from "@clusterboot/backend/execute-code";
import { archiveName, archiveUrl, DownloadError, sha256Hex, sumsUrl } from "../artifacts";
import type { ServiceManager } from "../service-manager";
import type { AgentState } from "../types";

export const TEST_ADDRESS = "10.1.2.3";

const IP_OUTPUT = `1: lo    inet 127.0.0.1/8 scope host lo\\       valid_lft forever preferred_lft forever
2: eth0    inet ${TEST_ADDRESS}/24 brd 10.1.2.255 scope global dynamic eth0\\       valid_lft 3000sec preferred_lft 3000sec
`;

function output(stdout: string, exit_code = 0, stderr = ""): ExecuteCodeOutput {
  return { stdout, stderr, exit_code };
}

// Contents of a fake agent binary; `<binary> version` echoes the version back.
export function fakeBinary(name: string, version: string): string {
  return `fake-${name} ${version}\n`;
}

const MUTATING = new Set(["apt-get", "groupadd", "useradd", "chown"]);

export class FakeHost {
  readonly root: string;
  packages = new Set<string>();
  users = new Set<string>();
  groups = new Set<string>();
  // managed path -> "user:group", applied to everything below it
  owners = new Map<string, string>();
  ipOutput = IP_OUTPUT;
  calls: ExecuteCodeOptions[] = [];

  constructor(root: string) {
    this.root = root;
  }

  exec = jest.fn(async (opts: ExecuteCodeOptions): Promise<ExecuteCodeOutput> => {
    this.calls.push(opts);
    const result = await this.run(opts.command, opts.args ?? []);
    if (opts.err_on_exit && result.exit_code !== 0) {
      throw new ExecuteCodeError(opts, result);
    }
    return result;
  });

  // commands that change the host
  mutations = (): string[] =>
    this.calls
      .filter(({ command }) => MUTATING.has(command))
      .map(({ command, args }) => [command, ...(args ?? [])].join(" "));

  private managed = (path: string): string =>
    path.startsWith(this.root) ? path.slice(this.root.length) || "/" : path;

  private run = async (command: string, args: string[]): Promise<ExecuteCodeOutput> => {
    switch (command) {
      case "ip":
        return output(this.ipOutput);
      case "dpkg-query": {
        const name = args[args.length - 1];
        return this.packages.has(name)
          ? output("install ok installed")
          : output("", 1, `dpkg-query: no packages found matching ${name}`);
      }
      case "apt-get":
        if (args[0] === "install") {
          for (const name of args.slice(2)) this.packages.add(name);
        }
        return output("");
      case "id":
        return this.users.has(args[1]) ? output("999\n") : output("", 1, "no such user");
      case "getent":
        return this.groups.has(args[1]) ? output(`${args[1]}:x:999:\n`) : output("", 2);
      case "groupadd": {
        const group = args[args.length - 1];
        if (this.groups.has(group)) {
          return output("", 9, `groupadd: group '${group}' already exists`);
        }
        this.groups.add(group);
        return output("");
      }
      case "useradd": {
        const gid = args[args.indexOf("--gid") + 1];
        if (!this.groups.has(gid)) {
          return output("", 6, `useradd: group '${gid}' does not exist`);
        }
        this.users.add(args[args.length - 1]);
        return output("");
      }
      case "chown": {
        const [, owner, ...paths] = args;
        for (const path of paths) this.owners.set(this.managed(path), owner);
        return output("");
      }
      case "stat":
        return output(`${this.ownerOf(this.managed(args[args.length - 1]))}\n`);
    }
    if (args[0] === "version") {
      const content = await readFile(command, "utf8").catch(() => undefined);
      const match = content?.match(/^fake-(\w+) (\S+)/);
      if (!match) return output("", 126, "not executable");
      const title = match[1][0].toUpperCase() + match[1].slice(1);
      return output(`${title} v${match[2]}\nRevision 0000000\n`);
    }
    return output("", 127, `${command}: command not found`);
  };

  ownerOf = (path: string): string => {
    let best = "";
    for (const prefix of this.owners.keys()) {
      if ((path === prefix || path.startsWith(`${prefix}/`)) && prefix.length > best.length) {
        best = prefix;
      }
    }
    return this.owners.get(best) ?? "root:root";
  };
}

export class FakeServices implements ServiceManager {
  enabled = new Set<string>();
  active = new Set<string>();
  // units that never become active
  broken = new Set<string>();
  calls: string[] = [];
  // number of daemon-reload calls still to fail
  failReload = 0;

  daemonReload = async () => {
    if (this.failReload > 0) {
      this.failReload -= 1;
      throw new Error("Failed to reload daemon: Connection timed out");
    }
    this.calls.push("daemon-reload");
  };
  isEnabled = async (unit: string) => this.enabled.has(unit);
  enable = async (unit: string) => {
    this.calls.push(`enable ${unit}`);
    this.enabled.add(unit);
  };
  isActive = async (unit: string) => this.active.has(unit);
  start = async (unit: string) => {
    this.calls.push(`start ${unit}`);
    if (!this.broken.has(unit)) this.active.add(unit);
  };
  restart = async (unit: string) => {
    this.calls.push(`restart ${unit}`);
    if (!this.broken.has(unit)) this.active.add(unit);
  };
  status = async (unit: string) =>
    `${unit} - ${this.active.has(unit) ? "active (running)" : "inactive (dead)"}`;
}

// A release server holding a zip and a SHA256SUMS file per agent.
export class FakeReleases {
  files = new Map<string, Uint8Array>();
  requests: string[] = [];
  failing = new Set<string>();

  add = (agent: AgentState, content?: string) => {
    const archive = zipSync({
      [agent.name]: strToU8(content ?? fakeBinary(agent.name, agent.release.version)),
      "LICENSE.txt": strToU8("license\n"),
    });
    this.files.set(archiveUrl(agent.name, agent.release), archive);
    this.files.set(
      sumsUrl(agent.name, agent.release),
      strToU8(`${sha256Hex(archive)}  ${archiveName(agent.name, agent.release)}\n`),
    );
    return archive;
  };

  download = jest.fn(async (url: string): Promise<Uint8Array> => {
    this.requests.push(url);
    const file = this.files.get(url);
    if (this.failing.has(url) || !file) {
      throw new DownloadError(url, `download failed (404): ${url}`, 404);
    }
    return file;
  });
}

export async function makeRoot(): Promise<string> {
  return await mkdtemp(join(tmpdir(), "clusterboot-"));
}

export async function removeRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
