/*
Agent binaries: download a release archive, verify it, install the binary.

Releases are laid out as

  {baseUrl}/{name}/{version}/{name}_{version}_{os}_{arch}.zip
  {baseUrl}/{name}/{version}/{name}_{version}_SHA256SUMS

The archive is checked against the pinned sha256 when one is configured and
against the SHA256SUMS entry otherwise.  It is unpacked in memory and only the
binary is written, atomically, with mode 0755.
*/

import { createHash } from "node:crypto";
import http from "node:http";
import https from "node:https";
import { basename } from "node:path";
import { unzipSync } from "fflate";
import type { ExecuteCode } from "@clusterboot/backend/execute-code";
import getLogger from "@clusterboot/backend/logger";
import type { HostFs } from "./host-fs";
import type { AgentName, AgentState, ReleaseSpec } from "./types";

const logger = getLogger("bootstrap:artifacts");

export type Downloader = (url: string) => Promise<Uint8Array>;

export class DownloadError extends Error {
  url: string;
  status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "DownloadError";
    this.url = url;
    this.status = status;
  }
}

export class ArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArtifactError";
  }
}

export function archiveName(name: AgentName, release: ReleaseSpec): string {
  return `${name}_${release.version}_${release.os}_${release.arch}.zip`;
}

function releaseDir(name: AgentName, release: ReleaseSpec): string {
  return `${release.baseUrl}/${name}/${release.version}`;
}

export function archiveUrl(name: AgentName, release: ReleaseSpec): string {
  return `${releaseDir(name, release)}/${archiveName(name, release)}`;
}

export function sumsUrl(name: AgentName, release: ReleaseSpec): string {
  return `${releaseDir(name, release)}/${name}_${release.version}_SHA256SUMS`;
}

// "<hex>  <file>" per line, as written by sha256sum
export function parseSha256Sums(text: string): Map<string, string> {
  const sums = new Map<string, string>();
  for (const line of text.split("\n")) {
    const match = line.trim().match(/^([a-fA-F0-9]{64})\s+\*?(\S+)$/);
    if (match) {
      sums.set(match[2], match[1].toLowerCase());
    }
  }
  return sums;
}

export function sha256Hex(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

const DOWNLOAD_TIMEOUT_MS = 60_000;

// timeoutMs bounds each request's idle time, not the whole transfer
export async function httpsDownload(
  url: string,
  redirects = 5,
  timeoutMs = DOWNLOAD_TIMEOUT_MS,
): Promise<Uint8Array> {
  const target = new URL(url);
  const client = target.protocol === "http:" ? http : https;
  return await new Promise<Uint8Array>((resolve, reject) => {
    const req = client.request(
      {
        method: "GET",
        hostname: target.hostname,
        port: target.port,
        path: `${target.pathname}${target.search}`,
      },
      (res) => {
        const status = res.statusCode ?? 0;
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", reject);
        res.on("end", () => {
          const location = res.headers.location;
          if (status >= 300 && status < 400 && location) {
            if (redirects <= 0) {
              reject(new DownloadError(url, `redirect limit exceeded: ${url}`, status));
              return;
            }
            httpsDownload(new URL(location, target).toString(), redirects - 1, timeoutMs).then(
              resolve,
              reject,
            );
            return;
          }
          if (status < 200 || status >= 300) {
            reject(new DownloadError(url, `download failed (${status}): ${url}`, status));
            return;
          }
          resolve(new Uint8Array(Buffer.concat(chunks)));
        });
      },
    );
    req.setTimeout(timeoutMs, () => {
      req.destroy(new DownloadError(url, `download timed out after ${timeoutMs}ms: ${url}`));
    });
    req.on("error", (err) => {
      reject(
        err instanceof DownloadError
          ? err
          : new DownloadError(url, `download failed: ${url}: ${err.message}`),
      );
    });
    req.end();
  });
}

export async function expectedSha256(
  name: AgentName,
  release: ReleaseSpec,
  download: Downloader,
): Promise<string> {
  if (release.sha256) return release.sha256;
  const url = sumsUrl(name, release);
  const sums = parseSha256Sums(Buffer.from(await download(url)).toString("utf8"));
  const sum = sums.get(archiveName(name, release));
  if (!sum) {
    throw new ArtifactError(`no checksum for ${archiveName(name, release)} in ${url}`);
  }
  return sum;
}

export function extractBinary(archive: Uint8Array, entry: string): Uint8Array {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(archive, {
      filter: (file) => basename(file.name) === entry,
    });
  } catch (err) {
    throw new ArtifactError(`unable to read archive: ${err}`);
  }
  const found = Object.entries(files).find(([path]) => basename(path) === entry);
  if (!found) {
    throw new ArtifactError(`archive has no '${entry}' entry`);
  }
  return found[1];
}

export type InstalledArtifact = {
  url: string;
  sha256: string;
  size: number;
};

export async function installBinary({
  fs,
  agent,
  download,
}: {
  fs: HostFs;
  agent: AgentState;
  download: Downloader;
}): Promise<InstalledArtifact> {
  const url = archiveUrl(agent.name, agent.release);
  const expected = await expectedSha256(agent.name, agent.release, download);
  logger.info("downloading", { url });
  const archive = await download(url);
  const actual = sha256Hex(archive);
  if (actual !== expected) {
    throw new ArtifactError(
      `checksum mismatch for ${archiveName(agent.name, agent.release)}: expected ${expected}, got ${actual}`,
    );
  }
  const binary = extractBinary(archive, agent.name);
  await fs.write(agent.binaryPath, binary, 0o755);
  logger.info("installed", { path: agent.binaryPath, version: agent.release.version });
  return { url, sha256: actual, size: binary.length };
}

// "Nomad v1.5.6\nBuildDate ..." -> "1.5.6"
export function parseVersionOutput(text: string): string | undefined {
  return text.match(/\bv(\d+\.\d+\.\d+\S*)/)?.[1];
}

export async function installedVersion(
  exec: ExecuteCode,
  fs: HostFs,
  agent: AgentState,
): Promise<string | undefined> {
  if (!(await fs.exists(agent.binaryPath))) return undefined;
  const { stdout, exit_code } = await exec({
    command: fs.resolve(agent.binaryPath),
    args: ["version"],
  });
  if (exit_code !== 0) return undefined;
  return parseVersionOutput(stdout);
}
