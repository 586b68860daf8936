/*
Run an external command and collect its output.

All host mutations in clusterboot go through a function with this shape, so
tests can hand the bootstrapper a fake instead of touching apt or systemd.
*/

import { spawn } from "node:child_process";
import getLogger from "./logger";

const logger = getLogger("execute-code");

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_OUTPUT = 1_000_000;

export type ExecuteCodeOptions = {
  command: string;
  args?: string[];
  env?: NodeJS.ProcessEnv;
  // milliseconds; 0 disables the timeout
  timeout?: number;
  // throw ExecuteCodeError when the command exits non-zero
  err_on_exit?: boolean;
};

export type ExecuteCodeOutput = {
  stdout: string;
  stderr: string;
  exit_code: number;
  timed_out?: boolean;
};

export type ExecuteCode = (opts: ExecuteCodeOptions) => Promise<ExecuteCodeOutput>;

export class ExecuteCodeError extends Error {
  command: string;
  args: string[];
  exit_code: number;
  stderr: string;

  constructor(opts: ExecuteCodeOptions, output: ExecuteCodeOutput) {
    const args = opts.args ?? [];
    const reason = output.timed_out
      ? `timed out after ${opts.timeout ?? DEFAULT_TIMEOUT_MS}ms`
      : `exited with code ${output.exit_code}`;
    const detail = output.stderr.trim() || output.stdout.trim();
    super(
      `${[opts.command, ...args].join(" ")} ${reason}${detail ? `: ${detail.slice(0, 500)}` : ""}`,
    );
    this.name = "ExecuteCodeError";
    this.command = opts.command;
    this.args = args;
    this.exit_code = output.exit_code;
    this.stderr = output.stderr;
  }
}

function append(buffer: string, chunk: Buffer | string): string {
  if (buffer.length >= MAX_OUTPUT) return buffer;
  return buffer + (typeof chunk === "string" ? chunk : chunk.toString("utf8"));
}

function killGroup(pid: number | undefined, command: string): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    // the group is already gone
    logger.debug("kill failed", { command, pid, err: `${err}` });
  }
}

export async function executeCode(opts: ExecuteCodeOptions): Promise<ExecuteCodeOutput> {
  const args = opts.args ?? [];
  const timeout = opts.timeout ?? DEFAULT_TIMEOUT_MS;
  const output = await new Promise<ExecuteCodeOutput>((resolve, reject) => {
    // own process group, so a timeout also kills whatever the command started
    const child = spawn(opts.command, args, {
      env: opts.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    if (timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        killGroup(child.pid, opts.command);
        child.stdout.destroy();
        child.stderr.destroy();
      }, timeout);
    }
    child.stdout.on("data", (chunk) => {
      stdout = append(stdout, chunk);
    });
    child.stderr.on("data", (chunk) => {
      stderr = append(stderr, chunk);
    });
    child.on("error", (err) => {
      if (timer) clearTimeout(timer);
      reject(err);
    });
    child.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exit_code: timedOut ? 124 : code ?? 1,
        timed_out: timedOut || undefined,
      });
    });
  });
  if (output.timed_out) {
    logger.warn("command timed out", { command: opts.command, args, timeout });
  }
  if (opts.err_on_exit && output.exit_code !== 0) {
    throw new ExecuteCodeError(opts, output);
  }
  return output;
}

export default executeCode;
