/*
Filesystem access for managed paths.

Managed paths are always written as they appear on the target host
("/etc/nomad.d/nomad.hcl").  HostFs maps them under a root directory, which
is "/" in production and a scratch directory when staging or testing.
*/

import {
  chmod,
  copyFile,
  mkdir,
  readFile,
  rename,
  stat,
  unlink,
  writeFile,
} from "node:fs/promises";
import { dirname, isAbsolute, join, relative } from "node:path";

export class HostFs {
  readonly root: string;

  constructor(root = "/") {
    if (!isAbsolute(root)) {
      throw new Error(`root must be an absolute path: '${root}'`);
    }
    this.root = root;
  }

  resolve = (path: string): string => {
    if (!isAbsolute(path)) {
      throw new Error(`managed path must be absolute: '${path}'`);
    }
    if (this.root === "/") return path;
    const resolved = join(this.root, path);
    if (relative(this.root, resolved).startsWith("..")) {
      throw new Error(`managed path escapes root: '${path}'`);
    }
    return resolved;
  };

  exists = async (path: string): Promise<boolean> => {
    try {
      await stat(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  };

  isDirectory = async (path: string): Promise<boolean> => {
    try {
      return (await stat(this.resolve(path))).isDirectory();
    } catch {
      return false;
    }
  };

  readText = async (path: string): Promise<string | undefined> => {
    try {
      return await readFile(this.resolve(path), "utf8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  };

  // permission bits, or undefined when the path does not exist
  mode = async (path: string): Promise<number | undefined> => {
    try {
      return (await stat(this.resolve(path))).mode & 0o7777;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  };

  ensureDir = async (path: string, mode = 0o755): Promise<boolean> => {
    if (await this.isDirectory(path)) return false;
    await mkdir(this.resolve(path), { recursive: true, mode });
    return true;
  };

  chmod = async (path: string, mode: number): Promise<void> => {
    await chmod(this.resolve(path), mode);
  };

  // Write through a temporary file and rename, so readers never see a partial file.
  write = async (path: string, content: string | Uint8Array, mode = 0o644): Promise<void> => {
    const target = this.resolve(path);
    await mkdir(dirname(target), { recursive: true });
    const tmp = `${target}.tmp-${process.pid}`;
    try {
      await writeFile(tmp, content, { mode });
      await chmod(tmp, mode);
      await rename(tmp, target);
    } catch (err) {
      await unlink(tmp).catch(() => undefined);
      throw err;
    }
  };

  // Returns true when the file content changed.
  writeTextIfChanged = async (
    path: string,
    content: string,
    mode = 0o644,
  ): Promise<boolean> => {
    const current = await this.readText(path);
    if (current === content) {
      if ((await this.mode(path)) !== mode) {
        await this.chmod(path, mode);
      }
      return false;
    }
    await this.write(path, content, mode);
    return true;
  };

  copy = async (from: string, to: string): Promise<void> => {
    await copyFile(this.resolve(from), this.resolve(to));
  };

  // Returns false when there was nothing to remove.
  remove = async (path: string): Promise<boolean> => {
    try {
      await unlink(this.resolve(path));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  };
}

// fs errors are not always `instanceof Error` (e.g. across vm contexts),
// so only the code is checked
export function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
