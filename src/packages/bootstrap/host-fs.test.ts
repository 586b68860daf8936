import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { HostFs, isNotFound } from "./host-fs";
import { makeRoot, removeRoot } from "./test/fake-host";

describe("HostFs", () => {
  let root: string;
  let fs: HostFs;

  beforeEach(async () => {
    root = await makeRoot();
    fs = new HostFs(root);
  });

  afterEach(async () => {
    await removeRoot(root);
  });

  it("maps managed paths under the root", () => {
    expect(fs.resolve("/etc/nomad.d/nomad.hcl")).toBe(join(root, "etc/nomad.d/nomad.hcl"));
    expect(new HostFs().resolve("/etc/nomad.d")).toBe("/etc/nomad.d");
  });

  it("rejects relative and escaping paths", () => {
    expect(() => fs.resolve("etc/nomad.d")).toThrow("managed path must be absolute: 'etc/nomad.d'");
    expect(() => fs.resolve("/../outside")).toThrow("managed path escapes root: '/../outside'");
    expect(() => new HostFs("relative")).toThrow("root must be an absolute path: 'relative'");
  });

  it("writes atomically with the requested mode", async () => {
    await fs.write("/etc/consul.d/consul.hcl", "a = 1\n", 0o640);
    const path = join(root, "etc/consul.d/consul.hcl");
    expect(await readFile(path, "utf8")).toBe("a = 1\n");
    expect((await stat(path)).mode & 0o777).toBe(0o640);
    expect(await readdir(join(root, "etc/consul.d"))).toEqual(["consul.hcl"]);
  });

  it("writes text only when it changed and still fixes the mode", async () => {
    expect(await fs.writeTextIfChanged("/etc/x.conf", "one\n", 0o600)).toBe(true);
    expect(await fs.writeTextIfChanged("/etc/x.conf", "one\n", 0o600)).toBe(false);
    await fs.chmod("/etc/x.conf", 0o666);
    expect(await fs.writeTextIfChanged("/etc/x.conf", "one\n", 0o600)).toBe(false);
    expect(await fs.mode("/etc/x.conf")).toBe(0o600);
    expect(await fs.writeTextIfChanged("/etc/x.conf", "two\n", 0o600)).toBe(true);
    expect(await fs.readText("/etc/x.conf")).toBe("two\n");
  });

  it("reports missing paths as undefined", async () => {
    expect(await fs.readText("/missing")).toBeUndefined();
    expect(await fs.mode("/missing")).toBeUndefined();
    expect(await fs.exists("/missing")).toBe(false);
    expect(await fs.ensureDir("/opt/nomad/data")).toBe(true);
    expect(await fs.ensureDir("/opt/nomad/data")).toBe(false);
    expect(await fs.isDirectory("/opt/nomad")).toBe(true);
  });

  it("removes a file once", async () => {
    await fs.write("/var/lib/clusterboot/pending.json", "{}\n");
    expect(await fs.remove("/var/lib/clusterboot/pending.json")).toBe(true);
    expect(await fs.remove("/var/lib/clusterboot/pending.json")).toBe(false);
    expect(await fs.exists("/var/lib/clusterboot/pending.json")).toBe(false);
  });
});

describe("isNotFound", () => {
  it("matches on the error code alone", () => {
    // what fs rejects with when the error comes from another realm
    expect(isNotFound({ code: "ENOENT", message: "no such file or directory" })).toBe(true);
    expect(isNotFound(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFound({ code: "EACCES" })).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
    expect(isNotFound(null)).toBe(false);
  });
});
