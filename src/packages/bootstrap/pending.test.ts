import { HostFs } from "./host-fs";
import {
  addRestart,
  clearReload,
  clearRestart,
  parsePending,
  PENDING_PATH,
  readPending,
  requireReload,
} from "./pending";
import { makeRoot, removeRoot } from "./test/fake-host";

describe("parsePending", () => {
  it("keeps known agents and reasons", () => {
    expect(
      parsePending('{"reload":true,"restart":{"nomad":["unit","binary","later"],"vault":["config"]}}'),
    ).toEqual({ reload: true, restart: { nomad: ["binary", "unit"] } });
  });

  it("rejects anything else", () => {
    expect(parsePending("{")).toBeUndefined();
    expect(parsePending("[]")).toBeUndefined();
    expect(parsePending('{"reload":"yes","restart":{}}')).toBeUndefined();
    expect(parsePending('{"reload":false,"restart":{"nomad":"config"}}')).toBeUndefined();
  });
});

describe("pending actions", () => {
  let root: string;
  let fs: HostFs;

  beforeEach(async () => {
    root = await makeRoot();
    fs = new HostFs(root);
  });

  afterEach(async () => {
    await removeRoot(root);
  });

  it("records actions and removes the file once all are done", async () => {
    expect(await readPending(fs)).toEqual({ reload: false, restart: {} });
    await addRestart(fs, "consul", "unit");
    await addRestart(fs, "consul", "config");
    await addRestart(fs, "consul", "unit");
    await requireReload(fs);
    expect(await fs.readText(PENDING_PATH)).toBe(
      '{"reload":true,"restart":{"consul":["config","unit"]}}\n',
    );

    await clearReload(fs);
    expect(await readPending(fs)).toEqual({ reload: false, restart: { consul: ["config", "unit"] } });
    await clearRestart(fs, "consul");
    expect(await fs.exists(PENDING_PATH)).toBe(false);
  });

  it("treats an unreadable file as everything pending", async () => {
    await fs.write(PENDING_PATH, "garbage");
    expect(await readPending(fs)).toEqual({
      reload: true,
      restart: { nomad: ["binary", "config", "unit"], consul: ["binary", "config", "unit"] },
    });
    await clearRestart(fs, "nomad");
    expect(await fs.readText(PENDING_PATH)).toBe(
      '{"reload":true,"restart":{"consul":["binary","config","unit"]}}\n',
    );
  });
});
