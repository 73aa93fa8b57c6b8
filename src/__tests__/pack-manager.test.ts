import path from "node:path";
import { readdir, readFile, rm } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type PackLayout, ensureDirectories } from "../config";
import { scanInstalledPacks } from "../installed-packs";
import { PackManager } from "../pack-manager";
import { AppError, pathExists } from "../utils";
import { buildPack, buildZip, collectLog, createLayout, makeTempDir, manifestText, writeFileAt } from "./helpers";

describe("PackManager", () => {
  let root: string;
  let layout: PackLayout;
  let events: { event: string; payload: unknown }[];
  let manager: PackManager;

  beforeEach(async () => {
    root = await makeTempDir();
    layout = createLayout(root);
    ensureDirectories(layout);
    events = [];
    manager = new PackManager((event, payload) => {
      events.push({ event, payload });
    }, layout);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function uploadComposite(entries: Record<string, string | Buffer>): Promise<string> {
    return await writeFileAt(path.join(root, "uploads", "addon.mcaddon"), await buildZip(entries));
  }

  describe("ingestUpload", () => {
    it("archives and installs a nested behavior pack", async () => {
      const upload = await uploadComposite({ "packs/behavior/a.mcpack": await buildPack("X") });

      const result = await manager.ingestUpload(upload);

      expect(result.packs).toEqual([
        {
          source: path.join("packs", "behavior", "a.mcpack"),
          kind: "behavior",
          classifiedBy: "modules",
          status: "installed",
          uuid: "X",
          storedPath: path.join(layout.archiveDirs.behavior, "X", "a.mcpack"),
          installedPath: path.join(layout.installDirs.behavior, "a"),
          error: null,
          message: null,
        },
      ]);
      expect(await readFile(path.join(layout.installDirs.behavior, "a", "manifest.json"), "utf8")).toBe(manifestText("X"));
      expect(await manager.listInstalled()).toEqual({ behavior: ["a"], resource: [] });
    });

    it("classifies by declared module type and warns on path fallback", async () => {
      const upload = await uploadComposite({
        "behavior/textures.mcpack": await buildPack("R1", ["resources"]),
        "resource_stuff/skins.mcpack": await buildPack("S1", ["skin_pack"]),
      });

      const result = await manager.ingestUpload(upload);

      expect(result.packs.map((pack) => [pack.uuid, pack.kind, pack.classifiedBy])).toEqual([
        ["R1", "resource", "modules"],
        ["S1", "resource", "path"],
      ]);
      expect(await pathExists(path.join(layout.archiveDirs.resource, "R1", "textures.mcpack"))).toBe(true);
      expect(manager.recentLogs().some((line) => line.includes("[warn] No recognised module type in resource_stuff"))).toBe(true);
    });

    it("reports a broken nested pack without stopping its siblings", async () => {
      const upload = await uploadComposite({
        "packs/bad.mcpack": "not a zip at all",
        "packs/good.mcpack": await buildPack("GOOD"),
      });

      const result = await manager.ingestUpload(upload);

      expect(result.packs.map((pack) => [pack.source, pack.status, pack.error])).toEqual([
        [path.join("packs", "bad.mcpack"), "failed", "parse_error"],
        [path.join("packs", "good.mcpack"), "installed", null],
      ]);
      expect(result.packs[0].storedPath).toBe(path.join(layout.archiveDirs.behavior, "bad", "bad.mcpack"));
      expect([...(await scanInstalledPacks(layout.installDirs.behavior, () => undefined)).keys()]).toEqual(["GOOD"]);
    });

    it("installs a bare pack upload as a single pack", async () => {
      const upload = await writeFileAt(path.join(root, "uploads", "solo.mcpack"), await buildPack("SOLO"));

      const result = await manager.ingestUpload(upload);

      expect(result.packs).toHaveLength(1);
      expect(result.packs[0]).toMatchObject({ source: "solo.mcpack", status: "installed", uuid: "SOLO" });
      expect(await pathExists(path.join(layout.installDirs.behavior, "solo", "manifest.json"))).toBe(true);
    });

    it("installs a bare pack upload that wraps its files in one folder", async () => {
      const upload = await writeFileAt(
        path.join(root, "uploads", "solo.mcpack"),
        await buildZip({
          "Castle/manifest.json": manifestText("W1"),
          "Castle/entities/sheep.json": '{"id":"W1"}',
        }),
      );

      const result = await manager.ingestUpload(upload);

      expect(result.packs).toEqual([
        {
          source: "solo.mcpack",
          kind: "behavior",
          classifiedBy: "modules",
          status: "installed",
          uuid: "W1",
          storedPath: path.join(layout.archiveDirs.behavior, "W1", "solo.mcpack"),
          installedPath: path.join(layout.installDirs.behavior, "solo"),
          error: null,
          message: null,
        },
      ]);
      expect(await readFile(path.join(layout.installDirs.behavior, "solo", "manifest.json"), "utf8")).toBe(manifestText("W1"));
    });

    it("keys a pack with a buried manifest by filename rather than a uuid it cannot install", async () => {
      const upload = await uploadComposite({
        "packs/deep.mcpack": await buildZip({ "a/b/manifest.json": manifestText("D2") }),
      });

      const result = await manager.ingestUpload(upload);
      const restored = await manager.restoreMissing();

      expect(result.packs.map((pack) => [pack.status, pack.uuid, pack.storedPath, pack.error])).toEqual([
        ["failed", null, path.join(layout.archiveDirs.behavior, "deep", "deep.mcpack"), "not_found"],
      ]);
      expect(await pathExists(path.join(layout.archiveDirs.behavior, "D2"))).toBe(false);
      expect(restored.map((outcome) => [outcome.dirName, outcome.status, outcome.uuid, outcome.error])).toEqual([
        ["deep", "failed", null, "not_found"],
      ]);
    });

    it("re-uploading a uuid overwrites its archive and install in place", async () => {
      const { log } = collectLog();
      await manager.ingestUpload(await uploadComposite({ "bp/castle.mcpack": await buildPack("CASTLE") }));
      await manager.ingestUpload(await uploadComposite({ "bp/castle-v2.mcpack": await buildPack("CASTLE") }));

      expect(await readdir(path.join(layout.archiveDirs.behavior, "CASTLE"))).toEqual(["castle-v2.mcpack"]);
      expect(await manager.listInstalled()).toEqual({ behavior: ["castle"], resource: [] });
      expect((await scanInstalledPacks(layout.installDirs.behavior, log)).get("CASTLE")).toBe(
        path.join(layout.installDirs.behavior, "castle"),
      );
    });

    it("fails the whole upload when the composite is not a zip", async () => {
      const upload = await writeFileAt(path.join(root, "uploads", "junk.mcaddon"), "junk");

      await expect(manager.ingestUpload(upload)).rejects.toBeInstanceOf(AppError);
      await expect(manager.ingestUpload(upload)).rejects.toMatchObject({ status: 400, kind: "parse_error" });
    });

    it("removes every scratch workspace", async () => {
      const upload = await uploadComposite({
        "packs/bad.mcpack": "broken",
        "packs/good.mcpack": await buildPack("CLEAN"),
      });

      await manager.ingestUpload(upload);

      expect(await readdir(layout.scratchDir)).toEqual([]);
    });
  });

  describe("restoreMissing", () => {
    it("restores a wiped pack and is a no-op the second time", async () => {
      await writeFileAt(path.join(layout.archiveDirs.behavior, "U1", "castle.mcpack"), await buildPack("U1"));

      const first = await manager.restoreMissing();
      const second = await manager.restoreMissing();

      expect(first).toEqual([
        {
          kind: "behavior",
          dirName: "U1",
          uuid: "U1",
          status: "restored",
          installedPath: path.join(layout.installDirs.behavior, "castle"),
          error: null,
          message: null,
        },
      ]);
      expect(second.map((outcome) => outcome.status)).toEqual(["present"]);
      expect((await scanInstalledPacks(layout.installDirs.behavior, () => undefined)).has("U1")).toBe(true);
      expect(await readdir(layout.scratchDir)).toEqual([]);
    });

    it("restores into a missing install root", async () => {
      await rm(layout.installDirs.resource, { recursive: true, force: true });
      await writeFileAt(path.join(layout.archiveDirs.resource, "R9", "textures.zip"), await buildPack("R9", ["resources"]));

      const outcomes = await manager.restoreMissing();

      expect(outcomes.map((outcome) => [outcome.kind, outcome.status])).toEqual([["resource", "restored"]]);
      expect(await manager.listInstalled()).toEqual({ behavior: [], resource: ["textures"] });
    });

    it("logs a corrupted archive and moves on to the next pack", async () => {
      await writeFileAt(path.join(layout.archiveDirs.behavior, "AAA", "broken.mcpack"), "corrupted bytes");
      await writeFileAt(path.join(layout.archiveDirs.behavior, "BBB", "good.mcpack"), await buildPack("BBB"));

      const outcomes = await manager.restoreMissing();

      expect(outcomes.map((outcome) => [outcome.dirName, outcome.status, outcome.error])).toEqual([
        ["AAA", "failed", "parse_error"],
        ["BBB", "restored", null],
      ]);
      expect(manager.recentLogs().some((line) => line.includes("[warn] Restore of behavior/AAA failed"))).toBe(true);
    });

    it("leaves a pack that is already installed untouched", async () => {
      await writeFileAt(path.join(layout.archiveDirs.behavior, "KEEP", "keep.mcpack"), await buildPack("KEEP"));
      await writeFileAt(path.join(layout.installDirs.behavior, "custom-name", "manifest.json"), manifestText("KEEP"));

      const outcomes = await manager.restoreMissing();

      expect(outcomes[0]).toMatchObject({ status: "present", installedPath: path.join(layout.installDirs.behavior, "custom-name") });
      expect(await manager.listInstalled()).toEqual({ behavior: ["custom-name"], resource: [] });
    });
  });

  describe("listActive", () => {
    async function writeWorld(files: Record<string, string>): Promise<void> {
      await writeFileAt(layout.serverPropertiesPath, "level-name=MyWorld\n# comment\n");
      for (const [name, content] of Object.entries(files)) {
        await writeFileAt(path.join(layout.worldsDir, "MyWorld", name), content);
      }
    }

    it("reports only installed declarations using the British behavior file", async () => {
      await writeFileAt(path.join(layout.installDirs.behavior, "bp", "manifest.json"), manifestText("B1"));
      await writeFileAt(path.join(layout.installDirs.resource, "rp", "manifest.json"), manifestText("R1", ["resources"]));
      await writeWorld({
        "world_behaviour_packs.json": JSON.stringify([
          { pack_id: "GONE", version: [1, 0, 0] },
          { pack_id: "B1", version: [1, 0, 0] },
        ]),
        "world_resource_packs.json": JSON.stringify([{ pack_id: "R1", version: [2, 1, 0] }]),
      });

      expect(await manager.listActive()).toEqual({
        behavior: [{ pack_id: "B1", version: [1, 0, 0] }],
        resource: [{ pack_id: "R1", version: [2, 1, 0] }],
      });
      expect(manager.recentLogs().some((line) => line.endsWith("[warn] Installed addon not found for pack_id: GONE"))).toBe(true);
    });

    it("fails with not found when the resource declaration is missing", async () => {
      await writeWorld({ "world_behavior_packs.json": "[]" });

      await expect(manager.listActive()).rejects.toMatchObject({ kind: "not_found", status: 404 });
    });
  });

  it("broadcasts every log line", async () => {
    await manager.restoreMissing();

    expect(events).toEqual([
      {
        event: "pack.log",
        payload: {
          line: manager.recentLogs()[0],
          level: "info",
        },
      },
    ]);
    expect(manager.recentLogs()[0]).toMatch(/\[info\] Pack restore finished: 0 restored, 0 failed, 0 archived\.$/);
  });
});
