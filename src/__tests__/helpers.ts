import path from "node:path";
import os from "node:os";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import JSZip from "jszip";
import type { PackLayout } from "../config";
import type { LogFn, LogLevel } from "../utils";

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), "pack-sidecar-test-"));
}

export function createLayout(root: string): PackLayout {
  return {
    installDirs: {
      behavior: path.join(root, "data", "behavior_packs"),
      resource: path.join(root, "data", "resource_packs"),
    },
    archiveDirs: {
      behavior: path.join(root, "archive", "behavior_packs"),
      resource: path.join(root, "archive", "resource_packs"),
    },
    serverPropertiesPath: path.join(root, "data", "server.properties"),
    worldsDir: path.join(root, "data", "worlds"),
    scratchDir: path.join(root, "scratch"),
  };
}

export function manifestText(uuid: string, moduleTypes: string[] = ["data"], version = [1, 0, 0]): string {
  return JSON.stringify({
    format_version: 2,
    header: { name: `pack ${uuid}`, uuid, version },
    modules: moduleTypes.map((type, index) => ({ type, uuid: `${uuid}-module-${index}`, version })),
  });
}

export async function buildZip(entries: Record<string, string | Buffer>, modes: Record<string, number> = {}): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content, { createFolders: false, unixPermissions: modes[name] });
  }
  return await zip.generateAsync({ type: "nodebuffer", platform: "UNIX" });
}

export async function buildPack(uuid: string, moduleTypes: string[] = ["data"]): Promise<Buffer> {
  return await buildZip({
    "manifest.json": manifestText(uuid, moduleTypes),
    "entities/sheep.json": `{"id":"${uuid}"}`,
  });
}

export async function writeFileAt(filePath: string, content: string | Buffer): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  return filePath;
}

export function collectLog(): { log: LogFn; lines: { line: string; level: LogLevel }[] } {
  const lines: { line: string; level: LogLevel }[] = [];
  return {
    lines,
    log: (line, level = "info") => {
      lines.push({ line, level });
    },
  };
}
