import path from "node:path";
import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { MANIFEST_FILENAME, readDescriptorFromDirectory } from "./manifest";
import { type LogFn, errorCode, errorMessage, ioFailure, packDirName, pathExists } from "./utils";

export type InstalledIndex = Map<string, string>;

async function readSubdirectories(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).sort((a, b) => a.name.localeCompare(b.name));
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw ioFailure(`Could not list ${dir}: ${errorMessage(error)}`);
  }
}

// uuid -> pack directory, rebuilt on every call.
export async function scanInstalledPacks(installDir: string, log: LogFn): Promise<InstalledIndex> {
  const installed: InstalledIndex = new Map();

  for (const dir of await readSubdirectories(installDir)) {
    const packPath = path.join(installDir, dir.name);
    try {
      const descriptor = await readDescriptorFromDirectory(packPath);
      if (!descriptor.uuid) {
        log(`No header uuid in ${dir.name}/${MANIFEST_FILENAME}; skipping.`, "warn");
        continue;
      }

      const previous = installed.get(descriptor.uuid);
      if (previous) {
        log(`Pack ${descriptor.uuid} is installed twice (${path.basename(previous)}, ${dir.name}); using ${dir.name}.`, "warn");
      }
      installed.set(descriptor.uuid, packPath);
    } catch (error) {
      log(`Could not read ${MANIFEST_FILENAME} in ${dir.name}: ${errorMessage(error)}`, "warn");
    }
  }

  return installed;
}

export async function listInstalledNames(installDir: string): Promise<string[]> {
  const dirs = await readSubdirectories(installDir);
  return dirs.map((dir) => dir.name);
}

export async function resolveInstallTarget(
  installDir: string,
  uuid: string,
  baseName: string,
  installed: InstalledIndex,
): Promise<string> {
  const existing = installed.get(uuid);
  if (existing) {
    return existing;
  }

  const preferred = path.join(installDir, packDirName(baseName));
  if (!(await pathExists(preferred))) {
    return preferred;
  }
  return path.join(installDir, `${packDirName(baseName)}_${packDirName(uuid)}`);
}

// Packs that wrap their files in one top-level folder are installed from that folder.
export async function resolvePackRoot(extractedDir: string): Promise<string | null> {
  if (await pathExists(path.join(extractedDir, MANIFEST_FILENAME))) {
    return extractedDir;
  }

  const subdirectories = await readSubdirectories(extractedDir);
  if (subdirectories.length !== 1) {
    return null;
  }

  const nested = path.join(extractedDir, subdirectories[0].name);
  return (await pathExists(path.join(nested, MANIFEST_FILENAME))) ? nested : null;
}
