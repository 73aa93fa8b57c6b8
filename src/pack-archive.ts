import path from "node:path";
import type { Dirent } from "node:fs";
import { copyFile, mkdir, readdir, rename, rm } from "node:fs/promises";
import { type PackKind, readDescriptorFromArchive } from "./manifest";
import { isPackArchiveName } from "./zip";
import { type LogFn, errorCode, ioFailure, errorMessage, packDirName, sanitizeFilename, stripPackExtension } from "./utils";

export type SavedPack = {
  key: string;
  keyedBy: "manifest" | "filename";
  storedPath: string;
  packDir: string;
};

export type ArchivedPack = {
  kind: PackKind;
  dirName: string;
  dirPath: string;
  storedPath: string;
};

async function resolveArchiveKey(
  incomingFile: string,
  filename: string,
  log: LogFn,
): Promise<{ key: string; keyedBy: SavedPack["keyedBy"] }> {
  try {
    const descriptor = await readDescriptorFromArchive(incomingFile);
    if (descriptor.uuid) {
      return { key: descriptor.uuid, keyedBy: "manifest" };
    }
    log(`${filename} has no header uuid; archiving it under its filename.`, "warn");
  } catch (error) {
    log(`Could not read descriptor of ${filename} (${errorMessage(error)}); archiving it under its filename.`, "warn");
  }

  return { key: stripPackExtension(filename), keyedBy: "filename" };
}

// Saving the same uuid again replaces the stored file; each pack directory keeps exactly one archive.
export async function savePack(
  archiveRoot: string,
  incomingFile: string,
  kind: PackKind,
  log: LogFn,
  originalName = path.basename(incomingFile),
): Promise<SavedPack> {
  const sanitized = sanitizeFilename(originalName);
  const filename = isPackArchiveName(sanitized) ? sanitized : `${sanitized}.mcpack`;
  const { key, keyedBy } = await resolveArchiveKey(incomingFile, filename, log);
  const packDir = path.join(archiveRoot, packDirName(key));
  const storedPath = path.join(packDir, filename);
  const partPath = `${storedPath}.part`;

  try {
    await mkdir(packDir, { recursive: true });
  } catch (error) {
    throw ioFailure(`Could not create archive directory ${packDir}: ${errorMessage(error)}`);
  }

  try {
    await copyFile(incomingFile, partPath);
    await rename(partPath, storedPath);
  } catch (error) {
    await rm(partPath, { force: true });
    throw ioFailure(`Could not archive ${filename}: ${errorMessage(error)}`);
  }

  const entries = await readdir(packDir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && entry.name !== filename && isPackArchiveName(entry.name)) {
      await rm(path.join(packDir, entry.name), { force: true });
      log(`Replaced archived ${kind} pack file ${entry.name} with ${filename}.`, "info");
    }
  }

  log(`Archived ${kind} pack ${filename} as ${path.basename(packDir)}.`, "info");
  return { key, keyedBy, storedPath, packDir };
}

export async function listArchivedPacks(archiveRoot: string, kind: PackKind, log: LogFn): Promise<ArchivedPack[]> {
  let dirs: Dirent[];
  try {
    dirs = await readdir(archiveRoot, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw ioFailure(`Could not list archive root ${archiveRoot}: ${errorMessage(error)}`);
  }

  const packs: ArchivedPack[] = [];
  for (const dir of dirs.filter((entry) => entry.isDirectory()).sort((a, b) => a.name.localeCompare(b.name))) {
    const dirPath = path.join(archiveRoot, dir.name);
    let files: Dirent[];
    try {
      files = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      log(`Could not list archived ${kind} pack ${dir.name}: ${errorMessage(error)}`, "error");
      continue;
    }
    const stored = files
      .filter((entry) => entry.isFile() && isPackArchiveName(entry.name))
      .map((entry) => entry.name)
      .sort()[0];
    if (!stored) {
      continue;
    }

    packs.push({
      kind,
      dirName: dir.name,
      dirPath,
      storedPath: path.join(dirPath, stored),
    });
  }

  return packs;
}
