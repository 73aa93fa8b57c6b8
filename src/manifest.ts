import path from "node:path";
import { readFile } from "node:fs/promises";
import JSZip from "jszip";
import { errorMessage, notFound, parseError, toAppError } from "./utils";

export type PackKind = "behavior" | "resource";

export const PACK_KINDS: readonly PackKind[] = ["behavior", "resource"];

export const MANIFEST_FILENAME = "manifest.json";

export type PackModule = {
  type: string;
  uuid: string | null;
};

export type PackDescriptor = {
  uuid: string;
  version: number[];
  modules: PackModule[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readVersion(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((part): part is number => Number.isInteger(part));
}

function readModules(value: unknown): PackModule[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const modules: PackModule[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.type !== "string") {
      continue;
    }
    modules.push({
      type: entry.type,
      uuid: typeof entry.uuid === "string" ? entry.uuid : null,
    });
  }
  return modules;
}

// A document without a header yields an empty uuid; callers decide whether that is acceptable.
export function parseDescriptor(text: string, source: string): PackDescriptor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (error) {
    throw parseError(`Invalid ${MANIFEST_FILENAME} in ${source}: ${errorMessage(error)}`);
  }

  if (!isRecord(parsed)) {
    throw parseError(`${MANIFEST_FILENAME} in ${source} is not a JSON object.`);
  }

  const header = isRecord(parsed.header) ? parsed.header : null;
  return {
    uuid: header && typeof header.uuid === "string" ? header.uuid.trim() : "",
    version: header ? readVersion(header.version) : [],
    modules: readModules(parsed.modules),
  };
}

export async function readDescriptorFromDirectory(dir: string): Promise<PackDescriptor> {
  const manifestPath = path.join(dir, MANIFEST_FILENAME);
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch (error) {
    throw toAppError(error, `Could not read ${manifestPath}`);
  }
  return parseDescriptor(text, dir);
}

export async function loadZip(archivePath: string): Promise<JSZip> {
  let data: Buffer;
  try {
    data = await readFile(archivePath);
  } catch (error) {
    throw toAppError(error, `Could not read archive ${archivePath}`);
  }

  try {
    return await JSZip.loadAsync(data, { createFolders: false });
  } catch (error) {
    throw parseError(`${path.basename(archivePath)} is not a readable zip archive: ${errorMessage(error)}`);
  }
}

// Same rule as an extracted pack root: a root manifest, or one inside the only top-level folder.
function findManifestEntry(zip: JSZip): JSZip.JSZipObject | null {
  const root = zip.files[MANIFEST_FILENAME];
  if (root && !root.dir) {
    return root;
  }

  const topFolders = new Set<string>();
  for (const name of Object.keys(zip.files)) {
    const separator = name.indexOf("/");
    if (separator > 0) {
      topFolders.add(name.slice(0, separator));
    }
  }
  if (topFolders.size !== 1) {
    return null;
  }

  const [folder] = topFolders;
  const wrapped = zip.files[`${folder}/${MANIFEST_FILENAME}`];
  return wrapped && !wrapped.dir ? wrapped : null;
}

export async function readDescriptorFromZip(zip: JSZip, source: string): Promise<PackDescriptor> {
  const entry = findManifestEntry(zip);
  if (!entry) {
    throw notFound(`No ${MANIFEST_FILENAME} at the top of ${source}.`);
  }

  const text = await entry.async("string");
  return parseDescriptor(text, `${source}:${entry.name}`);
}

export async function readDescriptorFromArchive(archivePath: string): Promise<PackDescriptor> {
  const zip = await loadZip(archivePath);
  return await readDescriptorFromZip(zip, path.basename(archivePath));
}
