import path from "node:path";
import { readFile } from "node:fs/promises";
import type { InstalledIndex } from "./installed-packs";
import { type LogFn, notFound, parseError, pathExists, toAppError } from "./utils";

export type ActiveAddon = {
  pack_id: string;
  version: number[];
};

export const BEHAVIOR_DECLARATION_FILES = ["world_behavior_packs.json", "world_behaviour_packs.json"] as const;
export const RESOURCE_DECLARATION_FILE = "world_resource_packs.json";

export function parseLevelName(text: string): string {
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    if (line.startsWith("level-name=")) {
      const levelName = line.slice(line.indexOf("=") + 1).trim();
      if (!levelName) {
        throw notFound("level-name is empty in server properties.");
      }
      return levelName;
    }
  }

  throw notFound("level-name not found in server properties.");
}

export async function resolveWorldFolder(propertiesPath: string, worldsDir: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(propertiesPath, "utf8");
  } catch (error) {
    throw toAppError(error, `Could not read ${propertiesPath}`);
  }
  return path.join(worldsDir, parseLevelName(text));
}

export async function resolveBehaviorDeclarationPath(worldDir: string): Promise<string> {
  for (const name of BEHAVIOR_DECLARATION_FILES) {
    const candidate = path.join(worldDir, name);
    if (await pathExists(candidate)) {
      return candidate;
    }
  }
  throw notFound(`${BEHAVIOR_DECLARATION_FILES[0]} not found in ${worldDir}.`);
}

export async function resolveResourceDeclarationPath(worldDir: string): Promise<string> {
  const candidate = path.join(worldDir, RESOURCE_DECLARATION_FILE);
  if (!(await pathExists(candidate))) {
    throw notFound(`${RESOURCE_DECLARATION_FILE} not found in ${worldDir}.`);
  }
  return candidate;
}

export async function readActiveAddonDeclarations(file: string, log: LogFn): Promise<ActiveAddon[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw parseError(`Invalid JSON in ${path.basename(file)}: ${error.message}`);
    }
    throw toAppError(error, `Could not read ${file}`);
  }

  if (!Array.isArray(parsed)) {
    throw parseError(`${path.basename(file)} must contain a JSON array.`);
  }

  const declarations: ActiveAddon[] = [];
  for (const item of parsed) {
    if (typeof item !== "object" || item === null || !("pack_id" in item) || typeof item.pack_id !== "string") {
      log(`Ignoring malformed entry in ${path.basename(file)}: ${JSON.stringify(item)}`, "warn");
      continue;
    }

    const version = "version" in item && Array.isArray(item.version) ? item.version : [];
    declarations.push({
      pack_id: item.pack_id,
      version: version.filter((part: unknown): part is number => Number.isInteger(part)),
    });
  }

  return declarations;
}

export function filterInstalledAddons(declarations: ActiveAddon[], installed: InstalledIndex, log: LogFn): ActiveAddon[] {
  const active: ActiveAddon[] = [];
  for (const declaration of declarations) {
    if (installed.has(declaration.pack_id)) {
      active.push(declaration);
    } else {
      log(`Installed addon not found for pack_id: ${declaration.pack_id}`, "warn");
    }
  }
  return active;
}
