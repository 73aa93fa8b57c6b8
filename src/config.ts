import path from "node:path";
import os from "node:os";
import { mkdirSync } from "node:fs";
import type { PackKind } from "./manifest";

export type PackRoots = Record<PackKind, string>;

export type PackLayout = {
  installDirs: PackRoots;
  archiveDirs: PackRoots;
  serverPropertiesPath: string;
  worldsDir: string;
  scratchDir: string;
};

const cwd = path.resolve(process.env.PACK_SIDECAR_CWD ?? process.cwd());
const resolveFromCwd = (pathname: string): string => {
  return path.isAbsolute(pathname) ? pathname : path.resolve(cwd, pathname);
};
const dataDir = resolveFromCwd(process.env.DATA_DIR ?? "/data");
const archiveDir = resolveFromCwd(process.env.PACK_ARCHIVE_DIR ?? "/archive");

const packs: PackLayout = {
  installDirs: {
    behavior: resolveFromCwd(process.env.BEHAVIOR_PACKS_DIR ?? path.join(dataDir, "behavior_packs")),
    resource: resolveFromCwd(process.env.RESOURCE_PACKS_DIR ?? path.join(dataDir, "resource_packs")),
  },
  archiveDirs: {
    behavior: path.join(archiveDir, "behavior_packs"),
    resource: path.join(archiveDir, "resource_packs"),
  },
  serverPropertiesPath: resolveFromCwd(process.env.SERVER_PROPERTIES_PATH ?? path.join(dataDir, "server.properties")),
  worldsDir: resolveFromCwd(process.env.WORLDS_DIR ?? path.join(dataDir, "worlds")),
  scratchDir: resolveFromCwd(process.env.SCRATCH_DIR ?? os.tmpdir()),
};

export const config = {
  app: {
    logBufferLines: Number(process.env.LOG_BUFFER_LINES ?? 2_000),
  },
  packs,
} as const;

// Archive roots must exist before anything is saved; a failure here is fatal to startup.
export function ensureDirectories(layout: PackLayout = config.packs): void {
  mkdirSync(layout.archiveDirs.behavior, { recursive: true });
  mkdirSync(layout.archiveDirs.resource, { recursive: true });
  mkdirSync(layout.installDirs.behavior, { recursive: true });
  mkdirSync(layout.installDirs.resource, { recursive: true });
  mkdirSync(layout.scratchDir, { recursive: true });
}
