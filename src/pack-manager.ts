import path from "node:path";
import { mkdir, readdir, rm } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { classifyPack } from "./classify";
import { CommandBook } from "./commands";
import { type PackLayout, config } from "./config";
import { mergeDirectory } from "./copy-dir";
import { resolveInstallTarget, resolvePackRoot, scanInstalledPacks, listInstalledNames } from "./installed-packs";
import {
  MANIFEST_FILENAME,
  PACK_KINDS,
  type PackDescriptor,
  type PackKind,
  readDescriptorFromArchive,
  readDescriptorFromDirectory,
} from "./manifest";
import { type ArchivedPack, listArchivedPacks, savePack } from "./pack-archive";
import {
  AppError,
  type ErrorKind,
  type LogFn,
  type LogLevel,
  errorMessage,
  ioFailure,
  notFound,
  packDirName,
  parseError,
  sanitizeFilename,
  stripPackExtension,
  timestampId,
  toAppError,
} from "./utils";
import {
  type ActiveAddon,
  filterInstalledAddons,
  readActiveAddonDeclarations,
  resolveBehaviorDeclarationPath,
  resolveResourceDeclarationPath,
  resolveWorldFolder,
} from "./world";
import { extractZip, isPackArchiveName } from "./zip";

export type BroadcastFn = (event: string, payload: unknown) => void;

export type PackOutcome = {
  source: string;
  kind: PackKind;
  classifiedBy: "modules" | "path";
  status: "installed" | "failed";
  uuid: string | null;
  storedPath: string | null;
  installedPath: string | null;
  error: ErrorKind | null;
  message: string | null;
};

export type IngestResult = {
  packs: PackOutcome[];
};

export type RestoreOutcome = {
  kind: PackKind;
  dirName: string;
  uuid: string | null;
  status: "present" | "restored" | "failed";
  installedPath: string | null;
  error: ErrorKind | null;
  message: string | null;
};

export type InstalledPacks = Record<PackKind, string[]>;

export type ActivePacks = Record<PackKind, ActiveAddon[]>;

type InstalledCopy = {
  uuid: string | null;
  installedPath: string;
};

export class PackManager {
  private readonly logBuffer: string[] = [];
  private readonly broadcast: BroadcastFn;
  readonly layout: PackLayout;
  readonly commands = new CommandBook();
  private readonly log: LogFn = (line, level = "info") => {
    this.pushLog(line, level);
  };

  constructor(broadcast: BroadcastFn, layout: PackLayout = config.packs) {
    this.broadcast = broadcast;
    this.layout = layout;
  }

  recentLogs(): string[] {
    return [...this.logBuffer];
  }

  async listInstalled(): Promise<InstalledPacks> {
    const [behavior, resource] = await Promise.all([
      listInstalledNames(this.layout.installDirs.behavior),
      listInstalledNames(this.layout.installDirs.resource),
    ]);
    return { behavior, resource };
  }

  async listActive(): Promise<ActivePacks> {
    const worldDir = await resolveWorldFolder(this.layout.serverPropertiesPath, this.layout.worldsDir);
    const behaviorFile = await resolveBehaviorDeclarationPath(worldDir);
    const resourceFile = await resolveResourceDeclarationPath(worldDir);

    return {
      behavior: await this.resolveActiveAddons(behaviorFile, "behavior"),
      resource: await this.resolveActiveAddons(resourceFile, "resource"),
    };
  }

  // A pack that fails is reported and the pass moves on; the next run retries it.
  async restoreMissing(): Promise<RestoreOutcome[]> {
    const outcomes: RestoreOutcome[] = [];

    for (const kind of PACK_KINDS) {
      let archived: ArchivedPack[];
      try {
        archived = await listArchivedPacks(this.layout.archiveDirs[kind], kind, this.log);
      } catch (error) {
        this.pushLog(`Could not enumerate archived ${kind} packs: ${errorMessage(error)}`, "error");
        continue;
      }

      for (const pack of archived) {
        outcomes.push(await this.restoreArchivedPack(pack));
      }
    }

    const restored = outcomes.filter((outcome) => outcome.status === "restored").length;
    const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
    this.pushLog(`Pack restore finished: ${restored} restored, ${failed} failed, ${outcomes.length} archived.`, "info");
    return outcomes;
  }

  async ingestUpload(filePath: string, originalName = path.basename(filePath)): Promise<IngestResult> {
    const uploadName = sanitizeFilename(originalName);
    const workspace = await this.createWorkspace("upload");

    try {
      try {
        await extractZip(filePath, workspace, this.log);
      } catch (error) {
        throw new AppError(400, `Invalid addon archive ${uploadName}: ${errorMessage(error)}`, "parse_error");
      }

      const nested = await this.findNestedPacks(workspace);
      const packs: PackOutcome[] = [];
      if (nested.length === 0 && (await resolvePackRoot(workspace))) {
        packs.push(await this.ingestPackFile(filePath, uploadName));
      }

      for (const relativePath of nested) {
        packs.push(await this.ingestPackFile(path.join(workspace, relativePath), relativePath));
      }

      const installed = packs.filter((pack) => pack.status === "installed").length;
      this.pushLog(`Processed upload ${uploadName}: ${installed} of ${packs.length} packs installed.`, "info");
      return { packs };
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  }

  private async resolveActiveAddons(declarationFile: string, kind: PackKind): Promise<ActiveAddon[]> {
    const declarations = await readActiveAddonDeclarations(declarationFile, this.log);
    const installed = await scanInstalledPacks(this.layout.installDirs[kind], this.log);
    return filterInstalledAddons(declarations, installed, this.log);
  }

  private async restoreArchivedPack(pack: ArchivedPack): Promise<RestoreOutcome> {
    const label = `${pack.kind}/${pack.dirName}`;
    let uuid: string | null = null;

    try {
      const descriptor = await readDescriptorFromArchive(pack.storedPath);
      if (!descriptor.uuid) {
        throw parseError(`${path.basename(pack.storedPath)} has no header uuid.`);
      }
      uuid = descriptor.uuid;

      if (packDirName(uuid) !== pack.dirName) {
        this.pushLog(`Archived pack ${label} holds uuid ${uuid}; restoring by the stored file's uuid.`, "warn");
      }

      const installDir = this.layout.installDirs[pack.kind];
      const installed = await scanInstalledPacks(installDir, this.log);
      const existing = installed.get(uuid);
      if (existing) {
        this.pushLog(`Pack ${uuid} already installed at ${existing}.`, "info");
        return { kind: pack.kind, dirName: pack.dirName, uuid, status: "present", installedPath: existing, error: null, message: null };
      }

      this.pushLog(`Pack ${uuid} missing from ${installDir}; restoring from archive.`, "info");
      const copy = await this.installArchivedFile(pack.storedPath, pack.kind, uuid);
      this.pushLog(`Restored ${pack.kind} pack ${uuid} into ${copy.installedPath}.`, "info");
      return { kind: pack.kind, dirName: pack.dirName, uuid, status: "restored", installedPath: copy.installedPath, error: null, message: null };
    } catch (error) {
      const failure = toAppError(error, `Could not restore ${label}`);
      this.pushLog(`Restore of ${label} failed: ${failure.message}`, "warn");
      return { kind: pack.kind, dirName: pack.dirName, uuid, status: "failed", installedPath: null, error: failure.kind, message: failure.message };
    }
  }

  private async ingestPackFile(packPath: string, relativePath: string): Promise<PackOutcome> {
    let descriptor: PackDescriptor | null = null;
    try {
      descriptor = await readDescriptorFromArchive(packPath);
    } catch (error) {
      this.pushLog(`Could not read descriptor of ${relativePath}: ${errorMessage(error)}`, "warn");
    }

    const { kind, source } = classifyPack(descriptor, relativePath);
    if (source === "path") {
      this.pushLog(`No recognised module type in ${relativePath}; classified as ${kind} from its path.`, "warn");
    }

    const base = {
      source: relativePath,
      kind,
      classifiedBy: source,
    };

    let storedPath: string | null = null;
    try {
      const saved = await savePack(this.layout.archiveDirs[kind], packPath, kind, this.log, path.basename(relativePath));
      storedPath = saved.storedPath;
      const copy = await this.installArchivedFile(saved.storedPath, kind, descriptor?.uuid || null);
      this.pushLog(`Installed ${kind} pack ${relativePath} into ${copy.installedPath}.`, "info");
      return { ...base, status: "installed", uuid: copy.uuid, storedPath, installedPath: copy.installedPath, error: null, message: null };
    } catch (error) {
      const failure = toAppError(error, `Could not install ${relativePath}`);
      this.pushLog(`Pack ${relativePath} was not installed: ${failure.message}`, "warn");
      return {
        ...base,
        status: "failed",
        uuid: descriptor?.uuid || null,
        storedPath,
        installedPath: null,
        error: failure.kind,
        message: failure.message,
      };
    }
  }

  // With a known uuid the install only counts once a fresh scan finds it.
  private async installArchivedFile(storedPath: string, kind: PackKind, expectedUuid: string | null): Promise<InstalledCopy> {
    const workspace = await this.createWorkspace("install");

    try {
      await extractZip(storedPath, workspace, this.log);
      const packRoot = await resolvePackRoot(workspace);
      if (!packRoot) {
        throw notFound(`No ${MANIFEST_FILENAME} at the top of ${path.basename(storedPath)}.`);
      }

      const descriptor = await readDescriptorFromDirectory(packRoot);
      const uuid = descriptor.uuid || expectedUuid;
      const baseName = stripPackExtension(path.basename(storedPath));
      const installDir = this.layout.installDirs[kind];
      const target = await resolveInstallTarget(installDir, uuid ?? baseName, baseName, await scanInstalledPacks(installDir, this.log));
      await mergeDirectory(packRoot, target);

      if (uuid) {
        const installed = await scanInstalledPacks(installDir, this.log);
        if (!installed.has(uuid)) {
          throw ioFailure(`Pack ${uuid} is still missing from ${installDir} after copying.`);
        }
      }

      return { uuid, installedPath: target };
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  }

  private async findNestedPacks(root: string, relative = ""): Promise<string[]> {
    const entries = await readdir(path.join(root, relative), { withFileTypes: true });
    const found: string[] = [];

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const entryPath = relative ? path.join(relative, entry.name) : entry.name;
      if (entry.isDirectory()) {
        found.push(...(await this.findNestedPacks(root, entryPath)));
      } else if (entry.isFile() && isPackArchiveName(entry.name)) {
        found.push(entryPath);
      }
    }

    return found;
  }

  private async createWorkspace(prefix: string): Promise<string> {
    const workspace = path.join(this.layout.scratchDir, `${prefix}-${timestampId()}-${randomUUID()}`);
    await mkdir(workspace, { recursive: true });
    return workspace;
  }

  private pushLog(line: string, level: LogLevel): void {
    const stamped = `${new Date().toISOString()} [${level}] ${line}`;
    this.logBuffer.push(stamped);

    if (this.logBuffer.length > config.app.logBufferLines) {
      this.logBuffer.splice(0, this.logBuffer.length - config.app.logBufferLines);
    }

    this.broadcast("pack.log", {
      line: stamped,
      level,
    });
  }
}
