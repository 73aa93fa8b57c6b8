import path from "node:path";
import { chmod, mkdir, realpath } from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type JSZip from "jszip";
import { loadZip } from "./manifest";
import { type ErrorKind, type LogFn, isWithinDirectory, toAppError } from "./utils";

const PACK_ARCHIVE_EXTENSIONS = [".mcpack", ".zip"];

export type SkippedEntry = {
  entry: string;
  reason: ErrorKind;
  message: string;
};

export type ExtractionReport = {
  written: string[];
  skipped: SkippedEntry[];
};

export function isPackArchiveName(name: string): boolean {
  const lower = name.toLowerCase();
  return PACK_ARCHIVE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function entryMode(entry: JSZip.JSZipObject): number | null {
  const mode = entry.unixPermissions;
  if (typeof mode !== "number") {
    return null;
  }
  const bits = mode & 0o777;
  return bits > 0 ? bits : null;
}

export function resolveEntryPath(root: string, entryName: string): string | null {
  const normalized = entryName.replace(/\\/g, "/");
  if (normalized.startsWith("/") || /^[a-zA-Z]:/.test(normalized)) {
    return null;
  }

  const trimmed = normalized.replace(/\/+$/, "");
  if (!trimmed) {
    return null;
  }

  const target = path.resolve(root, ...trimmed.split("/"));
  return isWithinDirectory(root, target) ? target : null;
}

async function writeEntry(entry: JSZip.JSZipObject, target: string): Promise<void> {
  await mkdir(path.dirname(target), { recursive: true });
  const mode = entryMode(entry);
  await pipeline(entry.nodeStream("nodebuffer"), createWriteStream(target, { flags: "w", mode: mode ?? 0o644 }));
  if (mode !== null) {
    await chmod(target, mode);
  }
}

// A failing entry is reported and skipped; the rest of the archive is still extracted.
export async function extractZip(archivePath: string, targetDir: string, log: LogFn): Promise<ExtractionReport> {
  const zip = await loadZip(archivePath);

  await mkdir(targetDir, { recursive: true });
  const root = await realpath(targetDir);
  const report: ExtractionReport = { written: [], skipped: [] };

  for (const entry of Object.values(zip.files)) {
    const entryName = entry.unsafeOriginalName ?? entry.name;
    const target = resolveEntryPath(root, entryName);
    if (!target) {
      const message = `Illegal path in ${path.basename(archivePath)}: ${entryName}`;
      log(message, "warn");
      report.skipped.push({ entry: entryName, reason: "security_violation", message });
      continue;
    }

    try {
      if (entry.dir) {
        const mode = entryMode(entry);
        await mkdir(target, { recursive: true });
        if (mode !== null) {
          await chmod(target, mode | 0o700);
        }
        continue;
      }

      await writeEntry(entry, target);
      report.written.push(path.relative(root, target));
    } catch (error) {
      const failure = toAppError(error, `Could not extract ${entryName}`);
      log(failure.message, "warn");
      report.skipped.push({ entry: entryName, reason: failure.kind, message: failure.message });
    }
  }

  return report;
}
