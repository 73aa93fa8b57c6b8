import path from "node:path";
import { access } from "node:fs/promises";

export type ErrorKind = "not_found" | "parse_error" | "io_failure" | "security_violation";

export type LogLevel = "info" | "warn" | "error";

export type LogFn = (line: string, level?: LogLevel) => void;

export class AppError extends Error {
  status: number;
  kind: ErrorKind;

  constructor(status: number, message: string, kind: ErrorKind) {
    super(message);
    this.status = status;
    this.kind = kind;
  }
}

export function notFound(message: string): AppError {
  return new AppError(404, message, "not_found");
}

export function parseError(message: string): AppError {
  return new AppError(422, message, "parse_error");
}

export function ioFailure(message: string): AppError {
  return new AppError(500, message, "io_failure");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

// Errors that already carry a kind pass through untouched.
export function toAppError(error: unknown, context: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = `${context}: ${errorMessage(error)}`;
  if (errorCode(error) === "ENOENT") {
    return notFound(message);
  }
  return ioFailure(message);
}

export function sanitizeFilename(value: string): string {
  const cleaned = value.replace(/[^a-zA-Z0-9._-]/g, "_");
  return path.basename(cleaned);
}

// Directory name under an archive root. Dot-only names would point at the root or its parent.
export function packDirName(value: string): string {
  const cleaned = sanitizeFilename(value);
  return /^\.*$/.test(cleaned) ? "_" : cleaned;
}

export function stripPackExtension(filename: string): string {
  return filename.replace(/\.(mcpack|zip)$/i, "");
}

export function timestampId(date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    "T",
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
    "Z",
  ].join("");
}

export async function pathExists(pathname: string): Promise<boolean> {
  try {
    await access(pathname);
    return true;
  } catch {
    return false;
  }
}

export function isWithinDirectory(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "" || relative === ".." || path.isAbsolute(relative)) {
    return false;
  }
  return !relative.startsWith(`..${path.sep}`);
}
