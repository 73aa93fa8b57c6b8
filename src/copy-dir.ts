import { cp, mkdir } from "node:fs/promises";
import { toAppError } from "./utils";

// Files only present in destination are left alone.
export async function mergeDirectory(source: string, destination: string): Promise<void> {
  try {
    await mkdir(destination, { recursive: true });
    await cp(source, destination, { recursive: true, force: true });
  } catch (error) {
    throw toAppError(error, `Could not copy ${source} into ${destination}`);
  }
}
