#!/usr/bin/env node

import path from "node:path";

// Preserve the user's launch directory for relative path settings.
process.env.PACK_SIDECAR_CWD ??= process.cwd();

type Subcommand =
  | { name: "restore" }
  | { name: "ingest"; file: string }
  | { name: "installed" }
  | { name: "active" };

function printUsage(): void {
  console.log(
    [
      "Usage: pack-sidecar [--data-dir <dir>] [--archive-dir <dir>] <command>",
      "",
      "Commands:",
      "  restore          Reinstall archived packs missing from the install directories",
      "  ingest <file>    Archive and install every pack in an uploaded addon",
      "  installed        List installed behavior and resource pack directories",
      "  active           List the world's active addons that are installed",
    ].join("\n"),
  );
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return path.resolve(value);
}

function parseSubcommand(args: string[]): Subcommand {
  const [name, ...rest] = args;
  switch (name) {
    case "restore":
    case "installed":
    case "active":
      if (rest.length > 0) {
        throw new Error(`Unexpected argument for ${name}: ${rest[0]}`);
      }
      return { name };
    case "ingest": {
      const file = rest[0];
      if (!file || rest.length > 1) {
        throw new Error("ingest expects exactly one file.");
      }
      return { name, file: path.resolve(file) };
    }
    case undefined:
      throw new Error("Missing command.");
    default:
      throw new Error(`Unknown command: ${name}`);
  }
}

function applyCliArgs(argv: string[]): Subcommand {
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    }

    if (arg === "--data-dir") {
      process.env.DATA_DIR = requireValue(arg, argv[i + 1]);
      i += 1;
      continue;
    }

    if (arg.startsWith("--data-dir=")) {
      process.env.DATA_DIR = requireValue("--data-dir", arg.slice("--data-dir=".length));
      continue;
    }

    if (arg === "--archive-dir") {
      process.env.PACK_ARCHIVE_DIR = requireValue(arg, argv[i + 1]);
      i += 1;
      continue;
    }

    if (arg.startsWith("--archive-dir=")) {
      process.env.PACK_ARCHIVE_DIR = requireValue("--archive-dir", arg.slice("--archive-dir=".length));
      continue;
    }

    if (arg.startsWith("-")) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    positional.push(arg);
  }

  return parseSubcommand(positional);
}

async function main(): Promise<void> {
  let command: Subcommand;
  try {
    command = applyCliArgs(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid arguments.";
    console.error(message);
    printUsage();
    process.exit(1);
  }

  // Config reads the environment on load, so it is imported after the flags are applied.
  const { ensureDirectories } = await import("../src/config");
  const { PackManager } = await import("../src/pack-manager");
  const { AppError } = await import("../src/utils");

  const manager = new PackManager((event, payload) => {
    if (event === "pack.log" && typeof payload === "object" && payload !== null && "line" in payload) {
      console.error(String(payload.line));
    }
  });

  try {
    ensureDirectories(manager.layout);
    const restored = await manager.restoreMissing();

    let result: unknown;
    switch (command.name) {
      case "restore":
        result = { restored };
        break;
      case "ingest":
        result = await manager.ingestUpload(command.file);
        break;
      case "installed":
        result = await manager.listInstalled();
        break;
      case "active":
        result = await manager.listActive();
        break;
    }

    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    if (error instanceof AppError) {
      console.error(`${error.kind}: ${error.message}`);
    } else {
      console.error(error instanceof Error ? error.message : String(error));
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
