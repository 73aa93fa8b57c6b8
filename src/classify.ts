import type { PackDescriptor, PackKind } from "./manifest";

export type Classification = {
  kind: PackKind;
  source: "modules" | "path";
};

const MODULE_KINDS = new Map<string, PackKind>([
  ["resources", "resource"],
  ["data", "behavior"],
  ["script", "behavior"],
  ["javascript", "behavior"],
  ["client_data", "behavior"],
]);

export function classifyByModules(descriptor: PackDescriptor): PackKind | null {
  for (const packModule of descriptor.modules) {
    const kind = MODULE_KINDS.get(packModule.type.trim().toLowerCase());
    if (kind) {
      return kind;
    }
  }
  return null;
}

export function classifyByPath(relativePath: string): PackKind {
  return relativePath.toLowerCase().includes("resource") ? "resource" : "behavior";
}

export function classifyPack(descriptor: PackDescriptor | null, relativePath: string): Classification {
  const fromModules = descriptor ? classifyByModules(descriptor) : null;
  if (fromModules) {
    return { kind: fromModules, source: "modules" };
  }
  return { kind: classifyByPath(relativePath), source: "path" };
}
