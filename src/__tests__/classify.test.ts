import { describe, expect, it } from "vitest";
import { classifyPack } from "../classify";
import type { PackDescriptor } from "../manifest";

const descriptor = (...types: string[]): PackDescriptor => ({
  uuid: "u",
  version: [1, 0, 0],
  modules: types.map((type) => ({ type, uuid: null })),
});

describe("classifyPack", () => {
  it("uses declared module types ahead of the path", () => {
    expect(classifyPack(descriptor("resources"), "packs/behavior/a.mcpack")).toEqual({ kind: "resource", source: "modules" });
    expect(classifyPack(descriptor("script", "data"), "packs/resource/b.mcpack")).toEqual({ kind: "behavior", source: "modules" });
  });

  it("falls back to the path when no module type is recognised", () => {
    expect(classifyPack(descriptor("skin_pack"), "Packs/Resource/c.mcpack")).toEqual({ kind: "resource", source: "path" });
    expect(classifyPack(null, "packs/d.mcpack")).toEqual({ kind: "behavior", source: "path" });
  });
});
