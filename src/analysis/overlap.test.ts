import { describe, expect, it } from "vitest";

import { changeSet, classified } from "../__tests__/analysis-fixtures.helpers.js";

import { detectOverlap, summarizeSiblingOverlaps } from "./overlap.js";

describe("detectOverlap", () => {
  it("reports exact collisions and skips app-level noise from the same objects", () => {
    const current = changeSet("C1", [
      classified("ZREPORT_A", ["APP1"], 0.5),
      classified("ZREPORT_B", ["APP1"], 0.5),
    ]);
    const sibling = changeSet("C2", [classified("ZREPORT_A", ["APP1"], 0.5)]);

    expect(detectOverlap(current, [sibling])).toEqual([
      {
        kind: "exact",
        object: { class: "R3TR", type: "PROG", name: "ZREPORT_A", key: "R3TR:PROG:ZREPORT_A" },
        conflictingChangeIds: ["C2"],
        appIds: ["APP1"],
      },
    ]);
  });

  it("reports app-level collisions with the shared apps only", () => {
    const current = changeSet("C1", [classified("ZX", ["APP1", "APP3"], 0.5)]);
    const sibling = changeSet("C2", [classified("ZY", ["APP1", "APP2"], 0.5)]);

    const findings = detectOverlap(current, [sibling]);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: "app-level",
      conflictingChangeIds: ["C2"],
      appIds: ["APP1"],
    });
  });

  it("never reports unowned objects at app level", () => {
    const current = changeSet("C1", [classified("ZU", [], 0.5)]);
    const sibling = changeSet("C2", [classified("ZV", [], 0.5)]);

    expect(detectOverlap(current, [sibling])).toEqual([]);
  });

  it("still reports unowned objects on exact collisions", () => {
    const current = changeSet("C1", [classified("ZU", [], 0.5)]);
    const sibling = changeSet("C2", [classified("ZU", [], 0.5)]);

    expect(detectOverlap(current, [sibling])).toMatchObject([
      { kind: "exact", conflictingChangeIds: ["C2"], appIds: [] },
    ]);
  });

  it("ignores siblings that carry the current change id", () => {
    const current = changeSet("C1", [classified("ZREPORT_A", ["APP1"], 0.5)]);

    expect(detectOverlap(current, [current])).toEqual([]);
  });

  it("lists every conflicting sibling in sorted order", () => {
    const current = changeSet("C1", [classified("ZREPORT_A", ["APP1"], 0.5)]);
    const siblings = [
      changeSet("C3", [classified("ZREPORT_A", ["APP1"], 0.5)]),
      changeSet("C2", [classified("ZREPORT_A", ["APP1"], 0.5)]),
    ];

    expect(detectOverlap(current, siblings)[0]?.conflictingChangeIds).toEqual(["C2", "C3"]);
  });

  it("emits at most one finding per object", () => {
    const current = changeSet("C1", [classified("ZX", ["APP1"], 0.5)]);
    const siblings = [
      changeSet("C2", [classified("ZX", ["APP1"], 0.5)]),
      changeSet("C3", [classified("ZY", ["APP1"], 0.5)]),
    ];

    const findings = detectOverlap(current, siblings);

    expect(findings).toHaveLength(1);
    expect(findings[0]?.kind).toBe("exact");
    expect(findings[0]?.conflictingChangeIds).toEqual(["C2"]);
  });
});

describe("summarizeSiblingOverlaps", () => {
  it("counts shared objects per sibling, most shared first", () => {
    const current = changeSet("C1", [
      classified("ZA", ["APP1"], 0.5),
      classified("ZB", ["APP1"], 0.5),
    ]);
    const siblings = [
      changeSet("C3", [classified("ZA", ["APP1"], 0.5)]),
      changeSet("C2", [classified("ZB", ["APP1"], 0.5), classified("ZA", ["APP1"], 0.5)]),
      changeSet("C4", [classified("ZC", ["APP1"], 0.5)]),
    ];

    expect(summarizeSiblingOverlaps(current, siblings)).toEqual([
      {
        changeId: "C2",
        sharedObjectCount: 2,
        sharedObjects: ["R3TR:PROG:ZA", "R3TR:PROG:ZB"],
      },
      { changeId: "C3", sharedObjectCount: 1, sharedObjects: ["R3TR:PROG:ZA"] },
    ]);
  });
});
