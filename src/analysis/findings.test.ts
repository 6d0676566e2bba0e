import { describe, expect, it } from "vitest";

import { changeSet, classified } from "../__tests__/analysis-fixtures.helpers.js";
import { createCatalogSnapshot } from "../catalog/snapshot.js";
import { ContractViolation } from "../core/errors.js";

import { FINDINGS_SCHEMA_VERSION, aggregateFindings } from "./findings.js";
import { summarizeImpactedApps } from "./impact.js";
import { detectOverlap } from "./overlap.js";
import type { RiskScore } from "./types.js";

const SCORE: RiskScore = {
  total: 0.5,
  level: "Medium",
  breakdown: [],
};

const GENERATED_AT = "2026-01-15T10:00:00.000Z";

describe("aggregateFindings", () => {
  it("summarizes counts from the step outputs", () => {
    const current = changeSet("C1", [
      classified("ZA", ["APP1"], 0.5),
      classified("ZB", ["APP1"], 0.5),
      classified("ZC", ["APP2"], 0.5),
    ]);
    const overlaps = detectOverlap(current, [
      changeSet("C2", [classified("ZA", ["APP1"], 0.5), classified("ZD", ["APP2"], 0.5)]),
    ]);
    const catalog = createCatalogSnapshot({ version: "7", rules: [] });

    const document = aggregateFindings({
      changeSet: current,
      classifiedObjects: current.objects,
      overlaps,
      score: SCORE,
      impactedApps: summarizeImpactedApps(current.objects, catalog),
      warnings: ["1 record(s) skipped as malformed."],
      catalogVersion: catalog.version,
      generatedAt: GENERATED_AT,
    });

    expect(document.schemaVersion).toBe(FINDINGS_SCHEMA_VERSION);
    expect(document.changeId).toBe("C1");
    expect(document.catalogVersion).toBe("7");
    expect(document.generatedAt).toBe(GENERATED_AT);
    expect(document.summary).toEqual({
      riskScore: 0.5,
      riskLevel: "Medium",
      objectsTotal: 3,
      appsImpacted: 2,
      overlapsFound: 2,
      exactOverlaps: 1,
      appLevelOverlaps: 1,
    });
    expect(document.changeSet.objectKeys).toEqual([
      "R3TR:PROG:ZA",
      "R3TR:PROG:ZB",
      "R3TR:PROG:ZC",
    ]);
    expect(document.metadata).toEqual({
      skippedRecords: [],
      warnings: ["1 record(s) skipped as malformed."],
    });
  });

  it("rejects overlap findings for objects outside the change", () => {
    const current = changeSet("C1", [classified("ZA", ["APP1"], 0.5)]);
    const stray = detectOverlap(changeSet("C9", [classified("ZX", [], 0.5)]), [
      changeSet("C2", [classified("ZX", [], 0.5)]),
    ]);

    expect(() =>
      aggregateFindings({
        changeSet: current,
        classifiedObjects: current.objects,
        overlaps: stray,
        score: SCORE,
        catalogVersion: "1",
        generatedAt: GENERATED_AT,
      }),
    ).toThrow(new ContractViolation("Overlap finding references unknown object R3TR:PROG:ZX."));
  });

  it("rejects duplicate classified identities", () => {
    const object = classified("ZA", ["APP1"], 0.5);
    const current = changeSet("C1", [object, object]);

    expect(() =>
      aggregateFindings({
        changeSet: current,
        classifiedObjects: current.objects,
        overlaps: [],
        score: SCORE,
        catalogVersion: "1",
        generatedAt: GENERATED_AT,
      }),
    ).toThrow("Classified objects contain duplicate identities.");
  });

  it("rejects a change set that disagrees with its classified objects", () => {
    const current = changeSet("C1", [classified("ZA", ["APP1"], 0.5)]);

    expect(() =>
      aggregateFindings({
        changeSet: current,
        classifiedObjects: [classified("ZB", ["APP1"], 0.5)],
        overlaps: [],
        score: SCORE,
        catalogVersion: "1",
        generatedAt: GENERATED_AT,
      }),
    ).toThrow("Change set C1 does not match its classified objects.");
  });

  it("rejects object risks for unknown objects", () => {
    const current = changeSet("C1", [classified("ZA", ["APP1"], 0.5)]);

    expect(() =>
      aggregateFindings({
        changeSet: current,
        classifiedObjects: current.objects,
        overlaps: [],
        score: SCORE,
        objectRisks: [{ key: "R3TR:PROG:ZZ", contribution: 0.1, reasons: [] }],
        catalogVersion: "1",
        generatedAt: GENERATED_AT,
      }),
    ).toThrow("Object risk references unknown object R3TR:PROG:ZZ.");
  });
});

describe("summarizeImpactedApps", () => {
  it("ranks apps by share of the change, then criticality", () => {
    const catalog = createCatalogSnapshot({
      version: "1",
      rules: [
        { appId: "FI", matchPattern: "ZFI*", priority: 0, criticalityWeight: 0.9 },
        { appId: "SD", matchPattern: "ZSD*", priority: 0, criticalityWeight: 0.4 },
        { appId: "MM", matchPattern: "ZMM*", priority: 0, criticalityWeight: 0.6 },
      ],
      apps: [{ appId: "FI", displayName: "Finance", tags: ["core"] }],
    });
    const objects = [
      classified("ZSD_A", ["SD"], 0.4),
      classified("ZSD_B", ["SD"], 0.4),
      classified("ZFI_A", ["FI"], 0.9),
      classified("ZMM_A", ["MM"], 0.6),
    ];

    expect(summarizeImpactedApps(objects, catalog)).toEqual([
      {
        appId: "SD",
        displayName: "SD",
        tags: [],
        matchedObjects: 2,
        impactScore: 0.5,
        criticality: 0.4,
        topObjects: ["R3TR:PROG:ZSD_A", "R3TR:PROG:ZSD_B"],
      },
      {
        appId: "FI",
        displayName: "Finance",
        tags: ["core"],
        matchedObjects: 1,
        impactScore: 0.25,
        criticality: 0.9,
        topObjects: ["R3TR:PROG:ZFI_A"],
      },
      {
        appId: "MM",
        displayName: "MM",
        tags: [],
        matchedObjects: 1,
        impactScore: 0.25,
        criticality: 0.6,
        topObjects: ["R3TR:PROG:ZMM_A"],
      },
    ]);
  });
});
