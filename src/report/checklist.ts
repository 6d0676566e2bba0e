// Tester checklist builder.
// Purpose: derive focus areas, redundancy guardrails, and a smoke list from a findings document.

import type { FindingsDocument } from "../analysis/types.js";
import { DICTIONARY_TYPES, ENHANCEMENT_TYPES } from "../analysis/vocabulary.js";

export type ChecklistGroup = {
  heading: string | null;
  items: string[];
};

export type ChecklistSection = {
  title: string;
  groups: ChecklistGroup[];
};

const LIST_LIMIT = 10;

const SMOKE_ITEMS = [
  "Run a quick smoke test for each impacted app (basic navigation and primary transaction).",
  "Validate authorization impacts where exits or enhancements touch security-sensitive flows.",
  "Confirm failures stay localized and produce actionable messages.",
  "Capture screenshots or logs for new validations to speed up future triage.",
];

export function buildChecklistSections(document: FindingsDocument): ChecklistSection[] {
  return [
    { title: "What to focus on", groups: buildFocusGroups(document) },
    { title: "Redundancy guardrails", groups: buildRedundancyGroups(document) },
    { title: "Quick smoke checklist", groups: [{ heading: null, items: [...SMOKE_ITEMS] }] },
  ];
}

function buildFocusGroups(document: FindingsDocument): ChecklistGroup[] {
  const typeByKey = new Map(document.classifiedObjects.map((obj) => [obj.key, obj.type]));
  const rankedKeys = document.objectRisks.map((risk) => risk.key);
  const groups: ChecklistGroup[] = [];

  const enhancements = rankedKeys
    .filter((key) => ENHANCEMENT_TYPES.has(typeByKey.get(key) ?? ""))
    .slice(0, LIST_LIMIT);
  if (enhancements.length > 0) {
    groups.push({
      heading: "Prioritize validation around exits and enhancements (high regression risk):",
      items: enhancements,
    });
  }

  const dictionary = rankedKeys
    .filter((key) => DICTIONARY_TYPES.has(typeByKey.get(key) ?? ""))
    .slice(0, LIST_LIMIT);
  if (dictionary.length > 0) {
    groups.push({
      heading: "Prioritize dictionary and CDS checks (data structure and semantics):",
      items: dictionary,
    });
  }

  const ambiguous = document.classifiedObjects
    .filter((obj) => obj.matchedAppIds.length > 1)
    .slice(0, LIST_LIMIT)
    .map((obj) => `${obj.key} (${obj.matchedAppIds.join(", ")})`);
  if (ambiguous.length > 0) {
    groups.push({
      heading: "Confirm ownership for objects claimed by more than one app:",
      items: ambiguous,
    });
  }

  if (document.impactedApps.length > 0) {
    groups.push({
      heading: "Impacted apps to regression test (ranked):",
      items: document.impactedApps
        .slice(0, LIST_LIMIT)
        .map(
          (app) =>
            `${app.displayName} (matched objects: ${app.matchedObjects}, impact: ${app.impactScore.toFixed(2)})`,
        ),
    });
  }

  if (groups.length === 0) {
    groups.push({
      heading: null,
      items: [
        "Review the top risk objects and cover at least one happy path and one negative path per impacted area.",
      ],
    });
  }

  return groups;
}

function buildRedundancyGroups(document: FindingsDocument): ChecklistGroup[] {
  const groups: ChecklistGroup[] = [];

  if (document.siblingOverlaps.length > 0) {
    groups.push({
      heading: "Avoid redundant testing where another change already covers the same objects:",
      items: document.siblingOverlaps
        .slice(0, LIST_LIMIT)
        .map(
          (sibling) =>
            `Overlaps with ${sibling.changeId} (shared objects: ${sibling.sharedObjectCount})`,
        ),
    });
  }

  const appLevel = document.overlaps.filter((finding) => finding.kind === "app-level");
  if (appLevel.length > 0) {
    groups.push({
      heading: "Coordinate with changes touching the same apps:",
      items: appLevel
        .slice(0, LIST_LIMIT)
        .map(
          (finding) =>
            `${finding.object.key} shares ${finding.appIds.join(", ")} with ${finding.conflictingChangeIds.join(", ")}`,
        ),
    });
  }

  if (groups.length === 0) {
    groups.push({
      heading: null,
      items: ["No overlaps detected against recent changes."],
    });
  }

  return groups;
}
