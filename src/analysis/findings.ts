// Findings aggregator.
// Purpose: assemble one findings document from the outputs of the earlier analysis steps.
// Assumes inputs come from a single run; any cross-reference mismatch is a programming error.

import { ContractViolation } from "../core/errors.js";

import type {
  ChangeSet,
  ClassifiedObject,
  FindingsDocument,
  ImpactedApp,
  ObjectRisk,
  OverlapFinding,
  RiskScore,
  SiblingOverlapSummary,
  SkippedRecord,
} from "./types.js";

export const FINDINGS_SCHEMA_VERSION = 1;

export type AggregateInput = {
  changeSet: ChangeSet;
  classifiedObjects: readonly ClassifiedObject[];
  overlaps: readonly OverlapFinding[];
  score: RiskScore;
  siblingOverlaps?: readonly SiblingOverlapSummary[];
  impactedApps?: readonly ImpactedApp[];
  objectRisks?: readonly ObjectRisk[];
  skippedRecords?: readonly SkippedRecord[];
  warnings?: readonly string[];
  catalogVersion: string;
  generatedAt: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function aggregateFindings(input: AggregateInput): FindingsDocument {
  assertConsistent(input);

  const overlaps = [...input.overlaps];
  const exactOverlaps = overlaps.filter((finding) => finding.kind === "exact").length;
  const impactedApps = [...(input.impactedApps ?? [])];

  return {
    schemaVersion: FINDINGS_SCHEMA_VERSION,
    changeId: input.changeSet.changeId,
    generatedAt: input.generatedAt,
    catalogVersion: input.catalogVersion,
    summary: {
      riskScore: input.score.total,
      riskLevel: input.score.level,
      objectsTotal: input.classifiedObjects.length,
      appsImpacted: impactedApps.length,
      overlapsFound: overlaps.length,
      exactOverlaps,
      appLevelOverlaps: overlaps.length - exactOverlaps,
    },
    changeSet: {
      changeId: input.changeSet.changeId,
      objectKeys: input.changeSet.objects.map((obj) => obj.key),
    },
    classifiedObjects: [...input.classifiedObjects],
    overlaps,
    siblingOverlaps: [...(input.siblingOverlaps ?? [])],
    score: input.score,
    impactedApps,
    objectRisks: [...(input.objectRisks ?? [])],
    metadata: {
      skippedRecords: [...(input.skippedRecords ?? [])],
      warnings: [...(input.warnings ?? [])],
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertConsistent(input: AggregateInput): void {
  const classifiedKeys = new Set(input.classifiedObjects.map((obj) => obj.key));
  if (classifiedKeys.size !== input.classifiedObjects.length) {
    throw new ContractViolation("Classified objects contain duplicate identities.");
  }

  const changeKeys = input.changeSet.objects.map((obj) => obj.key);
  if (
    changeKeys.length !== classifiedKeys.size ||
    changeKeys.some((key) => !classifiedKeys.has(key))
  ) {
    throw new ContractViolation(
      `Change set ${input.changeSet.changeId} does not match its classified objects.`,
    );
  }

  for (const finding of input.overlaps) {
    if (!classifiedKeys.has(finding.object.key)) {
      throw new ContractViolation(
        `Overlap finding references unknown object ${finding.object.key}.`,
      );
    }
  }

  for (const risk of input.objectRisks ?? []) {
    if (!classifiedKeys.has(risk.key)) {
      throw new ContractViolation(`Object risk references unknown object ${risk.key}.`);
    }
  }
}
