// Analysis pipeline.
// Purpose: run normalize → classify → overlap → score → aggregate for one change against its siblings.
// Assumes the catalog snapshot and sibling inputs are read-only for the whole run.

import { ConfigError, MalformedInputError } from "../core/errors.js";
import { logAnalysisEvent, type AnalysisLogger } from "../core/logger.js";
import { compareStrings } from "../core/utils.js";

import { aggregateFindings } from "./findings.js";
import { summarizeImpactedApps } from "./impact.js";
import { normalize, type RawObjectRecord } from "./normalize.js";
import { detectOverlap, summarizeSiblingOverlaps } from "./overlap.js";
import { classifyObjects, type MatchOptions } from "./rule-match.js";
import {
  DEFAULT_SCORING_WEIGHTS,
  scoreChange,
  scoreObjects,
  validateScoringWeights,
} from "./scoring.js";
import type {
  CatalogSnapshot,
  ChangeSet,
  ClassifiedObject,
  FindingsDocument,
  NormalizedObject,
  ScoringWeights,
  SkippedRecord,
} from "./types.js";

export const DEFAULT_UNOWNED_CRITICALITY = 0.5;

// =============================================================================
// TYPES
// =============================================================================

export type ChangeInput = {
  changeId: string;
  records: readonly RawObjectRecord[];
};

export type AnalyzeOptions = {
  catalog: CatalogSnapshot;
  weights?: ScoringWeights;
  unownedCriticality?: number;
  logger?: AnalysisLogger;
  now?: () => Date;
};

export type NormalizeBatchResult = {
  objects: NormalizedObject[];
  skipped: SkippedRecord[];
};

export type ClassifiedChange = {
  changeSet: ChangeSet;
  skipped: SkippedRecord[];
  duplicates: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function analyzeChange(
  current: ChangeInput,
  siblings: readonly ChangeInput[],
  options: AnalyzeOptions,
): FindingsDocument {
  const { catalog, logger } = options;
  const weights = validateScoringWeights(options.weights ?? DEFAULT_SCORING_WEIGHTS);
  const unownedCriticality = resolveUnownedCriticality(catalog, options.unownedCriticality);
  const generatedAt = (options.now ?? (() => new Date()))().toISOString();

  logAnalysisEvent(logger, "analysis.start", {
    change_id: current.changeId,
    record_count: current.records.length,
    sibling_count: siblings.length,
    catalog_version: catalog.version,
  });

  const matchOptions: MatchOptions = { unownedCriticality };
  const classified = classifyChange(current, catalog, matchOptions);
  for (const skipped of classified.skipped) {
    logAnalysisEvent(logger, "record.skipped", {
      change_id: current.changeId,
      index: skipped.index,
      reason: skipped.reason,
    });
  }

  const warnings = collectWarnings(classified);
  const siblingSets: ChangeSet[] = [];
  for (const sibling of siblings) {
    const result = classifyChange(sibling, catalog, matchOptions);
    if (result.skipped.length > 0) {
      warnings.push(
        `Sibling ${sibling.changeId}: ${result.skipped.length} record(s) skipped.`,
      );
    }
    siblingSets.push(result.changeSet);
  }

  const changeSet = classified.changeSet;
  logAnalysisEvent(logger, "classify.complete", {
    change_id: changeSet.changeId,
    object_count: changeSet.objects.length,
    unowned_count: changeSet.objects.filter((obj) => obj.matchedAppIds.length === 0).length,
    ambiguous_count: changeSet.objects.filter((obj) => obj.matchedAppIds.length > 1).length,
  });

  const overlaps = detectOverlap(changeSet, siblingSets);
  const siblingOverlaps = summarizeSiblingOverlaps(changeSet, siblingSets);
  logAnalysisEvent(logger, "overlap.complete", {
    change_id: changeSet.changeId,
    finding_count: overlaps.length,
    exact_count: overlaps.filter((finding) => finding.kind === "exact").length,
  });

  const scoreOptions = {
    weights,
    maxCriticalityWeight: catalog.maxCriticalityWeight,
    unownedCriticality,
  };
  const score = scoreChange(changeSet, overlaps, scoreOptions);
  const objectRisks = scoreObjects(changeSet, overlaps, scoreOptions);
  logAnalysisEvent(logger, "score.complete", {
    change_id: changeSet.changeId,
    total: score.total,
    level: score.level,
  });

  const document = aggregateFindings({
    changeSet,
    classifiedObjects: changeSet.objects,
    overlaps,
    score,
    siblingOverlaps,
    impactedApps: summarizeImpactedApps(changeSet.objects, catalog),
    objectRisks,
    skippedRecords: classified.skipped,
    warnings,
    catalogVersion: catalog.version,
    generatedAt,
  });

  logAnalysisEvent(logger, "analysis.complete", {
    change_id: document.changeId,
    risk_score: document.summary.riskScore,
    overlaps_found: document.summary.overlapsFound,
    skipped_count: document.metadata.skippedRecords.length,
  });

  return document;
}

export function normalizeRecords(records: readonly RawObjectRecord[]): NormalizeBatchResult {
  const objects: NormalizedObject[] = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    try {
      objects.push(normalize(record));
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      skipped.push({ index, reason: err.message, record: snapshotRecord(record) });
    }
  });

  return { objects, skipped };
}

export function classifyChange(
  input: ChangeInput,
  catalog: CatalogSnapshot,
  options: MatchOptions,
): ClassifiedChange {
  const normalized = normalizeRecords(input.records);
  const unique = dedupeByKey(normalized.objects);
  const objects = classifyObjects(unique, catalog, options);

  return {
    changeSet: buildChangeSet(input.changeId, objects),
    skipped: normalized.skipped,
    duplicates: normalized.objects.length - unique.length,
  };
}

export function buildChangeSet(changeId: string, objects: readonly ClassifiedObject[]): ChangeSet {
  return { changeId, objects: dedupeByKey(objects) };
}

export function resolveUnownedCriticality(
  catalog: CatalogSnapshot,
  configured: number | undefined,
): number {
  const value = catalog.unownedCriticality ?? configured ?? DEFAULT_UNOWNED_CRITICALITY;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Unowned criticality must be greater than 0 (received ${value}).`);
  }
  return value;
}

// =============================================================================
// INTERNALS
// =============================================================================

function dedupeByKey<T extends { key: string }>(objects: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const obj of objects) {
    if (seen.has(obj.key)) continue;
    seen.add(obj.key);
    unique.push(obj);
  }
  return unique;
}

function snapshotRecord(record: RawObjectRecord): SkippedRecord["record"] {
  const copy: SkippedRecord["record"] = {};
  if (record.class) copy.class = record.class;
  if (record.type) copy.type = record.type;
  if (record.name) copy.name = record.name;
  if (record.package) copy.package = record.package;
  return copy;
}

function collectWarnings(classified: ClassifiedChange): string[] {
  const warnings: string[] = [];
  const unknownClasses = countBy(
    classified.changeSet.objects.filter((obj) => obj.flags.unknownClass),
    (obj) => obj.class,
  );
  const unknownTypes = countBy(
    classified.changeSet.objects.filter((obj) => obj.flags.unknownType),
    (obj) => obj.type || "<empty>",
  );

  for (const [value, count] of unknownClasses) {
    warnings.push(`Unrecognized object class "${value}" on ${count} object(s).`);
  }
  for (const [value, count] of unknownTypes) {
    warnings.push(`Unrecognized object type "${value}" on ${count} object(s).`);
  }
  if (classified.skipped.length > 0) {
    warnings.push(`${classified.skipped.length} record(s) skipped as malformed.`);
  }
  if (classified.duplicates > 0) {
    warnings.push(`${classified.duplicates} duplicate object(s) collapsed.`);
  }

  return warnings;
}

function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts.entries()).sort((a, b) => compareStrings(a[0], b[0]));
}
