// Risk scorer.
// Purpose: aggregate overlap, criticality, and ownership ambiguity into an explainable score.
// Assumes overlap detection for the change is complete before scoring starts.

import { ConfigError } from "../core/errors.js";
import { clamp01, roundTo } from "../core/utils.js";

import type {
  ChangeSet,
  ClassifiedObject,
  ObjectRisk,
  ObjectRiskReason,
  OverlapFinding,
  OverlapKind,
  RiskFactor,
  RiskLevel,
  RiskScore,
  ScoringWeights,
} from "./types.js";

// =============================================================================
// TYPES + DEFAULTS
// =============================================================================

export type ScoreOptions = {
  weights: ScoringWeights;
  maxCriticalityWeight: number;
  unownedCriticality: number;
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  overlapWeight: 1 / 3,
  criticalityWeight: 1 / 3,
  ambiguityWeight: 1 / 3,
};

const OVERLAP_VALUES: Record<OverlapKind, number> = {
  exact: 1,
  "app-level": 0.5,
};

const HIGH_RISK_THRESHOLD = 0.75;
const MEDIUM_RISK_THRESHOLD = 0.4;
const WEIGHT_SUM_TOLERANCE = 1e-6;

// =============================================================================
// PUBLIC API
// =============================================================================

export function scoreChange(
  current: ChangeSet,
  findings: readonly OverlapFinding[],
  options: ScoreOptions,
): RiskScore {
  const { weights } = options;
  const count = current.objects.length;
  const overlapByKey = indexFindings(findings);

  let overlapSum = 0;
  let criticalitySum = 0;
  let ambiguousCount = 0;
  for (const obj of current.objects) {
    overlapSum += overlapValue(overlapByKey.get(obj.key));
    criticalitySum += obj.criticality;
    if (obj.matchedAppIds.length > 1) ambiguousCount += 1;
  }

  const denominator = criticalityDenominator(options);
  const overlapRaw = count === 0 ? 0 : overlapSum / count;
  const criticalityRaw =
    count === 0 || denominator === 0 ? 0 : clamp01(criticalitySum / count / denominator);
  const ambiguityRaw = count === 0 ? 0 : ambiguousCount / count;

  const breakdown: RiskFactor[] = [
    buildFactor("overlap", overlapRaw, weights.overlapWeight),
    buildFactor("criticality", criticalityRaw, weights.criticalityWeight),
    buildFactor("ambiguity", ambiguityRaw, weights.ambiguityWeight),
  ];

  const total = roundTo(
    clamp01(
      overlapRaw * weights.overlapWeight +
        criticalityRaw * weights.criticalityWeight +
        ambiguityRaw * weights.ambiguityWeight,
    ),
  );

  return { total, level: resolveRiskLevel(total), breakdown };
}

export function scoreObjects(
  current: ChangeSet,
  findings: readonly OverlapFinding[],
  options: ScoreOptions,
): ObjectRisk[] {
  const { weights } = options;
  const overlapByKey = indexFindings(findings);
  const denominator = criticalityDenominator(options);

  const entries = current.objects.map((obj, index) => {
    const kind = overlapByKey.get(obj.key);
    const criticality = denominator === 0 ? 0 : clamp01(obj.criticality / denominator);
    const ambiguous = obj.matchedAppIds.length > 1 ? 1 : 0;
    const contribution = roundTo(
      overlapValue(kind) * weights.overlapWeight +
        criticality * weights.criticalityWeight +
        ambiguous * weights.ambiguityWeight,
    );

    return { index, risk: { key: obj.key, contribution, reasons: buildReasons(obj, kind) } };
  });

  entries.sort((a, b) => b.risk.contribution - a.risk.contribution || a.index - b.index);
  return entries.map((entry) => entry.risk);
}

export function resolveRiskLevel(total: number): RiskLevel {
  if (total >= HIGH_RISK_THRESHOLD) return "High";
  if (total >= MEDIUM_RISK_THRESHOLD) return "Medium";
  return "Low";
}

export function validateScoringWeights(weights: ScoringWeights): ScoringWeights {
  const values = [weights.overlapWeight, weights.criticalityWeight, weights.ambiguityWeight];
  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new ConfigError("Scoring weights must be non-negative numbers.");
  }

  const sum = values.reduce((acc, value) => acc + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(`Scoring weights must sum to 1 (received ${roundTo(sum)}).`);
  }

  return weights;
}

// =============================================================================
// INTERNALS
// =============================================================================

function indexFindings(findings: readonly OverlapFinding[]): Map<string, OverlapKind> {
  const byKey = new Map<string, OverlapKind>();
  for (const finding of findings) {
    const existing = byKey.get(finding.object.key);
    // Exact outranks app-level if both ever appear for one object.
    if (existing === "exact") continue;
    byKey.set(finding.object.key, finding.kind);
  }
  return byKey;
}

function overlapValue(kind: OverlapKind | undefined): number {
  return kind ? OVERLAP_VALUES[kind] : 0;
}

function criticalityDenominator(options: ScoreOptions): number {
  if (options.maxCriticalityWeight > 0) return options.maxCriticalityWeight;
  return options.unownedCriticality > 0 ? options.unownedCriticality : 0;
}

function buildFactor(factor: RiskFactor["factor"], raw: number, weight: number): RiskFactor {
  return {
    factor,
    raw: roundTo(raw),
    weight: roundTo(weight),
    contribution: roundTo(raw * weight),
  };
}

function buildReasons(obj: ClassifiedObject, kind: OverlapKind | undefined): ObjectRiskReason[] {
  const reasons: ObjectRiskReason[] = [];
  if (kind === "exact") reasons.push("overlap:exact");
  if (kind === "app-level") reasons.push("overlap:app-level");
  if (obj.matchedAppIds.length === 0) reasons.push("ownership:unowned");
  if (obj.matchedAppIds.length > 1) reasons.push("ownership:ambiguous");
  reasons.push(`criticality:${roundTo(obj.criticality, 3)}`);
  return reasons;
}
