// Ownership rule matcher.
// Purpose: resolve owning applications for a normalized object with deterministic precedence.
// Assumes rules arrive as an ordered, read-only table; ties on the top priority are kept.

import { minimatch } from "minimatch";

import type { CatalogSnapshot, ClassifiedObject, NormalizedObject, OwnershipRule } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type RuleMatch = {
  appIds: string[];
  criticality: number;
  winners: OwnershipRule[];
};

export type MatchOptions = {
  unownedCriticality: number;
};

export type PatternScope = "package" | "name" | "any";

export type ParsedPattern = {
  scope: PatternScope;
  glob: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function matchRules(
  obj: NormalizedObject,
  rules: readonly OwnershipRule[],
  options: MatchOptions,
): RuleMatch {
  const seen = new Set<string>();
  const winners: OwnershipRule[] = [];
  let topPriority = Number.NEGATIVE_INFINITY;

  for (const rule of rules) {
    if (!ruleMatches(rule, obj)) continue;

    // Duplicate tuples slip through only from a bad catalog; first one wins.
    const tuple = ruleTupleKey(rule);
    if (seen.has(tuple)) continue;
    seen.add(tuple);

    if (rule.priority > topPriority) {
      topPriority = rule.priority;
      winners.length = 0;
      winners.push(rule);
    } else if (rule.priority === topPriority) {
      winners.push(rule);
    }
  }

  if (winners.length === 0) {
    return { appIds: [], criticality: options.unownedCriticality, winners: [] };
  }

  const appIds = Array.from(new Set(winners.map((rule) => rule.appId))).sort();
  const criticality = Math.max(...winners.map((rule) => rule.criticalityWeight));

  return { appIds, criticality, winners };
}

export function classifyObjects(
  objects: readonly NormalizedObject[],
  snapshot: CatalogSnapshot,
  options: MatchOptions,
): ClassifiedObject[] {
  // Match results depend only on (type, matchKey) for a given snapshot.
  const cache = new Map<string, RuleMatch>();

  return objects.map((obj) => {
    const cacheKey = `${obj.type}|${obj.matchKey}`;
    let match = cache.get(cacheKey);
    if (!match) {
      match = matchRules(obj, snapshot.rules, options);
      cache.set(cacheKey, match);
    }

    return { ...obj, matchedAppIds: [...match.appIds], criticality: match.criticality };
  });
}

export function ruleTupleKey(rule: Pick<OwnershipRule, "appId" | "matchPattern" | "priority">): string {
  return `${rule.appId}\u0000${rule.matchPattern}\u0000${rule.priority}`;
}

export function parseMatchPattern(matchPattern: string): ParsedPattern {
  const trimmed = matchPattern.trim();
  const separator = trimmed.indexOf(":");
  if (separator > 0) {
    const scope = trimmed.slice(0, separator).toLowerCase();
    if (scope === "package" || scope === "name") {
      return { scope, glob: trimmed.slice(separator + 1).trim().toUpperCase() };
    }
  }
  return { scope: "any", glob: trimmed.toUpperCase() };
}

// =============================================================================
// INTERNALS
// =============================================================================

function ruleMatches(rule: OwnershipRule, obj: NormalizedObject): boolean {
  if (rule.objectTypes && rule.objectTypes.length > 0) {
    const allowed = rule.objectTypes.some((type) => type.trim().toUpperCase() === obj.type);
    if (!allowed) return false;
  }

  const pattern = parseMatchPattern(rule.matchPattern);
  if (pattern.glob.length === 0) return false;

  const nameHit = pattern.scope !== "package" && globMatch(obj.name, pattern.glob);
  if (nameHit) return true;

  return pattern.scope !== "name" && obj.package !== null && globMatch(obj.package, pattern.glob);
}

// Object names are not paths: "/" in a namespace is an ordinary character for "*".
const SLASH_STAND_IN = "\u001f";

function globMatch(value: string, glob: string): boolean {
  return minimatch(hideSlashes(value), hideSlashes(glob), {
    nocase: true,
    dot: true,
    nocomment: true,
    nonegate: true,
  });
}

function hideSlashes(value: string): string {
  return value.replace(/\//g, SLASH_STAND_IN);
}
