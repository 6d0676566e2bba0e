// Catalog snapshots.
// Purpose: turn catalog data into an immutable, load-stamped rule table for one analysis run.
// Assumes a catalog reload always builds a new snapshot; nothing mutates an existing one.

import { CatalogInconsistencyError, type CatalogRuleTuple } from "../core/errors.js";
import { ruleTupleKey } from "../analysis/rule-match.js";
import type { CatalogApp, CatalogSnapshot, OwnershipRule } from "../analysis/types.js";

import type { CatalogFile } from "./schema.js";

export type SnapshotInput = {
  version: string;
  rules: readonly OwnershipRule[];
  apps?: readonly CatalogApp[];
  source?: string | null;
  loadedAt?: string;
  unownedCriticality?: number | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCatalogSnapshot(input: SnapshotInput): CatalogSnapshot {
  const rules = input.rules.map((rule) =>
    Object.freeze({
      ...rule,
      objectTypes: rule.objectTypes ? Object.freeze([...rule.objectTypes]) : undefined,
    }),
  );
  const apps = (input.apps ?? []).map((app) => Object.freeze({ ...app, tags: [...app.tags] }));

  return Object.freeze({
    version: input.version,
    loadedAt: input.loadedAt ?? new Date().toISOString(),
    source: input.source ?? null,
    rules: Object.freeze(rules),
    apps: Object.freeze(apps),
    maxCriticalityWeight: rules.reduce((max, rule) => Math.max(max, rule.criticalityWeight), 0),
    unownedCriticality: input.unownedCriticality ?? null,
  });
}

export function buildSnapshotFromCatalog(
  catalog: CatalogFile,
  options: { source?: string | null; loadedAt?: string } = {},
): CatalogSnapshot {
  const rules = flattenCatalogRules(catalog);

  const duplicates = findDuplicateRules(rules);
  if (duplicates.length > 0) {
    const listed = duplicates
      .map((dup) => `${dup.appId} ${dup.matchPattern} (priority ${dup.priority})`)
      .join(", ");
    throw new CatalogInconsistencyError(`Catalog has duplicate ownership rules: ${listed}.`, duplicates);
  }

  return createCatalogSnapshot({
    version: catalog.version,
    rules,
    apps: catalog.apps.map((app) => ({
      appId: app.app_id,
      displayName: app.display_name ?? app.app_id,
      tags: app.tags,
    })),
    source: options.source ?? null,
    loadedAt: options.loadedAt,
    unownedCriticality: catalog.unowned_criticality ?? null,
  });
}

export function flattenCatalogRules(catalog: CatalogFile): OwnershipRule[] {
  const rules: OwnershipRule[] = [];

  for (const app of catalog.apps) {
    const objectTypes = app.match_rules.object_types;
    const patterns = [
      ...app.match_rules.packages.map((glob) => `package:${glob}`),
      ...app.match_rules.namespaces.map((glob) => `name:${glob}`),
    ];

    for (const matchPattern of patterns) {
      rules.push({
        appId: app.app_id,
        matchPattern,
        priority: app.priority,
        criticalityWeight: app.criticality,
        ...(objectTypes.length > 0 ? { objectTypes: [...objectTypes] } : {}),
      });
    }
  }

  for (const rule of catalog.rules) {
    rules.push({
      appId: rule.app_id,
      matchPattern: rule.match_pattern,
      priority: rule.priority,
      criticalityWeight: rule.criticality,
      ...(rule.object_types && rule.object_types.length > 0
        ? { objectTypes: [...rule.object_types] }
        : {}),
    });
  }

  return rules;
}

export function findDuplicateRules(rules: readonly OwnershipRule[]): CatalogRuleTuple[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const duplicates: CatalogRuleTuple[] = [];

  for (const rule of rules) {
    const key = ruleTupleKey(rule);
    if (!seen.has(key)) {
      seen.add(key);
      continue;
    }
    if (reported.has(key)) continue;
    reported.add(key);
    duplicates.push({ appId: rule.appId, matchPattern: rule.matchPattern, priority: rule.priority });
  }

  return duplicates;
}
