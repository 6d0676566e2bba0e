// Overlap detector.
// Purpose: find exact and app-level collisions between the current change and sibling changes.
// Assumes change sets are already classified and deduplicated by identity.

import { compareStrings } from "../core/utils.js";

import { toIdentity } from "./normalize.js";
import type { ChangeSet, OverlapFinding, SiblingOverlapSummary } from "./types.js";

const SHARED_OBJECTS_CAP = 200;

// =============================================================================
// PUBLIC API
// =============================================================================

export function detectOverlap(
  current: ChangeSet,
  others: readonly ChangeSet[],
): OverlapFinding[] {
  const siblings = others.filter((other) => other.changeId !== current.changeId);
  const currentKeys = new Set(current.objects.map((obj) => obj.key));
  const siblingKeys = siblings.map((sibling) => ({
    changeId: sibling.changeId,
    keys: new Set(sibling.objects.map((obj) => obj.key)),
  }));
  // Sibling objects shared exactly are already reported; only the rest can collide by app.
  const siblingApps = siblings.map((sibling) => ({
    changeId: sibling.changeId,
    apps: collectOwnedApps(sibling, currentKeys),
  }));

  const findings: OverlapFinding[] = [];
  const emitted = new Set<string>();

  for (const obj of current.objects) {
    const exactIds = siblingKeys
      .filter((sibling) => sibling.keys.has(obj.key))
      .map((sibling) => sibling.changeId);

    if (exactIds.length > 0) {
      pushOnce(findings, emitted, {
        kind: "exact",
        object: toIdentity(obj),
        conflictingChangeIds: sortedUnique(exactIds),
        appIds: [...obj.matchedAppIds].sort(),
      });
      continue;
    }

    // Unowned objects cannot collide on ownership.
    if (obj.matchedAppIds.length === 0) continue;

    const conflictIds: string[] = [];
    const sharedApps = new Set<string>();
    for (const sibling of siblingApps) {
      const shared = obj.matchedAppIds.filter((appId) => sibling.apps.has(appId));
      if (shared.length === 0) continue;
      conflictIds.push(sibling.changeId);
      for (const appId of shared) sharedApps.add(appId);
    }

    if (conflictIds.length > 0) {
      pushOnce(findings, emitted, {
        kind: "app-level",
        object: toIdentity(obj),
        conflictingChangeIds: sortedUnique(conflictIds),
        appIds: Array.from(sharedApps).sort(),
      });
    }
  }

  return findings;
}

export function summarizeSiblingOverlaps(
  current: ChangeSet,
  others: readonly ChangeSet[],
): SiblingOverlapSummary[] {
  const currentKeys = new Set(current.objects.map((obj) => obj.key));
  const summaries: SiblingOverlapSummary[] = [];

  for (const sibling of others) {
    if (sibling.changeId === current.changeId) continue;

    const shared = sortedUnique(
      sibling.objects.map((obj) => obj.key).filter((key) => currentKeys.has(key)),
    );
    if (shared.length === 0) continue;

    summaries.push({
      changeId: sibling.changeId,
      sharedObjectCount: shared.length,
      sharedObjects: shared.slice(0, SHARED_OBJECTS_CAP),
    });
  }

  return summaries.sort(
    (a, b) =>
      b.sharedObjectCount - a.sharedObjectCount || compareStrings(a.changeId, b.changeId),
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

function collectOwnedApps(changeSet: ChangeSet, excludeKeys: ReadonlySet<string>): Set<string> {
  const apps = new Set<string>();
  for (const obj of changeSet.objects) {
    if (excludeKeys.has(obj.key)) continue;
    for (const appId of obj.matchedAppIds) apps.add(appId);
  }
  return apps;
}

function pushOnce(findings: OverlapFinding[], emitted: Set<string>, finding: OverlapFinding): void {
  const marker = `${finding.object.key}\u0000${finding.kind}`;
  if (emitted.has(marker)) return;
  emitted.add(marker);
  findings.push(finding);
}

function sortedUnique(values: string[]): string[] {
  return Array.from(new Set(values)).sort(compareStrings);
}
