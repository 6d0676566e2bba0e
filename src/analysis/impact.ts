// Impacted application summary: which apps a change touches and how much of it they own.

import { compareStrings, roundTo } from "../core/utils.js";

import type { CatalogSnapshot, ClassifiedObject, ImpactedApp } from "./types.js";

const TOP_OBJECTS_LIMIT = 10;

export function summarizeImpactedApps(
  objects: readonly ClassifiedObject[],
  catalog: CatalogSnapshot,
): ImpactedApp[] {
  const matchedByApp = new Map<string, string[]>();
  for (const obj of objects) {
    for (const appId of obj.matchedAppIds) {
      const keys = matchedByApp.get(appId) ?? [];
      keys.push(obj.key);
      matchedByApp.set(appId, keys);
    }
  }

  const total = Math.max(1, objects.length);
  const impacted: ImpactedApp[] = [];

  for (const [appId, keys] of matchedByApp) {
    const app = catalog.apps.find((entry) => entry.appId === appId);
    impacted.push({
      appId,
      displayName: app?.displayName ?? appId,
      tags: app ? [...app.tags] : [],
      matchedObjects: keys.length,
      impactScore: roundTo(Math.min(1, keys.length / total)),
      criticality: appCriticality(appId, catalog),
      topObjects: keys.slice(0, TOP_OBJECTS_LIMIT),
    });
  }

  return impacted.sort(
    (a, b) =>
      b.impactScore - a.impactScore ||
      b.criticality - a.criticality ||
      compareStrings(a.appId, b.appId),
  );
}

function appCriticality(appId: string, catalog: CatalogSnapshot): number {
  let max = 0;
  for (const rule of catalog.rules) {
    if (rule.appId === appId && rule.criticalityWeight > max) max = rule.criticalityWeight;
  }
  return max;
}
