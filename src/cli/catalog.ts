import { loadCatalogSnapshot } from "../catalog/load.js";

export async function catalogCheckCommand(catalogPath: string): Promise<void> {
  const snapshot = await loadCatalogSnapshot(catalogPath);
  const appIds = new Set(snapshot.rules.map((rule) => rule.appId));

  console.log(`Catalog ${snapshot.version} at ${snapshot.source ?? catalogPath}`);
  console.log(`Rules: ${snapshot.rules.length}  Apps: ${appIds.size}`);
  console.log(`Max criticality weight: ${snapshot.maxCriticalityWeight}`);
  if (snapshot.unownedCriticality !== null) {
    console.log(`Unowned criticality: ${snapshot.unownedCriticality}`);
  }
}
