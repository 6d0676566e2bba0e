import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { cleanupTempDirs, makeTempDir } from "../__tests__/analysis-fixtures.helpers.js";
import { CatalogInconsistencyError, UserFacingError } from "../core/errors.js";

import { loadCatalogSnapshot } from "./load.js";

const LOADED_AT = "2026-02-01T00:00:00.000Z";

async function writeCatalog(content: unknown): Promise<string> {
  const dir = await makeTempDir();
  const catalogPath = path.join(dir, "catalog.json");
  await fse.writeFile(
    catalogPath,
    typeof content === "string" ? content : JSON.stringify(content),
    "utf8",
  );
  return catalogPath;
}

afterEach(async () => {
  await cleanupTempDirs();
});

describe("loadCatalogSnapshot", () => {
  it("flattens app match rules and explicit rules into one table", async () => {
    const catalogPath = await writeCatalog({
      version: 3,
      unowned_criticality: 0.6,
      apps: [
        {
          app_id: "FI",
          display_name: "Finance",
          criticality: 0.9,
          priority: 2,
          tags: ["core"],
          match_rules: { packages: ["zfi*"], namespaces: ["/fin/*"] },
        },
      ],
      rules: [
        {
          app_id: "SD",
          match_pattern: "ZSD_*",
          priority: 1,
          criticality: 0.4,
          object_types: ["PROG"],
        },
      ],
    });

    const snapshot = await loadCatalogSnapshot(catalogPath, { loadedAt: LOADED_AT });

    expect(snapshot.version).toBe("3");
    expect(snapshot.loadedAt).toBe(LOADED_AT);
    expect(snapshot.source).toBe(path.resolve(catalogPath));
    expect(snapshot.unownedCriticality).toBe(0.6);
    expect(snapshot.maxCriticalityWeight).toBe(0.9);
    expect(snapshot.rules).toEqual([
      { appId: "FI", matchPattern: "package:zfi*", priority: 2, criticalityWeight: 0.9 },
      { appId: "FI", matchPattern: "name:/fin/*", priority: 2, criticalityWeight: 0.9 },
      {
        appId: "SD",
        matchPattern: "ZSD_*",
        priority: 1,
        criticalityWeight: 0.4,
        objectTypes: ["PROG"],
      },
    ]);
    expect(snapshot.apps).toEqual([{ appId: "FI", displayName: "Finance", tags: ["core"] }]);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.rules)).toBe(true);
  });

  it("fills defaults for sparse catalogs", async () => {
    const catalogPath = await writeCatalog({ apps: [{ app_id: "MM" }] });

    const snapshot = await loadCatalogSnapshot(catalogPath, { loadedAt: LOADED_AT });

    expect(snapshot.version).toBe("0");
    expect(snapshot.rules).toEqual([]);
    expect(snapshot.apps).toEqual([{ appId: "MM", displayName: "MM", tags: [] }]);
    expect(snapshot.unownedCriticality).toBeNull();
  });

  it("rejects duplicate ownership rules", async () => {
    const catalogPath = await writeCatalog({
      rules: [
        { app_id: "FI", match_pattern: "ZFI*", priority: 0 },
        { app_id: "FI", match_pattern: "ZFI*", priority: 0, criticality: 0.9 },
      ],
    });

    const error = await loadCatalogSnapshot(catalogPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CatalogInconsistencyError);
    expect(error).toMatchObject({
      message: "Catalog has duplicate ownership rules: FI ZFI* (priority 0).",
      duplicates: [{ appId: "FI", matchPattern: "ZFI*", priority: 0 }],
    });
  });

  it("reports a missing catalog", async () => {
    const dir = await makeTempDir();

    await expect(loadCatalogSnapshot(path.join(dir, "missing.json"))).rejects.toMatchObject({
      code: "CATALOG_ERROR",
      title: "Catalog not found.",
    });
  });

  it("reports invalid JSON", async () => {
    const catalogPath = await writeCatalog("{ not json");

    await expect(loadCatalogSnapshot(catalogPath)).rejects.toMatchObject({
      title: "Catalog is not valid JSON.",
    });
  });

  it("lists schema issues with their locations", async () => {
    const catalogPath = await writeCatalog({
      rules: [{ app_id: "FI", match_pattern: "ZFI*", weight: 2 }],
    });

    const error = await loadCatalogSnapshot(catalogPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ title: "Catalog failed validation." });
    expect(error instanceof Error ? error.message : "").toContain(
      "- rules.0: Unrecognized keys: weight",
    );
  });
});
