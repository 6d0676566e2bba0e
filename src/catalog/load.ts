import path from "node:path";

import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { CatalogSnapshot } from "../analysis/types.js";

import { CatalogFileSchema, formatCatalogIssues } from "./schema.js";
import { buildSnapshotFromCatalog } from "./snapshot.js";

const CATALOG_HINT = "Check the catalog JSON file or pass --catalog with a valid path.";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadCatalogSnapshot(
  catalogPath: string,
  options: { loadedAt?: string } = {},
): Promise<CatalogSnapshot> {
  const resolved = path.resolve(catalogPath);
  const raw = await readCatalogText(resolved);

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog is not valid JSON.",
      message: `Catalog at ${resolved} could not be parsed as JSON.`,
      hint: CATALOG_HINT,
      cause: err,
    });
  }

  const parsed = CatalogFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatCatalogIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog failed validation.",
      message: `Catalog at ${resolved} is invalid:\n- ${issues.join("\n- ")}`,
      hint: CATALOG_HINT,
      cause: parsed.error,
    });
  }

  return buildSnapshotFromCatalog(parsed.data, { source: resolved, loadedAt: options.loadedAt });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readCatalogText(catalogPath: string): Promise<string> {
  const exists = await fse.pathExists(catalogPath);
  if (!exists) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog not found.",
      message: `No catalog file at ${catalogPath}.`,
      hint: CATALOG_HINT,
      next: "Set catalog_path in transport-radar.config.json or TRANSPORT_RADAR_CATALOG.",
    });
  }

  try {
    return await fse.readFile(catalogPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog unreadable.",
      message: `Failed to read catalog at ${catalogPath}.`,
      hint: CATALOG_HINT,
      cause: err,
    });
  }
}
