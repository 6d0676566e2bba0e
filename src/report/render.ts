import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import type { FindingsDocument } from "../analysis/types.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { buildChecklistSections } from "./checklist.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function serializeFindings(document: FindingsDocument): string {
  return JSON.stringify(document, null, 2) + "\n";
}

export async function renderChecklistHtml(document: FindingsDocument): Promise<string> {
  const template = await loadTemplate();

  try {
    return template(buildChecklistView(document));
  } catch (err) {
    throw new UserFacingError({
      code: REPORT_ERROR_CODE,
      title: "Checklist failed to render.",
      message: `Checklist for change ${document.changeId} could not be rendered.`,
      hint: REPORT_TEMPLATE_HINT,
      cause: err,
    });
  }
}

export function buildChecklistView(document: FindingsDocument) {
  return {
    changeId: document.changeId,
    generatedAt: document.generatedAt,
    catalogVersion: document.catalogVersion,
    riskPercent: Math.round(document.summary.riskScore * 100),
    riskLevel: document.summary.riskLevel,
    riskClass: document.summary.riskLevel.toLowerCase(),
    objectsTotal: document.summary.objectsTotal,
    appsImpacted: document.summary.appsImpacted,
    overlapsFound: document.summary.overlapsFound,
    breakdown: document.score.breakdown.map((factor) => ({
      factor: factor.factor,
      raw: factor.raw.toFixed(2),
      weight: factor.weight.toFixed(2),
      contribution: factor.contribution.toFixed(3),
    })),
    sections: buildChecklistSections(document),
    warnings: document.metadata.warnings,
    hasWarnings: document.metadata.warnings.length > 0,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_FILE = "checklist.hbs";
const REPORT_ERROR_CODE = USER_FACING_ERROR_CODES.report;
const REPORT_TEMPLATE_HINT = "Ensure templates/checklist.hbs exists and is valid.";

let cachedTemplate: Handlebars.TemplateDelegate | null = null;

async function loadTemplate(): Promise<Handlebars.TemplateDelegate> {
  if (cachedTemplate) return cachedTemplate;

  const templatePath = path.join(findPackageRoot(), "templates", TEMPLATE_FILE);
  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: REPORT_ERROR_CODE,
      title: "Checklist template unreadable.",
      message: `Failed to read checklist template at ${templatePath}.`,
      hint: REPORT_TEMPLATE_HINT,
      cause: err,
    });
  }

  try {
    cachedTemplate = Handlebars.compile(raw, { strict: true });
  } catch (err) {
    throw new UserFacingError({
      code: REPORT_ERROR_CODE,
      title: "Checklist template invalid.",
      message: `Checklist template at ${templatePath} failed to compile.`,
      hint: REPORT_TEMPLATE_HINT,
      cause: err,
    });
  }

  return cachedTemplate;
}

// Walk upward to the package root so compiled builds resolve templates too.
function findPackageRoot(): string {
  const startDir = path.dirname(fileURLToPath(import.meta.url));
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  throw new UserFacingError({
    code: REPORT_ERROR_CODE,
    title: "Report templates unavailable.",
    message: `package.json not found while resolving templates from ${startDir}.`,
    hint: REPORT_TEMPLATE_HINT,
  });
}
