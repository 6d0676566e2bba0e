import path from "node:path";

import fse from "fs-extra";

import type { RawObjectRecord } from "../analysis/normalize.js";
import { analyzeChange, type ChangeInput } from "../analysis/pipeline.js";
import type { FindingsDocument } from "../analysis/types.js";
import { loadCatalogSnapshot } from "../catalog/load.js";
import { loadAnalysisConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { analysisLogPath, exportsDir } from "../core/paths.js";
import { slugify, writeTextFile } from "../core/utils.js";
import { ChangeHistoryStore } from "../history/store.js";
import { inferInputFormat, parseObjectInput, type InputFormat } from "../intake/parse.js";
import { renderChecklistHtml, serializeFindings } from "../report/render.js";

import { printFindingsSummary } from "./output.js";

export type AnalyzeCommandOptions = {
  changeId: string;
  catalog?: string;
  config?: string;
  format?: InputFormat;
  sibling?: string[];
  siblingFormat?: InputFormat;
  windowDays?: number;
  history: boolean;
  out?: string;
  html?: string;
};

export async function analyzeCommand(
  inputPath: string,
  opts: AnalyzeCommandOptions,
): Promise<FindingsDocument> {
  const { config } = loadAnalysisConfig({ explicitPath: opts.config });
  const catalogPath = opts.catalog ?? config.catalogPath;
  if (!catalogPath) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No catalog configured.",
      message: "An application catalog is required to classify objects.",
      hint: "Pass --catalog <path>, set TRANSPORT_RADAR_CATALOG, or set catalog_path in transport-radar.config.json.",
    });
  }

  const catalog = await loadCatalogSnapshot(catalogPath);
  const records = await readObjectFile(inputPath, opts.format);

  const runId = `${slugify(opts.changeId)}-${Date.now()}`;
  const logger = new JsonlLogger(analysisLogPath(config.homeDir, runId), { runId });
  const store = new ChangeHistoryStore(config.homeDir, logger);

  const siblings = new Map<string, ChangeInput>();
  if (opts.history) {
    const stored = await store.loadSiblings({
      excludeChangeId: opts.changeId,
      windowDays: opts.windowDays ?? config.overlapWindowDays,
    });
    for (const sibling of stored) siblings.set(sibling.changeId, sibling);
  }
  // Sibling files replace stored history of the same change id, but not each other.
  const siblingFiles = new Map<string, string>();
  for (const siblingPath of opts.sibling ?? []) {
    const changeId = siblingChangeId(siblingPath);
    const previous = siblingFiles.get(changeId);
    if (previous) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Duplicate sibling change id.",
        message: `Sibling files ${previous} and ${siblingPath} both name change ${changeId}.`,
        hint: "Rename one of the files; the sibling change id is the file name without its extension.",
      });
    }
    siblingFiles.set(changeId, siblingPath);
    siblings.set(changeId, {
      changeId,
      records: await readObjectFile(siblingPath, opts.siblingFormat),
    });
  }

  const document = analyzeChange(
    { changeId: opts.changeId, records },
    Array.from(siblings.values()),
    {
      catalog,
      weights: config.weights,
      unownedCriticality: config.unownedCriticality,
      logger,
    },
  );

  if (opts.history) {
    await store.save(document);
  }

  const outPath =
    opts.out ?? path.join(exportsDir(config.homeDir), `${slugify(opts.changeId)}-findings.json`);
  await writeTextFile(outPath, serializeFindings(document));
  if (opts.html) {
    await writeTextFile(opts.html, await renderChecklistHtml(document));
  }

  printFindingsSummary(document);
  console.log(`Findings written to ${outPath}`);
  if (opts.html) console.log(`Checklist written to ${opts.html}`);
  console.log(`Log: ${logger.filePath}`);

  return document;
}

function siblingChangeId(siblingPath: string): string {
  return path.basename(siblingPath, path.extname(siblingPath));
}

async function readObjectFile(
  filePath: string,
  format: InputFormat | undefined,
): Promise<RawObjectRecord[]> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Object list unreadable.",
      message: `Failed to read object list at ${filePath}.`,
      cause: err,
    });
  }
  return parseObjectInput(text, format ?? inferInputFormat(filePath));
}
