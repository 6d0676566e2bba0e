// Change history store.
// Purpose: persist findings documents and serve recent ones back as sibling changes.
// Assumes one JSON file per change id under <root>/changes; newer saves replace older ones.

import crypto from "node:crypto";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import type { ChangeInput } from "../analysis/pipeline.js";
import type { FindingsDocument } from "../analysis/types.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logAnalysisEvent, type AnalysisLogger } from "../core/logger.js";
import { changesDir } from "../core/paths.js";
import { compareStrings, slugify, writeJsonFile } from "../core/utils.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const ID_HASH_LENGTH = 12;

const StoredObjectSchema = z.object({
  class: z.string(),
  type: z.string(),
  name: z.string(),
  package: z.string().nullable().optional(),
});

const StoredChangeSchema = z.object({
  changeId: z.string().min(1),
  generatedAt: z.string().min(1),
  summary: z.object({ riskScore: z.number(), riskLevel: z.string() }).optional(),
  classifiedObjects: z.array(StoredObjectSchema),
});

type StoredChange = z.infer<typeof StoredChangeSchema>;

export type StoredChangeEntry = {
  changeId: string;
  generatedAt: string;
  riskScore: number | null;
  riskLevel: string | null;
  objectCount: number;
  filePath: string;
};

export type SiblingQuery = {
  excludeChangeId?: string;
  windowDays: number;
  now?: Date;
};

// =============================================================================
// STORE
// =============================================================================

export class ChangeHistoryStore {
  constructor(
    private readonly homeDir: string,
    private readonly logger?: AnalysisLogger,
  ) {}

  getChangesDir(): string {
    return changesDir(this.homeDir);
  }

  // Slug for readability, id hash so that distinct ids never share a file.
  getChangePath(changeId: string): string {
    return path.join(this.getChangesDir(), `${slugify(changeId)}-${changeIdHash(changeId)}.json`);
  }

  async save(document: FindingsDocument): Promise<string> {
    const filePath = this.getChangePath(document.changeId);
    await writeJsonFile(filePath, document);
    logAnalysisEvent(this.logger, "history.saved", {
      change_id: document.changeId,
      file: filePath,
    });
    return filePath;
  }

  async list(): Promise<StoredChangeEntry[]> {
    const loaded = await this.readAll();
    return loaded.map(({ change, filePath }) => ({
      changeId: change.changeId,
      generatedAt: change.generatedAt,
      riskScore: change.summary?.riskScore ?? null,
      riskLevel: change.summary?.riskLevel ?? null,
      objectCount: change.classifiedObjects.length,
      filePath,
    }));
  }

  async loadSiblings(query: SiblingQuery): Promise<ChangeInput[]> {
    const now = query.now ?? new Date();
    const cutoff = now.getTime() - query.windowDays * DAY_MS;
    const siblings: ChangeInput[] = [];

    for (const { change, filePath } of await this.readAll()) {
      if (change.changeId === query.excludeChangeId) continue;

      const generatedAt = Date.parse(change.generatedAt);
      if (Number.isNaN(generatedAt)) {
        logAnalysisEvent(this.logger, "history.skip", {
          file: filePath,
          reason: "invalid generatedAt",
        });
        continue;
      }
      if (generatedAt < cutoff) continue;

      siblings.push({
        changeId: change.changeId,
        records: change.classifiedObjects.map((obj) => ({
          class: obj.class,
          type: obj.type,
          name: obj.name,
          package: obj.package ?? null,
        })),
      });
    }

    return siblings;
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private async readAll(): Promise<Array<{ change: StoredChange; filePath: string }>> {
    const dir = this.getChangesDir();
    if (!(await fse.pathExists(dir))) return [];

    const names = (await fse.readdir(dir)).filter((name) => name.endsWith(".json")).sort();
    const loaded: Array<{ change: StoredChange; filePath: string }> = [];

    for (const name of names) {
      const filePath = path.join(dir, name);
      const change = await this.readStoredChange(filePath);
      if (change) loaded.push({ change, filePath });
    }

    return loaded.sort((a, b) => compareStrings(a.change.changeId, b.change.changeId));
  }

  private async readStoredChange(filePath: string): Promise<StoredChange | null> {
    let raw: unknown;
    try {
      raw = await fse.readJson(filePath);
    } catch (err) {
      logAnalysisEvent(this.logger, "history.skip", {
        file: filePath,
        reason: formatErrorMessage(err),
      });
      return null;
    }

    const parsed = StoredChangeSchema.safeParse(raw);
    if (!parsed.success) {
      logAnalysisEvent(this.logger, "history.skip", {
        file: filePath,
        reason: "unrecognized findings document",
      });
      return null;
    }
    return parsed.data;
  }
}

function changeIdHash(changeId: string): string {
  return crypto.createHash("sha256").update(changeId).digest("hex").slice(0, ID_HASH_LENGTH);
}
