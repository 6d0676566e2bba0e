// Object list intake.
// Purpose: turn pasted transport text, CSV exports, and JSON payloads into raw object records.
// Assumes validation of individual records happens in the normalizer, not here.

import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { RawObjectRecord } from "../analysis/normalize.js";
import { DEFAULT_OBJECT_CLASS, KNOWN_OBJECT_CLASSES, KNOWN_OBJECT_TYPES } from "../analysis/vocabulary.js";

export type InputFormat = "text" | "csv" | "json";

const TRANSPORT_LINE_RE = /(R3TR|LIMU)\s+([A-Z0-9_]{3,5})\s+([A-Z0-9_/\\\-~><=]+)/i;

const CLASS_FIELDS = ["obj_class", "class"];
const TYPE_FIELDS = ["obj_type", "object_type", "type"];
const NAME_FIELDS = ["obj_name", "object_name", "name"];
const PACKAGE_FIELDS = ["package", "devclass"];

const CsvRowsSchema = z.array(z.record(z.string()));
const JsonRowSchema = z.record(z.unknown());
const JsonPayloadSchema = z.union([
  z.array(z.unknown()),
  z.object({ objects: z.array(z.unknown()) }).passthrough(),
]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseObjectInput(text: string, format: InputFormat): RawObjectRecord[] {
  if (format === "csv") return parseObjectCsv(text);
  if (format === "json") return parseObjectJson(text);
  return parseObjectText(text);
}

export function inferInputFormat(filePath: string): InputFormat {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".csv")) return "csv";
  if (lower.endsWith(".json")) return "json";
  return "text";
}

export function parseObjectText(text: string): RawObjectRecord[] {
  const records: RawObjectRecord[] = [];

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const match = TRANSPORT_LINE_RE.exec(trimmed);
    if (match) {
      records.push({ class: match[1], type: match[2], name: match[3] });
      continue;
    }

    const parts = trimmed.split(/\s+/);
    const first = parts[0]?.toUpperCase() ?? "";
    if (parts.length >= 3 && KNOWN_OBJECT_CLASSES.has(first)) {
      records.push({ class: parts[0], type: parts[1], name: parts[2] });
      continue;
    }

    // "PROG ZFOO" without a class token.
    if (parts.length >= 2 && KNOWN_OBJECT_TYPES.has(first)) {
      records.push({ class: DEFAULT_OBJECT_CLASS, type: parts[0], name: parts[1] });
    }
  }

  return records;
}

export function parseObjectCsv(text: string): RawObjectRecord[] {
  if (!text.trim()) return [];

  let rows: unknown;
  try {
    rows = parseCsv(text, {
      bom: true,
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (err) {
    throw createInputError("CSV", err);
  }

  const parsed = CsvRowsSchema.safeParse(rows);
  if (!parsed.success) {
    throw createInputError("CSV", parsed.error);
  }

  return parsed.data.map((row) => pickRecord(row));
}

export function parseObjectJson(text: string): RawObjectRecord[] {
  if (!text.trim()) return [];

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw createInputError("JSON", err);
  }

  const payload = JsonPayloadSchema.safeParse(data);
  if (!payload.success) {
    throw createInputError("JSON", payload.error);
  }

  const items = Array.isArray(payload.data) ? payload.data : payload.data.objects;
  const records: RawObjectRecord[] = [];
  for (const item of items) {
    const row = JsonRowSchema.safeParse(item);
    if (!row.success) continue;
    records.push(pickRecord(row.data));
  }
  return records;
}

// =============================================================================
// INTERNALS
// =============================================================================

function pickRecord(row: Record<string, unknown>): RawObjectRecord {
  const record: RawObjectRecord = {
    class: pickField(row, CLASS_FIELDS) ?? DEFAULT_OBJECT_CLASS,
    type: pickField(row, TYPE_FIELDS) ?? "",
    name: pickField(row, NAME_FIELDS) ?? "",
  };
  const pkg = pickField(row, PACKAGE_FIELDS);
  if (pkg) record.package = pkg;
  return record;
}

function pickField(row: Record<string, unknown>, fields: string[]): string | undefined {
  for (const field of fields) {
    const value = row[field];
    if (typeof value === "string" && value.trim()) return value;
  }
  return undefined;
}

function createInputError(format: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: `Object list is not valid ${format}.`,
    message: `The ${format} object list could not be parsed.`,
    hint: "Check the input file or pass --format to override detection.",
    cause,
  });
}
