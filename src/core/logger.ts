/*
Purpose: append structured analysis events as JSON lines.
Assumptions: one log file per run; writes are synchronous so events land in order.
Usage: const log = new JsonlLogger(analysisLogPath(home, runId), { runId }); logAnalysisEvent(log, "analysis.start", { change_id }).
*/

import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type AnalysisLogger = {
  log(event: LogEvent): void;
};

export type AnalysisEventType =
  | "analysis.start"
  | "record.skipped"
  | "classify.complete"
  | "overlap.complete"
  | "score.complete"
  | "analysis.complete"
  | "history.skip"
  | "history.saved";

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements AnalysisLogger {
  private readonly runId: string;
  private readonly now: () => Date;

  constructor(
    public readonly filePath: string,
    context: { runId: string; now?: () => Date },
  ) {
    this.runId = context.runId;
    this.now = context.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const line: JsonObject = {
      ts: this.now().toISOString(),
      type: event.type,
      run_id: this.runId,
      ...(event.payload ?? {}),
    };
    fs.appendFileSync(this.filePath, JSON.stringify(line) + "\n", "utf8");
  }
}

export function logAnalysisEvent(
  logger: AnalysisLogger | undefined,
  type: AnalysisEventType,
  payload?: JsonObject,
): void {
  logger?.log({ type, payload });
}
