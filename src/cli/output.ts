import type { FindingsDocument, RiskLevel } from "../analysis/types.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatMode,
} from "../core/error-format.js";

const LEVEL_STYLES: Record<RiskLevel, AnsiStyle[]> = {
  High: ["bold", "red"],
  Medium: ["bold", "yellow"],
  Low: ["bold", "green"],
};

export function formatFindingsSummary(
  document: FindingsDocument,
  style: AnsiFormatter = createAnsiFormatter(false),
): string[] {
  const { summary } = document;
  const lines = [
    `Change: ${document.changeId}`,
    `Risk: ${style(`${summary.riskScore.toFixed(2)} (${summary.riskLevel})`, LEVEL_STYLES[summary.riskLevel])}`,
    `Objects: ${summary.objectsTotal}  Apps impacted: ${summary.appsImpacted}  Overlaps: ${summary.overlapsFound} (exact=${summary.exactOverlaps} app-level=${summary.appLevelOverlaps})`,
  ];

  for (const factor of document.score.breakdown) {
    lines.push(
      style(
        `  ${factor.factor.padEnd(12)} raw=${factor.raw.toFixed(3)} weight=${factor.weight.toFixed(3)} contribution=${factor.contribution.toFixed(3)}`,
        ["dim"],
      ),
    );
  }

  for (const finding of document.overlaps) {
    lines.push(
      `- ${finding.kind} ${finding.object.key} with ${finding.conflictingChangeIds.join(", ")}` +
        (finding.appIds.length > 0 ? ` [${finding.appIds.join(", ")}]` : ""),
    );
  }

  for (const warning of document.metadata.warnings) {
    lines.push(style(`warning: ${warning}`, ["yellow"]));
  }

  return lines;
}

export function printFindingsSummary(document: FindingsDocument): void {
  const style = createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }));
  for (const line of formatFindingsSummary(document, style)) {
    console.log(line);
  }
}

export function printError(error: unknown, mode: ErrorFormatMode = "short"): void {
  const style = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));

  for (const line of formatErrorLines(error, { mode })) {
    if (line.kind === "title") {
      console.error(style(line.text, ["bold", "red"]));
    } else if (line.kind === "hint" || line.kind === "next") {
      console.error(style(`${line.kind}: ${line.text}`, ["cyan"]));
    } else if (line.kind === "message") {
      console.error(line.text);
    } else {
      console.error(style(`${line.kind}: ${line.text}`, ["dim"]));
    }
  }
}
