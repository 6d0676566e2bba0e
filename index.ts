#!/usr/bin/env node
import { main } from "./src/index.js";

export { main };
export { analyzeChange, classifyChange, normalizeRecords } from "./src/analysis/pipeline.js";
export { normalize, toObjectRecord } from "./src/analysis/normalize.js";
export { classifyObjects, matchRules } from "./src/analysis/rule-match.js";
export { detectOverlap, summarizeSiblingOverlaps } from "./src/analysis/overlap.js";
export { scoreChange, scoreObjects } from "./src/analysis/scoring.js";
export { aggregateFindings } from "./src/analysis/findings.js";
export { createCatalogSnapshot } from "./src/catalog/snapshot.js";
export { loadCatalogSnapshot } from "./src/catalog/load.js";
export type * from "./src/analysis/types.js";

// Allow `node dist/index.js` direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
