// Analysis core types.
// Purpose: shapes passed between the normalizer, matcher, overlap detector, scorer, and aggregator.
// Assumes every value is built once per analysis run and never mutated afterwards.

// =============================================================================
// OBJECTS
// =============================================================================

export type ObjectRecord = {
  class: string;
  type: string;
  name: string;
  package?: string;
};

export type NormalizationFlags = {
  unknownClass: boolean;
  unknownType: boolean;
};

export type ObjectIdentity = {
  class: string;
  type: string;
  name: string;
  key: string; // CLASS:TYPE:NAME
};

export type NormalizedObject = ObjectIdentity & {
  package: string | null;
  matchKey: string; // PACKAGE:NAME
  flags: NormalizationFlags;
};

export type ClassifiedObject = NormalizedObject & {
  matchedAppIds: string[];
  criticality: number;
};

export type ChangeSet = {
  changeId: string;
  objects: ClassifiedObject[];
};

// =============================================================================
// CATALOG
// =============================================================================

export type OwnershipRule = {
  appId: string;
  matchPattern: string;
  priority: number;
  criticalityWeight: number;
  objectTypes?: readonly string[];
};

export type CatalogApp = {
  appId: string;
  displayName: string;
  tags: string[];
};

export type CatalogSnapshot = {
  version: string;
  loadedAt: string;
  source: string | null;
  rules: readonly OwnershipRule[];
  apps: readonly CatalogApp[];
  maxCriticalityWeight: number;
  unownedCriticality: number | null;
};

// =============================================================================
// OVERLAP
// =============================================================================

export type OverlapKind = "exact" | "app-level";

export type OverlapFinding = {
  kind: OverlapKind;
  object: ObjectIdentity;
  conflictingChangeIds: string[];
  appIds: string[];
};

export type SiblingOverlapSummary = {
  changeId: string;
  sharedObjectCount: number;
  sharedObjects: string[];
};

// =============================================================================
// SCORING
// =============================================================================

export type RiskFactorName = "overlap" | "criticality" | "ambiguity";

export type RiskFactor = {
  factor: RiskFactorName;
  raw: number;
  weight: number;
  contribution: number;
};

export type RiskLevel = "Low" | "Medium" | "High";

export type RiskScore = {
  total: number;
  level: RiskLevel;
  breakdown: RiskFactor[];
};

export type ScoringWeights = {
  overlapWeight: number;
  criticalityWeight: number;
  ambiguityWeight: number;
};

export type ObjectRiskReason =
  | "overlap:exact"
  | "overlap:app-level"
  | "ownership:ambiguous"
  | "ownership:unowned"
  | `criticality:${string}`;

export type ObjectRisk = {
  key: string;
  contribution: number;
  reasons: ObjectRiskReason[];
};

// =============================================================================
// FINDINGS
// =============================================================================

export type SkippedRecord = {
  index: number;
  reason: string;
  record: Partial<ObjectRecord>;
};

export type ImpactedApp = {
  appId: string;
  displayName: string;
  tags: string[];
  matchedObjects: number;
  impactScore: number;
  criticality: number;
  topObjects: string[];
};

export type FindingsSummary = {
  riskScore: number;
  riskLevel: RiskLevel;
  objectsTotal: number;
  appsImpacted: number;
  overlapsFound: number;
  exactOverlaps: number;
  appLevelOverlaps: number;
};

export type FindingsMetadata = {
  skippedRecords: SkippedRecord[];
  warnings: string[];
};

export type ChangeSetRef = {
  changeId: string;
  objectKeys: string[];
};

export type FindingsDocument = {
  schemaVersion: number;
  changeId: string;
  generatedAt: string;
  catalogVersion: string;
  summary: FindingsSummary;
  changeSet: ChangeSetRef;
  classifiedObjects: ClassifiedObject[];
  overlaps: OverlapFinding[];
  siblingOverlaps: SiblingOverlapSummary[];
  score: RiskScore;
  impactedApps: ImpactedApp[];
  objectRisks: ObjectRisk[];
  metadata: FindingsMetadata;
};
