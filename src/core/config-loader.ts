import fs from "node:fs";
import path from "node:path";

import { validateScoringWeights } from "../analysis/scoring.js";
import type { ScoringWeights } from "../analysis/types.js";

import { AnalysisConfigSchema, type AnalysisConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultHomeDir } from "./paths.js";

export const CONFIG_FILE_NAME = "transport-radar.config.json";

const CONFIG_HINT = `Fix ${CONFIG_FILE_NAME} or remove it to use defaults.`;

export type ResolvedConfig = {
  catalogPath: string | null;
  homeDir: string;
  unownedCriticality: number;
  overlapWindowDays: number;
  weights: ScoringWeights;
};

export type LoadedConfig = {
  config: ResolvedConfig;
  configPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAnalysisConfig(
  args: {
    cwd?: string;
    explicitPath?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): LoadedConfig {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;
  const configPath = args.explicitPath
    ? path.resolve(cwd, args.explicitPath)
    : findConfigFile(cwd);

  const raw = configPath ? readConfigFile(configPath) : {};
  const parsed = AnalysisConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${location}: ${issue.message}`;
    });
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config failed validation.",
      message: `Config at ${configPath ?? "<defaults>"} is invalid:\n- ${issues.join("\n- ")}`,
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  const baseDir = configPath ? path.dirname(configPath) : cwd;
  return { config: resolveConfig(parsed.data, { baseDir, env }), configPath };
}

export function findConfigFile(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config not found.",
      message: `No config file at ${configPath}.`,
      hint: CONFIG_HINT,
    });
  }

  try {
    return JSON.parse(fs.readFileSync(configPath, "utf8")) as unknown;
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config is not valid JSON.",
      message: `Config at ${configPath} could not be parsed.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }
}

function resolveConfig(
  config: AnalysisConfig,
  context: { baseDir: string; env: NodeJS.ProcessEnv },
): ResolvedConfig {
  const envHome = context.env.TRANSPORT_RADAR_HOME?.trim();
  const envCatalog = context.env.TRANSPORT_RADAR_CATALOG?.trim();

  const homeDir = envHome
    ? path.resolve(envHome)
    : config.home_dir
      ? path.resolve(context.baseDir, config.home_dir)
      : defaultHomeDir();

  const catalogPath = envCatalog
    ? path.resolve(envCatalog)
    : config.catalog_path
      ? path.resolve(context.baseDir, config.catalog_path)
      : null;

  const weights: ScoringWeights = {
    overlapWeight: config.scoring.overlap_weight,
    criticalityWeight: config.scoring.criticality_weight,
    ambiguityWeight: config.scoring.ambiguity_weight,
  };

  try {
    validateScoringWeights(weights);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Scoring weights invalid.",
      message: err.message,
      hint: "Set scoring.overlap_weight, criticality_weight, and ambiguity_weight to sum to 1.",
      cause: err,
    });
  }

  return {
    catalogPath,
    homeDir,
    unownedCriticality: config.unowned_criticality,
    overlapWindowDays: config.overlap_window_days,
    weights,
  };
}
