import { Subtype, UNSPECIFIED_ACTOR } from './schema.js';

export const DEFAULT_ACCURACY_DENOMINATOR = 4;
export const DEFAULT_MAX_DIST_KM = 100;
export const DEFAULT_MAX_DATE_DIFF_DAYS = 4;
export const DEFAULT_WEIGHT = 1.0;

/**
 * Sum the four facet weights are rescaled to
 */
export const WEIGHT_SUM = 4.0;

/**
 * Default distance buffer for approximate GSR locations is max distance / 6
 */
export const DIST_BUFFER_DIVISOR = 6;

/**
 * Facet weights for the Multi-Facet scorer
 */
export interface FacetWeights {
  location: number;
  date: number;
  actor: number;
  subtype: number;
}

/**
 * Per-pair scoring parameters for the Multi-Facet scorer
 */
export interface FacetScoringConfig {
  maxDistKm: number;
  /** Leniency for GSR events whose location is approximate */
  distBufferKm: number;
  maxDateDiffDays: number;
  legitActors: readonly string[];
  /** GSR actor values that match any legitimate warning actor */
  wildcardActors: readonly string[];
  legitSubtypes: readonly string[];
  weights: FacetWeights;
}

export interface CountScoringConfig {
  /** Floor for the relative-error denominator so small counts are not over-penalised */
  accuracyDenominator: number;
}

export const DEFAULT_WILDCARD_ACTORS: readonly string[] = Object.freeze([UNSPECIFIED_ACTOR]);
export const DEFAULT_LEGIT_SUBTYPES: readonly string[] = Object.freeze([Subtype.CONFLICT, Subtype.FORCE_POSTURE]);

export const DEFAULT_FACET_WEIGHTS: Readonly<FacetWeights> = Object.freeze({
  location: DEFAULT_WEIGHT,
  date: DEFAULT_WEIGHT,
  actor: DEFAULT_WEIGHT,
  subtype: DEFAULT_WEIGHT,
});

export const DEFAULT_FACET_SCORING_CONFIG: Readonly<FacetScoringConfig> = Object.freeze({
  maxDistKm: DEFAULT_MAX_DIST_KM,
  distBufferKm: DEFAULT_MAX_DIST_KM / DIST_BUFFER_DIVISOR,
  maxDateDiffDays: DEFAULT_MAX_DATE_DIFF_DAYS,
  legitActors: DEFAULT_WILDCARD_ACTORS,
  wildcardActors: DEFAULT_WILDCARD_ACTORS,
  legitSubtypes: DEFAULT_LEGIT_SUBTYPES,
  weights: DEFAULT_FACET_WEIGHTS,
});

export const DEFAULT_COUNT_SCORING_CONFIG: Readonly<CountScoringConfig> = Object.freeze({
  accuracyDenominator: DEFAULT_ACCURACY_DENOMINATOR,
});

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Parse float from env with fallback
 */
function parseFloat(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse comma-separated list from env with fallback
 */
function parseList(value: string | undefined, fallback: readonly string[]): readonly string[] {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

/**
 * Load Multi-Facet scoring config from env.
 * The distance buffer follows the max distance unless set explicitly.
 */
export function loadFacetScoringConfig(env: Env = process.env): FacetScoringConfig {
  const maxDistKm = parseFloat(env.SCORING_MAX_DIST_KM, DEFAULT_MAX_DIST_KM);
  const wildcardActors = parseList(env.SCORING_WILDCARD_ACTORS, DEFAULT_WILDCARD_ACTORS);

  return {
    maxDistKm,
    distBufferKm: parseFloat(env.SCORING_DIST_BUFFER_KM, maxDistKm / DIST_BUFFER_DIVISOR),
    maxDateDiffDays: parseFloat(env.SCORING_MAX_DATE_DIFF_DAYS, DEFAULT_MAX_DATE_DIFF_DAYS),
    legitActors: parseList(env.SCORING_LEGIT_ACTORS, wildcardActors),
    wildcardActors,
    legitSubtypes: parseList(env.SCORING_LEGIT_SUBTYPES, DEFAULT_LEGIT_SUBTYPES),
    weights: {
      location: parseFloat(env.SCORING_LS_WEIGHT, DEFAULT_WEIGHT),
      date: parseFloat(env.SCORING_DS_WEIGHT, DEFAULT_WEIGHT),
      actor: parseFloat(env.SCORING_AS_WEIGHT, DEFAULT_WEIGHT),
      subtype: parseFloat(env.SCORING_ESS_WEIGHT, DEFAULT_WEIGHT),
    },
  };
}

/**
 * Load Count-Magnitude scoring config from env
 */
export function loadCountScoringConfig(env: Env = process.env): CountScoringConfig {
  return {
    accuracyDenominator: parseFloat(env.SCORING_ACCURACY_DENOMINATOR, DEFAULT_ACCURACY_DENOMINATOR),
  };
}

/**
 * Format facet config for logging
 */
export function formatFacetScoringConfig(config: FacetScoringConfig): string {
  const { weights } = config;
  return [
    '[multiFacet] Config:',
    `  maxDistKm: ${config.maxDistKm}`,
    `  distBufferKm: ${config.distBufferKm.toFixed(2)}`,
    `  maxDateDiffDays: ${config.maxDateDiffDays}`,
    `  legitActors: ${config.legitActors.join(', ')}`,
    `  wildcardActors: ${config.wildcardActors.join(', ')}`,
    `  legitSubtypes: ${config.legitSubtypes.join(', ')}`,
    `  weights: ls=${weights.location} ds=${weights.date} as=${weights.actor} ess=${weights.subtype}`,
  ].join('\n');
}

/**
 * Format count config for logging
 */
export function formatCountScoringConfig(config: CountScoringConfig): string {
  return ['[countMagnitude] Config:', `  accuracyDenominator: ${config.accuracyDenominator}`].join('\n');
}
