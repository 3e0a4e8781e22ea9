/**
 * Multi-Facet Event Scorer
 *
 * For discrete events with a location, date, actor and subtype (military activity).
 * Every in-scope (warning, event) pair is scored; the resulting matrix is
 * resolved with the optimal assignment solver.
 *
 * Scoring components:
 * - Location Score (LS): geodesic distance, 0 at maxDistKm
 * - Date Score (DS): day difference, 0 at maxDateDiffDays
 * - Actor Score (AS): facet match with wildcard actors
 * - Event-Subtype Score (ESS): facet match
 *
 * LS = 0 or DS = 0 forces the pair's score to 0.
 */

import {
  DEFAULT_FACET_SCORING_CONFIG,
  DIST_BUFFER_DIVISOR,
  EventType,
  InvalidRangeError,
  WEIGHT_SUM,
  dateDiff,
  dateScore,
  facetScore,
  greatCircleDistanceKm,
  isInScope,
  makeIndexMats,
  parseFacetEvent,
  parseFacetWarning,
  slopeScore,
  solveAssignment,
  type DistanceFn,
  type FacetEvent,
  type FacetScoringConfig,
  type FacetWarning,
  type FacetWeights,
  type RawRecord,
  type RecordId,
  type ScoringResult,
} from '@gsr-scoring/core';
import type { CategoryScorer } from './baseScorer.js';

export interface FacetPairOptions extends FacetScoringConfig {
  distanceFn: DistanceFn;
}

export interface MultiFacetOptions extends Partial<FacetScoringConfig> {
  category?: string;
  country: string;
  distanceFn?: DistanceFn;
}

interface PairScoreBase {
  warningId: RecordId;
  eventId: RecordId;
  notices: string[];
}

/**
 * Component scores for a pair that could be scored
 */
export interface ScoredFacetPair extends PairScoreBase {
  ok: true;
  approximateLocation: boolean;
  distanceKm: number;
  /** Absolute day difference */
  dateDifference: number;
  locationScore: number;
  dateScore: number;
  actorScore: number;
  subtypeScore: number;
  /** Weighted component sum, 0 to 4 */
  weightedScore: number;
  /** weightedScore / 4, 0 to 1 */
  qualityScore: number;
}

/**
 * A pair whose configuration was invalid; no scores are computed
 */
export interface FailedFacetPair extends PairScoreBase {
  ok: false;
  errors: string[];
}

export type FacetPairScore = ScoredFacetPair | FailedFacetPair;

export interface MultiFacetDetails {
  /** Scores of the matched pairs, in match order */
  qualityScores: number[];
  pairs: FacetPairScore[];
}

export type WeightCheck =
  | { ok: true; weights: FacetWeights; notices: string[] }
  | { ok: false; errors: string[]; notices: string[] };

const WEIGHT_KEYS: readonly (keyof FacetWeights)[] = ['location', 'date', 'actor', 'subtype'];

const WEIGHT_LABELS: Record<keyof FacetWeights, string> = {
  location: 'LS',
  date: 'DS',
  actor: 'AS',
  subtype: 'ESS',
};

/**
 * Validate facet weights and rescale them to sum to 4.0
 */
export function normalizeWeights(weights: FacetWeights): WeightCheck {
  const errors: string[] = [];
  const notices: string[] = [];
  for (const key of WEIGHT_KEYS) {
    const value = weights[key];
    if (!Number.isFinite(value)) {
      errors.push(`${WEIGHT_LABELS[key]} Weight must be a finite number`);
    } else if (value < 0) {
      errors.push(`${WEIGHT_LABELS[key]} Weight must be positive`);
    }
  }
  if (errors.length > 0) {
    return { ok: false, errors, notices };
  }

  const sum = weights.location + weights.date + weights.actor + weights.subtype;
  if (sum === 0) {
    return { ok: false, errors: ['Sum of weights must be positive'], notices };
  }
  if (sum === WEIGHT_SUM) {
    return { ok: true, weights: { ...weights }, notices };
  }

  notices.push(`Reweighting so that sum of weights is ${WEIGHT_SUM.toFixed(1)}`);
  return {
    ok: true,
    weights: {
      location: (WEIGHT_SUM * weights.location) / sum,
      date: (WEIGHT_SUM * weights.date) / sum,
      actor: (WEIGHT_SUM * weights.actor) / sum,
      subtype: (WEIGHT_SUM * weights.subtype) / sum,
    },
    notices,
  };
}

/**
 * Location score from a distance in km.
 * Approximate GSR locations shift both the distance and the threshold down by the buffer.
 */
export function locationScore(
  distanceKm: number,
  isApproximate: boolean,
  maxDistKm: number,
  distBufferKm: number
): number {
  const buffer = isApproximate ? distBufferKm : 0;
  return slopeScore(distanceKm - buffer, 0, maxDistKm - buffer);
}

/**
 * 0 unless the warning's actor is legitimate; otherwise a facet match with wildcards
 */
export function actorScore(
  warnActor: string,
  gsrActor: string | readonly string[],
  legitActors: readonly string[],
  wildcards: readonly string[]
): number {
  if (!legitActors.includes(warnActor)) return 0;
  return facetScore(warnActor, gsrActor, wildcards);
}

/**
 * 0 unless the warning's subtype is legitimate; otherwise a facet match
 */
export function eventSubtypeScore(
  warnSubtype: string,
  gsrSubtype: string | readonly string[],
  legitSubtypes: readonly string[]
): number {
  if (!legitSubtypes.includes(warnSubtype)) return 0;
  return facetScore(warnSubtype, gsrSubtype);
}

/**
 * Score a single warning against a single event
 */
export function scoreFacetPair(
  warning: FacetWarning,
  event: FacetEvent,
  options: FacetPairOptions
): FacetPairScore {
  const weightCheck = normalizeWeights(options.weights);
  const base = {
    warningId: warning.warningId,
    eventId: event.eventId,
    notices: weightCheck.notices,
  };
  if (!weightCheck.ok) {
    return { ...base, ok: false, errors: weightCheck.errors };
  }
  const { weights } = weightCheck;

  const distanceKm = options.distanceFn(warning, event);
  const ls = locationScore(distanceKm, event.approximateLocation, options.maxDistKm, options.distBufferKm);
  const delta = dateDiff(warning.eventDate, event.eventDate);
  const ds = dateScore(delta, options.maxDateDiffDays);
  const as = actorScore(warning.actor, event.actor, options.legitActors, options.wildcardActors);
  const ess = eventSubtypeScore(warning.subtype, event.subtype, options.legitSubtypes);

  // Location and date are necessary conditions, not just weighted ones
  const weightedScore =
    ls === 0 || ds === 0
      ? 0
      : weights.location * ls + weights.date * ds + weights.actor * as + weights.subtype * ess;

  return {
    ...base,
    ok: true,
    approximateLocation: event.approximateLocation,
    distanceKm,
    dateDifference: Math.abs(delta),
    locationScore: ls,
    dateScore: ds,
    actorScore: as,
    subtypeScore: ess,
    weightedScore,
    qualityScore: weightedScore / WEIGHT_SUM,
  };
}

/**
 * Thresholds must leave a non-empty slope for both exact and approximate locations
 */
export function assertScoringRanges(config: FacetScoringConfig): void {
  if (!(config.maxDistKm > 0)) {
    throw new InvalidRangeError(`maxDistKm must be positive, got ${config.maxDistKm}`);
  }
  if (!(config.distBufferKm >= 0 && config.distBufferKm < config.maxDistKm)) {
    throw new InvalidRangeError(
      `distBufferKm must be at least 0 and below maxDistKm (${config.maxDistKm}), got ${config.distBufferKm}`
    );
  }
  if (!(config.maxDateDiffDays > 0)) {
    throw new InvalidRangeError(`maxDateDiffDays must be positive, got ${config.maxDateDiffDays}`);
  }
}

export class MultiFacetScorer implements CategoryScorer<MultiFacetDetails> {
  readonly algoVersion = 'multi-facet@1.0.0';
  readonly category: string;
  readonly country: string;
  readonly config: Readonly<FacetScoringConfig>;
  private readonly distanceFn: DistanceFn;

  constructor(options: MultiFacetOptions) {
    const { category, country, distanceFn, ...overrides } = options;
    const maxDistKm = overrides.maxDistKm ?? DEFAULT_FACET_SCORING_CONFIG.maxDistKm;
    const wildcardActors = overrides.wildcardActors ?? DEFAULT_FACET_SCORING_CONFIG.wildcardActors;

    this.category = category ?? EventType.MILITARY_ACTIVITY;
    this.country = country;
    this.distanceFn = distanceFn ?? greatCircleDistanceKm;
    this.config = Object.freeze({
      maxDistKm,
      distBufferKm: overrides.distBufferKm ?? maxDistKm / DIST_BUFFER_DIVISOR,
      maxDateDiffDays: overrides.maxDateDiffDays ?? DEFAULT_FACET_SCORING_CONFIG.maxDateDiffDays,
      legitActors: Object.freeze([...(overrides.legitActors ?? wildcardActors)]),
      wildcardActors: Object.freeze([...wildcardActors]),
      legitSubtypes: Object.freeze([...(overrides.legitSubtypes ?? DEFAULT_FACET_SCORING_CONFIG.legitSubtypes)]),
      weights: Object.freeze({ ...(overrides.weights ?? DEFAULT_FACET_SCORING_CONFIG.weights) }),
    });

    assertScoringRanges(this.config);

    const weightCheck = normalizeWeights(this.config.weights);
    if (!weightCheck.ok) {
      console.warn(`[multiFacet] Invalid weights, no pair will be scored: ${weightCheck.errors.join('; ')}`);
    } else if (weightCheck.notices.length > 0) {
      console.warn(`[multiFacet] ${weightCheck.notices.join('; ')}`);
    }
  }

  get description(): string {
    return `${this.category} events in ${this.country}`;
  }

  /**
   * Filter to this scorer's category and country, and parse the payload
   */
  selectRecords(
    warnings: readonly RawRecord[],
    gsr: readonly RawRecord[]
  ): { warnings: FacetWarning[]; events: FacetEvent[] } {
    const scope = { country: this.country };
    return {
      warnings: warnings.filter((r) => isInScope(r, this.category, scope)).map(parseFacetWarning),
      events: gsr.filter((r) => isInScope(r, this.category, scope)).map(parseFacetEvent),
    };
  }

  scoreOne(warning: FacetWarning, event: FacetEvent): FacetPairScore {
    return scoreFacetPair(warning, event, { ...this.config, distanceFn: this.distanceFn });
  }

  score(warnings: readonly RawRecord[], gsr: readonly RawRecord[]): ScoringResult<MultiFacetDetails> {
    const selected = this.selectRecords(warnings, gsr);
    const [rowIndex, colIndex] = makeIndexMats(selected.warnings, selected.events);

    const pairs: FacetPairScore[] = [];
    const matrix = rowIndex.map((row, i) =>
      row.map((warningIndex, j) => {
        const pair = this.scoreOne(selected.warnings[warningIndex], selected.events[colIndex[i][j]]);
        pairs.push(pair);
        return pair.ok ? pair.qualityScore : 0;
      })
    );

    const assignment = solveAssignment(
      matrix,
      selected.warnings.map((w) => w.warningId),
      selected.events.map((e) => e.eventId),
      { allowZeroScores: false }
    );

    console.error(
      `[multiFacet] ${this.description}: ${selected.warnings.length} warnings, ` +
        `${selected.events.length} events, ${pairs.length} pairs, ${assignment.matches.length} matched`
    );

    return {
      matches: assignment.matches.map((m) => [m.row, m.col] as const),
      unmatchedWarnings: assignment.unmatchedRows,
      unmatchedGsr: assignment.unmatchedCols,
      results: {
        qualityScore: assignment.qualityScore,
        precision: assignment.precision,
        recall: assignment.recall,
        f1: assignment.f1,
      },
      details: {
        qualityScores: assignment.matches.map((m) => m.score),
        pairs,
      },
    };
  }
}
