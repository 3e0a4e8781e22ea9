/**
 * Count-Magnitude Scorer
 *
 * For events reported as counts per date and location (civil unrest, disease).
 * Warnings and events are paired by event date within one location scope,
 * then scored on the relative difference between warned and actual counts.
 */

import {
  DEFAULT_ACCURACY_DENOMINATOR,
  RecordValidationError,
  f1,
  formatLocationScope,
  isInScope,
  mean,
  parseCountEvent,
  parseCountWarning,
  resolveLocationScope,
  toDateKey,
  type CountEvent,
  type CountWarning,
  type LocationScope,
  type MatchPair,
  type RawRecord,
  type RecordId,
  type ScoreOutcome,
  type ScoringResult,
} from '@gsr-scoring/core';
import type { CategoryScorer } from './baseScorer.js';

export interface CountMagnitudeOptions {
  category: string;
  /** Preset location name or explicit scope */
  location: string | LocationScope;
  accuracyDenominator?: number;
}

/**
 * Score record for one date-matched pair
 */
export interface CountPairScore {
  warningId: RecordId;
  eventId: RecordId;
  eventDate: string;
  warningValue: number;
  eventValue: number;
  qualityScore: number | null;
  error?: string;
}

export interface CountMagnitudeDetails {
  /** Quality scores of the successfully scored pairs */
  qsValues: number[];
  pairs: CountPairScore[];
}

/**
 * Quality score on a scale of 0.0 to 1.0:
 * 1 - |predicted - actual| / max(predicted, actual, accuracyDenominator)
 *
 * Reports negative counts and a non-positive denominator instead of throwing.
 */
export function countQualityScore(
  predicted: number,
  actual: number,
  accuracyDenominator: number = DEFAULT_ACCURACY_DENOMINATOR
): ScoreOutcome {
  if (predicted < 0 || actual < 0) {
    return { ok: false, error: 'Negative case counts are not allowed' };
  }
  if (!(accuracyDenominator > 0)) {
    return { ok: false, error: 'The accuracy denominator must be positive' };
  }
  const numerator = Math.abs(predicted - actual);
  const denominator = Math.max(predicted, actual, accuracyDenominator);
  return { ok: true, value: 1 - numerator / denominator };
}

/**
 * Index records by normalized event date.
 * Two records on the same date violate the one-record-per-date precondition.
 */
function indexByDate<T extends { eventDate: string }>(
  records: T[],
  idOf: (record: T) => RecordId,
  kind: string
): Map<string, T> {
  const index = new Map<string, T>();
  for (const record of records) {
    const key = toDateKey(record.eventDate);
    const existing = index.get(key);
    if (existing) {
      throw new RecordValidationError(
        `Duplicate ${kind} for ${key}: ${idOf(existing)} and ${idOf(record)}; at most one per date and scope is allowed`,
        'Event_Date'
      );
    }
    index.set(key, record);
  }
  return index;
}

export class CountMagnitudeScorer implements CategoryScorer<CountMagnitudeDetails> {
  readonly algoVersion = 'count-magnitude@1.0.0';
  readonly category: string;
  readonly scope: Readonly<LocationScope>;
  readonly accuracyDenominator: number;

  constructor(options: CountMagnitudeOptions) {
    this.category = options.category;
    this.scope = Object.freeze(resolveLocationScope(options.location));
    this.accuracyDenominator = options.accuracyDenominator ?? DEFAULT_ACCURACY_DENOMINATOR;
  }

  get description(): string {
    return `${this.category} counts in ${formatLocationScope(this.scope)}`;
  }

  /**
   * Filter to this scorer's category and scope, and parse the payload
   */
  selectRecords(
    warnings: readonly RawRecord[],
    gsr: readonly RawRecord[]
  ): { warnings: CountWarning[]; events: CountEvent[] } {
    return {
      warnings: warnings.filter((r) => isInScope(r, this.category, this.scope)).map(parseCountWarning),
      events: gsr.filter((r) => isInScope(r, this.category, this.scope)).map(parseCountEvent),
    };
  }

  /**
   * Score a single warning against a single event
   */
  scoreOne(warning: CountWarning, event: CountEvent): CountPairScore {
    const outcome = countQualityScore(warning.caseCount, event.caseCount, this.accuracyDenominator);
    const pair: CountPairScore = {
      warningId: warning.warningId,
      eventId: event.eventId,
      eventDate: toDateKey(event.eventDate),
      warningValue: warning.caseCount,
      eventValue: event.caseCount,
      qualityScore: outcome.ok ? outcome.value : null,
    };
    if (!outcome.ok) {
      pair.error = outcome.error;
    }
    return pair;
  }

  score(warnings: readonly RawRecord[], gsr: readonly RawRecord[]): ScoringResult<CountMagnitudeDetails> {
    const selected = this.selectRecords(warnings, gsr);
    const warningsByDate = indexByDate(selected.warnings, (w) => w.warningId, 'warning');
    const eventsByDate = indexByDate(selected.events, (e) => e.eventId, 'GSR event');

    // Full outer join on event date
    const matches: MatchPair[] = [];
    const unmatchedWarnings: RecordId[] = [];
    const pairs: CountPairScore[] = [];

    for (const [date, warning] of warningsByDate) {
      const event = eventsByDate.get(date);
      if (!event) {
        unmatchedWarnings.push(warning.warningId);
        continue;
      }
      matches.push([warning.warningId, event.eventId]);

      const pair = this.scoreOne(warning, event);
      if (pair.error) {
        console.warn(`[countMagnitude] ${pair.error} (warning ${pair.warningId}, event ${pair.eventId})`);
      }
      pairs.push(pair);
    }

    const unmatchedGsr = selected.events
      .filter((event) => !warningsByDate.has(toDateKey(event.eventDate)))
      .map((event) => event.eventId);

    const qsValues = pairs.flatMap((pair) => (pair.qualityScore === null ? [] : [pair.qualityScore]));
    const nWarn = selected.warnings.length;
    const nGsr = selected.events.length;
    const precision = nWarn > 0 ? matches.length / nWarn : 0;
    const recall = nGsr > 0 ? matches.length / nGsr : 0;

    // Logs go to stderr; stdout carries only the CLI report
    console.error(
      `[countMagnitude] ${this.description}: ${nWarn} warnings, ${nGsr} events, ${matches.length} matched`
    );

    return {
      matches,
      unmatchedWarnings,
      unmatchedGsr,
      results: {
        qualityScore: mean(qsValues),
        precision,
        recall,
        f1: f1(precision, recall),
      },
      details: { qsValues, pairs },
    };
  }
}
