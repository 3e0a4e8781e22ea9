/**
 * A warning or GSR record as handed over by the loader: field name -> value
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Warning_ID / Event_ID values are passed through unchanged
 */
export type RecordId = string | number;

/**
 * Location a scorer instance is responsible for.
 * Unset levels are left unconstrained.
 */
export interface LocationScope {
  country: string;
  state?: string;
  city?: string;
}

/**
 * Category + location fields shared by every record
 */
export interface ScopedFields {
  category: string;
  country: string;
  state?: string;
  city?: string;
}

/**
 * Warning with a numeric count payload
 */
export interface CountWarning extends ScopedFields {
  warningId: RecordId;
  eventDate: string;
  caseCount: number;
}

/**
 * GSR event with a numeric count payload
 */
export interface CountEvent extends ScopedFields {
  eventId: RecordId;
  eventDate: string;
  caseCount: number;
}

/**
 * Warning with location/actor/subtype facets
 */
export interface FacetWarning extends ScopedFields {
  warningId: RecordId;
  eventDate: string;
  latitude: number;
  longitude: number;
  actor: string;
  subtype: string;
}

/**
 * GSR event with location/actor/subtype facets.
 * Actor and subtype hold every acceptable value.
 */
export interface FacetEvent extends ScopedFields {
  eventId: RecordId;
  eventDate: string;
  latitude: number;
  longitude: number;
  approximateLocation: boolean;
  actor: readonly string[];
  subtype: readonly string[];
}

/**
 * Matched (warning id, event id) pair
 */
export type MatchPair = readonly [warningId: RecordId, eventId: RecordId];

/**
 * Aggregate statistics for one scoring run
 */
export interface AggregateResults {
  qualityScore: number;
  precision: number;
  recall: number;
  f1: number;
}

/**
 * Output of a category scorer
 */
export interface ScoringResult<TDetails> {
  matches: MatchPair[];
  unmatchedWarnings: RecordId[];
  unmatchedGsr: RecordId[];
  results: AggregateResults;
  details: TDetails;
}

/**
 * Outcome of a computation that reports failures instead of throwing
 */
export type ScoreOutcome =
  | { ok: true; value: number }
  | { ok: false; error: string };
