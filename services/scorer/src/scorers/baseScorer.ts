/**
 * Category Scorer Interface
 *
 * Contract shared by every category-specific scoring strategy.
 * Scorers hold only their own frozen configuration, so one instance can
 * score any number of warning/GSR sets independently.
 */

import type { RawRecord, ScoringResult } from '@gsr-scoring/core';

/**
 * @template TDetails - Audit details attached to the result (per-pair component scores)
 */
export interface CategoryScorer<TDetails = unknown> {
  /**
   * Event_Type this scorer handles
   */
  readonly category: string;

  /**
   * Algorithm version string (e.g., "count-magnitude@1.0.0")
   */
  readonly algoVersion: string;

  /**
   * Human-readable description, including the configured scope
   */
  readonly description: string;

  /**
   * Match warnings to GSR events and score the matches.
   * Records outside the scorer's category/scope are ignored.
   *
   * @param warnings - Warning records
   * @param gsr - GSR event records
   */
  score(warnings: readonly RawRecord[], gsr: readonly RawRecord[]): ScoringResult<TDetails>;
}
