/**
 * Scorer Dispatcher
 *
 * Routes event categories to their scoring strategy.
 * The registry is fixed at module load; scorers are built per call.
 */

import {
  EventType,
  RecordValidationError,
  type CountScoringConfig,
  type DistanceFn,
  type EventTypeName,
  type FacetScoringConfig,
  type LocationScope,
} from '@gsr-scoring/core';
import type { CategoryScorer } from './baseScorer.js';
import { CountMagnitudeScorer, type CountMagnitudeDetails } from './countMagnitudeScorer.js';
import { MultiFacetScorer, type MultiFacetDetails } from './multiFacetScorer.js';

export type ScoringStrategy = 'count-magnitude' | 'multi-facet';

export type AnyCategoryScorer = CategoryScorer<CountMagnitudeDetails> | CategoryScorer<MultiFacetDetails>;

/**
 * Options for building a scorer.
 * For multi-facet categories the location is read as a country.
 */
export interface CreateScorerOptions {
  category: EventTypeName;
  location: string | LocationScope;
  countConfig?: Partial<CountScoringConfig>;
  facetConfig?: Partial<FacetScoringConfig>;
  distanceFn?: DistanceFn;
}

const STRATEGIES: ReadonlyMap<EventTypeName, ScoringStrategy> = new Map<EventTypeName, ScoringStrategy>([
  [EventType.CIVIL_UNREST, 'count-magnitude'],
  [EventType.DISEASE, 'count-magnitude'],
  [EventType.MILITARY_ACTIVITY, 'multi-facet'],
]);

/**
 * Categories that have a scoring strategy
 */
export const SUPPORTED_CATEGORIES: readonly EventTypeName[] = Object.freeze([...STRATEGIES.keys()]);

/**
 * Get the strategy for a category
 */
export function getStrategy(category: EventTypeName): ScoringStrategy {
  const strategy = STRATEGIES.get(category);
  if (!strategy) {
    throw new RecordValidationError(
      `No scorer for category ${category}. Supported: ${SUPPORTED_CATEGORIES.join(', ')}`,
      'Event_Type'
    );
  }
  return strategy;
}

/**
 * Parse category string to a canonical Event_Type
 */
export function parseCategoryString(category: string): EventTypeName | null {
  const trimmed = category.trim();

  // Direct match
  const direct = SUPPORTED_CATEGORIES.find((c) => c.toLowerCase() === trimmed.toLowerCase());
  if (direct) {
    return direct;
  }

  // Short aliases
  const aliasMap: Record<string, EventTypeName> = {
    'cu': EventType.CIVIL_UNREST,
    'unrest': EventType.CIVIL_UNREST,
    'civil_unrest': EventType.CIVIL_UNREST,
    'disease': EventType.DISEASE,
    'ma': EventType.MILITARY_ACTIVITY,
    'military': EventType.MILITARY_ACTIVITY,
    'military_activity': EventType.MILITARY_ACTIVITY,
  };

  const key = trimmed.toLowerCase().replace(/[\s-]+/g, '_');
  return Object.prototype.hasOwnProperty.call(aliasMap, key) ? aliasMap[key] : null;
}

/**
 * Build the scorer for a category and location
 */
export function createScorer(options: CreateScorerOptions): AnyCategoryScorer {
  const { category, location } = options;

  if (getStrategy(category) === 'count-magnitude') {
    return new CountMagnitudeScorer({
      category,
      location,
      accuracyDenominator: options.countConfig?.accuracyDenominator,
    });
  }

  const country = typeof location === 'string' ? location : location.country;
  return new MultiFacetScorer({
    ...options.facetConfig,
    category,
    country,
    distanceFn: options.distanceFn,
  });
}
