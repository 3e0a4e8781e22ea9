export type { CategoryScorer } from './baseScorer.js';
export * from './countMagnitudeScorer.js';
export * from './multiFacetScorer.js';
export * from './dispatcher.js';
