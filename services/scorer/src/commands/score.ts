import * as fs from 'node:fs';
import {
  RecordValidationError,
  loadCountScoringConfig,
  loadFacetScoringConfig,
  type RawRecord,
} from '@gsr-scoring/core';
import { createScorer, parseCategoryString, SUPPORTED_CATEGORIES } from '../scorers/index.js';
import { formatResultSummary, parseRecordsJson, toReport, type ScoreReport } from '../report.js';

export interface ScoreOptions {
  category: string;
  location: string;
  /** Path to a JSON array of warning records */
  warnings: string;
  /** Path to a JSON array of GSR event records */
  gsr: string;
  pretty?: boolean;
}

/**
 * Read a JSON array of records from disk
 */
function readRecordsFile(filePath: string): RawRecord[] {
  return parseRecordsJson(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Score two record files and print the report.
 * stdout receives the JSON report only; progress lines go to stderr.
 */
export function runScore(options: ScoreOptions): ScoreReport<unknown> {
  const category = parseCategoryString(options.category);
  if (!category) {
    throw new RecordValidationError(
      `Invalid category: ${options.category}. Supported: ${SUPPORTED_CATEGORIES.join(', ')}`,
      'Event_Type'
    );
  }

  const scorer = createScorer({
    category,
    location: options.location,
    countConfig: loadCountScoringConfig(),
    facetConfig: loadFacetScoringConfig(),
  });
  console.error(`[cli] ${scorer.algoVersion}: ${scorer.description}`);

  const result = scorer.score(readRecordsFile(options.warnings), readRecordsFile(options.gsr));
  console.error(formatResultSummary('cli', result));

  const report: ScoreReport<unknown> = toReport<unknown>(result);
  console.log(JSON.stringify(report, null, options.pretty ? 2 : undefined));
  return report;
}
