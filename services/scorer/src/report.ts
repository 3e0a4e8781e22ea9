/**
 * Report formatting and record-file parsing for the CLI
 */

import { RecordValidationError, type RawRecord, type RecordId, type ScoringResult } from '@gsr-scoring/core';

/**
 * Scoring result rendered with the published output key names
 */
export interface ScoreReport<TDetails> {
  'Matches': [RecordId, RecordId][];
  'Unmatched Warnings': RecordId[];
  'Unmatched GSR': RecordId[];
  'Results': {
    'Quality Score': number;
    'Precision': number;
    'Recall': number;
    'F1': number;
  };
  'Details': TDetails;
}

export function toReport<TDetails>(result: ScoringResult<TDetails>): ScoreReport<TDetails> {
  return {
    'Matches': result.matches.map(([warningId, eventId]): [RecordId, RecordId] => [warningId, eventId]),
    'Unmatched Warnings': [...result.unmatchedWarnings],
    'Unmatched GSR': [...result.unmatchedGsr],
    'Results': {
      'Quality Score': result.results.qualityScore,
      'Precision': result.results.precision,
      'Recall': result.results.recall,
      'F1': result.results.f1,
    },
    'Details': result.details,
  };
}

/**
 * One-line summary for logs
 */
export function formatResultSummary(label: string, result: ScoringResult<unknown>): string {
  const { qualityScore, precision, recall, f1 } = result.results;
  return (
    `[${label}] matches=${result.matches.length} ` +
    `unmatchedWarnings=${result.unmatchedWarnings.length} unmatchedGsr=${result.unmatchedGsr.length} ` +
    `QS=${qualityScore.toFixed(3)} P=${precision.toFixed(3)} R=${recall.toFixed(3)} F1=${f1.toFixed(3)}`
  );
}

function isPlainRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON array of records
 *
 * @param source - label used in error messages (usually the file path)
 */
export function parseRecordsJson(text: string, source: string): RawRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordValidationError(`${source}: invalid JSON (${reason})`);
  }

  if (!Array.isArray(parsed)) {
    throw new RecordValidationError(`${source}: expected a JSON array of records`);
  }

  const records: RawRecord[] = [];
  parsed.forEach((item: unknown, i) => {
    if (!isPlainRecord(item)) {
      throw new RecordValidationError(`${source}: item ${i} is not an object`);
    }
    records.push(item);
  });
  return records;
}
