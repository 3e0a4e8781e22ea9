/**
 * Report Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RecordValidationError, type ScoringResult } from '@gsr-scoring/core';
import { formatResultSummary, parseRecordsJson, toReport } from './report.js';

const result: ScoringResult<{ qsValues: number[] }> = {
  matches: [
    ['w1', 'e1'],
    [2, 7],
  ],
  unmatchedWarnings: ['w3'],
  unmatchedGsr: [],
  results: { qualityScore: 0.875, precision: 2 / 3, recall: 1, f1: 0.8 },
  details: { qsValues: [1, 0.75] },
};

describe('toReport', () => {
  it('should use the published key names', () => {
    assert.deepEqual(toReport(result), {
      'Matches': [
        ['w1', 'e1'],
        [2, 7],
      ],
      'Unmatched Warnings': ['w3'],
      'Unmatched GSR': [],
      'Results': { 'Quality Score': 0.875, 'Precision': 2 / 3, 'Recall': 1, 'F1': 0.8 },
      'Details': { qsValues: [1, 0.75] },
    });
  });

  it('should serialize to plain JSON', () => {
    const parsed: unknown = JSON.parse(JSON.stringify(toReport(result)));
    assert.deepEqual(parsed, {
      'Matches': [
        ['w1', 'e1'],
        [2, 7],
      ],
      'Unmatched Warnings': ['w3'],
      'Unmatched GSR': [],
      'Results': { 'Quality Score': 0.875, 'Precision': 2 / 3, 'Recall': 1, 'F1': 0.8 },
      'Details': { qsValues: [1, 0.75] },
    });
  });
});

describe('formatResultSummary', () => {
  it('should print counts and rounded scores on one line', () => {
    assert.equal(
      formatResultSummary('cli', result),
      '[cli] matches=2 unmatchedWarnings=1 unmatchedGsr=0 QS=0.875 P=0.667 R=1.000 F1=0.800'
    );
  });
});

describe('parseRecordsJson', () => {
  it('should parse an array of records', () => {
    const records = parseRecordsJson('[{"Warning_ID":"w1"},{"Warning_ID":2}]', 'warnings.json');
    assert.deepEqual(records, [{ Warning_ID: 'w1' }, { Warning_ID: 2 }]);
  });

  it('should reject invalid JSON', () => {
    assert.throws(
      () => parseRecordsJson('[{', 'warnings.json'),
      (err: unknown) => err instanceof RecordValidationError && err.message.startsWith('warnings.json: invalid JSON')
    );
  });

  it('should reject a non-array document', () => {
    assert.throws(() => parseRecordsJson('{"Warning_ID":"w1"}', 'gsr.json'), {
      message: 'gsr.json: expected a JSON array of records',
    });
  });

  it('should reject items that are not objects', () => {
    assert.throws(() => parseRecordsJson('[{"Event_ID":"e1"}, 3]', 'gsr.json'), {
      message: 'gsr.json: item 1 is not an object',
    });
    assert.throws(() => parseRecordsJson('[[1, 2]]', 'gsr.json'), {
      message: 'gsr.json: item 0 is not an object',
    });
  });
});
