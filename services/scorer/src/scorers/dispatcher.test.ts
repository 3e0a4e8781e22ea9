/**
 * Scorer Dispatcher Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RecordValidationError } from '@gsr-scoring/core';
import { CountMagnitudeScorer } from './countMagnitudeScorer.js';
import { MultiFacetScorer } from './multiFacetScorer.js';
import { SUPPORTED_CATEGORIES, createScorer, getStrategy, parseCategoryString } from './dispatcher.js';

function expectInstance<T>(value: unknown, ctor: new (...args: never[]) => T): T {
  if (!(value instanceof ctor)) {
    throw new Error(`Expected an instance of ${ctor.name}`);
  }
  return value;
}

describe('parseCategoryString', () => {
  it('should match canonical names case-insensitively', () => {
    assert.equal(parseCategoryString('Civil Unrest'), 'Civil Unrest');
    assert.equal(parseCategoryString('  disease '), 'Disease');
    assert.equal(parseCategoryString('MILITARY ACTIVITY'), 'Military Activity');
  });

  it('should resolve short aliases', () => {
    assert.equal(parseCategoryString('cu'), 'Civil Unrest');
    assert.equal(parseCategoryString('civil-unrest'), 'Civil Unrest');
    assert.equal(parseCategoryString('MA'), 'Military Activity');
    assert.equal(parseCategoryString('military_activity'), 'Military Activity');
  });

  it('should return null for unknown categories', () => {
    assert.equal(parseCategoryString('weather'), null);
    assert.equal(parseCategoryString(''), null);
    assert.equal(parseCategoryString('toString'), null);
  });
});

describe('getStrategy', () => {
  it('should route count categories and facet categories', () => {
    assert.deepEqual(SUPPORTED_CATEGORIES, ['Civil Unrest', 'Disease', 'Military Activity']);
    assert.equal(getStrategy('Civil Unrest'), 'count-magnitude');
    assert.equal(getStrategy('Disease'), 'count-magnitude');
    assert.equal(getStrategy('Military Activity'), 'multi-facet');
  });
});

describe('createScorer', () => {
  it('should build a count-magnitude scorer for a location preset', () => {
    const scorer = expectInstance(createScorer({ category: 'Civil Unrest', location: 'Madaba' }), CountMagnitudeScorer);
    assert.deepEqual(scorer.scope, { country: 'Jordan', state: 'Madaba' });
    assert.equal(scorer.accuracyDenominator, 4);
  });

  it('should pass the count config through', () => {
    const scorer = expectInstance(createScorer({
      category: 'Disease',
      location: 'Saudi Arabia',
      countConfig: { accuracyDenominator: 8 },
    }), CountMagnitudeScorer);
    assert.equal(scorer.accuracyDenominator, 8);
    assert.equal(scorer.algoVersion, 'count-magnitude@1.0.0');
  });

  it('should build a multi-facet scorer for a country', () => {
    const scorer = expectInstance(createScorer({
      category: 'Military Activity',
      location: 'Syria',
      facetConfig: { maxDistKm: 30, maxDateDiffDays: 2 },
    }), MultiFacetScorer);
    assert.equal(scorer.country, 'Syria');
    assert.equal(scorer.config.maxDistKm, 30);
    assert.equal(scorer.config.distBufferKm, 5);
    assert.equal(scorer.config.maxDateDiffDays, 2);
    assert.equal(scorer.description, 'Military Activity events in Syria');
  });

  it('should take the country of an explicit scope for multi-facet categories', () => {
    const scorer = expectInstance(createScorer({
      category: 'Military Activity',
      location: { country: 'Iraq', state: 'Basra' },
      distanceFn: () => 0,
    }), MultiFacetScorer);
    assert.equal(scorer.country, 'Iraq');
  });

  it('should reject unknown location presets for count categories', () => {
    assert.throws(
      () => createScorer({ category: 'Civil Unrest', location: 'Syria' }),
      (err: unknown) => err instanceof RecordValidationError && /Unknown location: Syria/.test(err.message)
    );
  });
});
