import { InvalidConfigurationError, MalformedRecordError } from '../core/src/errors';
import { configure, confidenceFor, roundScore } from '../core/src/scoring';
import type { RawOfficerRecord } from '../core/src/types';
import { john, unrelated, william } from './fixtures';

const scorer = configure();

describe('ConnectionScorer', () => {
  it('scores the father and son directors', () => {
    const res = scorer.score(william, john);
    expect(res.reasons).toEqual([
      'Similar surnames: Gregory / Gregory (similarity 100)',
      'Age gap of 33.4 years suggests possible parent-child relationship',
      'Concurrent service at company 01329163',
      'Exact address match',
      'Surname GREGORY of John Kennedy Gregory found in company name GREGORY DISTRIBUTION LIMITED',
      'Surname GREGORY of William John Gregory found in company name GREGORY DISTRIBUTION LIMITED',
    ]);
    expect(res.totalScore).toBe(100);
    expect(res.confidence).toBe('high');
    expect(res.signals.map((s) => [s.category, s.points])).toEqual([
      ['name', 20],
      ['age', 15],
      ['appointment', 20],
      ['address', 25],
      ['companyName', 20],
    ]);
  });

  it('returns an empty result for unconnected officers', () => {
    const res = scorer.score({ full_name: 'Alice Brown', roles: [{ company_number: '111', appointed_on: '2001-01-05' }] }, unrelated);
    expect(res.totalScore).toBe(0);
    expect(res.reasons).toEqual([]);
    expect(res.confidence).toBe('low');
  });

  it('is deterministic', () => {
    expect(scorer.score(william, john)).toEqual(scorer.score(william, john));
  });

  it('is symmetric in score and reason set', () => {
    const ab = scorer.score(william, john);
    const ba = scorer.score(john, william);
    expect(ba.totalScore).toBe(ab.totalScore);
    expect([...ba.reasons].sort()).toEqual([...ab.reasons].sort());
  });

  it('increases strictly with a shared middle name', () => {
    const base = scorer.score({ full_name: 'Ann Lee', middle_names: [] }, { full_name: 'Bob Lee', middle_names: [] });
    const shared = scorer.score({ full_name: 'Ann Lee', middle_names: ['Rose'] }, { full_name: 'Bob Lee', middle_names: ['Rose'] });
    expect(shared.totalScore).toBeGreaterThan(base.totalScore);
    expect(shared.totalScore - base.totalScore).toBe(15);
  });

  it('degrades missing birth dates and coordinates to no signal', () => {
    const bare: RawOfficerRecord = { full_name: 'Ann Lee' };
    const rich: RawOfficerRecord = { full_name: 'Bob Lee', date_of_birth: '1980-01-01', address: { full_address: '1 High St', latitude: 51.5, longitude: -0.12 } };
    expect(scorer.score(bare, rich).totalScore).toBe(scorer.score(bare, { full_name: 'Bob Lee' }).totalScore);
    expect(scorer.score(bare, rich).totalScore).toBe(20);
  });

  it('fails on a record without a name', () => {
    expect(() => scorer.score(william, { full_name: '' })).toThrow(MalformedRecordError);
  });
});

describe('aggregation options', () => {
  it('applies per-detector weights', () => {
    expect(configure({ weights: { address: 2 } }).score(william, john).totalScore).toBe(125);
  });

  it('drops the reasons of a zero-weighted detector', () => {
    const res = configure({ weights: { companyName: 0 } }).score(william, john);
    expect(res.totalScore).toBe(80);
    expect(res.signals[4]).toEqual({ category: 'companyName', points: 0, reasons: [] });
    expect(res.reasons).toHaveLength(4);
  });

  it('clamps to maxScore', () => {
    const res = configure({ maxScore: 80 }).score(william, john);
    expect(res.totalScore).toBe(80);
    expect(res.confidence).toBe('high');
  });

  it('validates at construction', () => {
    expect(() => configure({ confidenceCuts: { low: 50, high: 40 } })).toThrow(InvalidConfigurationError);
  });
});

test('confidenceFor uses inclusive lower bounds', () => {
  const cuts = { low: 30, high: 60 };
  expect(confidenceFor(29.9, cuts)).toBe('low');
  expect(confidenceFor(30, cuts)).toBe('medium');
  expect(confidenceFor(59.99, cuts)).toBe('medium');
  expect(confidenceFor(60, cuts)).toBe('high');
});

test('roundScore trims floating noise', () => {
  expect(roundScore(0.1 + 0.2)).toBe(0.3);
});
