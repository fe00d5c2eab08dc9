import { describe, it, expect } from 'vitest';
import { parseImpactEstimate } from '../application/services/ImpactEstimateParser';

describe('parseImpactEstimate', () => {
  it('reads clicks and a thousands-grouped dollar amount', () => {
    expect(parseImpactEstimate('+300 clicks, $15,000 revenue')).toEqual({
      clicks: 300,
      conversions: 0,
      dollars: 15000,
      mentionsRevenue: true,
    });
  });

  it('reads grouped click counts and conversions', () => {
    expect(parseImpactEstimate('+1,200 clicks/month and 45 conversions')).toEqual({
      clicks: 1200,
      conversions: 45,
      dollars: null,
      mentionsRevenue: false,
    });
  });

  it('applies the k multiplier to dollar amounts', () => {
    expect(parseImpactEstimate('$12k').dollars).toBe(12000);
    expect(parseImpactEstimate('$2.5k in added value')).toMatchObject({ dollars: 2500, mentionsRevenue: true });
  });

  it('matches keywords case-insensitively', () => {
    expect(parseImpactEstimate('500 CLICKS, 8 Conversions')).toMatchObject({ clicks: 500, conversions: 8 });
  });

  it('keeps only the first match of each form', () => {
    expect(parseImpactEstimate('+100 clicks now, +900 clicks later').clicks).toBe(100);
  });

  it('detects revenue wording without an amount', () => {
    expect(parseImpactEstimate('Higher lifetime value')).toEqual({
      clicks: 0,
      conversions: 0,
      dollars: null,
      mentionsRevenue: true,
    });
  });

  it('returns zeros for missing or unquantified text', () => {
    const empty = { clicks: 0, conversions: 0, dollars: null, mentionsRevenue: false };
    expect(parseImpactEstimate(undefined)).toEqual(empty);
    expect(parseImpactEstimate('')).toEqual(empty);
    expect(parseImpactEstimate('Improved CTR on category pages')).toEqual(empty);
  });
});
