/**
 * Impact estimate parser
 *
 * Grammar, matched case-insensitively anywhere in the text:
 *   number  := digits with optional ",ddd" thousands groups
 *   count   := "+"? ws* number ws* ("click" | "conversion")
 *   dollars := "$" ws* number ("." digits)? "k"?     ("k" multiplies by 1,000)
 * Revenue is mentioned when the text contains "$", "revenue" or "value".
 * Only the first match of each form counts.
 */

export interface ImpactEstimate {
  clicks: number;
  conversions: number;
  /** null when no dollar amount appears */
  dollars: number | null;
  mentionsRevenue: boolean;
}

const NUMBER = String.raw`\d{1,3}(?:,\d{3})+|\d+`;
const CLICKS_PATTERN = new RegExp(String.raw`\+?\s*(${NUMBER})\s*click`, 'i');
const CONVERSIONS_PATTERN = new RegExp(String.raw`\+?\s*(${NUMBER})\s*conversion`, 'i');
const DOLLARS_PATTERN = new RegExp(String.raw`\$\s*(${NUMBER})(\.\d+)?\s*(k\b)?`, 'i');
const REVENUE_PATTERN = /\$|revenue|value/i;

function toNumber(digits: string): number {
  return Number(digits.replace(/,/g, ''));
}

function extractCount(text: string, pattern: RegExp): number {
  const match = pattern.exec(text);
  return match ? toNumber(match[1]) : 0;
}

function extractDollars(text: string): number | null {
  const match = DOLLARS_PATTERN.exec(text);
  if (!match) return null;

  const amount = toNumber(match[1]) + (match[2] ? Number(match[2]) : 0);
  return match[3] ? amount * 1000 : amount;
}

export function parseImpactEstimate(text: string | undefined): ImpactEstimate {
  if (!text) {
    return { clicks: 0, conversions: 0, dollars: null, mentionsRevenue: false };
  }

  return {
    clicks: extractCount(text, CLICKS_PATTERN),
    conversions: extractCount(text, CONVERSIONS_PATTERN),
    dollars: extractDollars(text),
    mentionsRevenue: REVENUE_PATTERN.test(text),
  };
}
