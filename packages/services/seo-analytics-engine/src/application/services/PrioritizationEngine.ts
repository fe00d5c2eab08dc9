/**
 * Prioritization Engine
 * Deterministic impact/effort scoring and ranking of recommendation records.
 */

import { RecommendationRecordSchema, Result, type RecommendationRecord } from '@seo-insights/shared-contracts';
import { z } from 'zod';
import type {
  PriorityLabel,
  PrioritySummary,
  RankedRecommendation,
  ScoredRecommendation,
} from '../../domains/entities';
import { getLogger } from '../../config/engine-config';
import { mean, round } from '../shared';
import { parseImpactEstimate } from './ImpactEstimateParser';

const logger = getLogger('seo-analytics-engine-prioritizationengine');

const EFFORT_SCORES: Record<string, number> = { low: 2, medium: 5, high: 8 };
const CONFIDENCE_MULTIPLIERS: Record<string, number> = { low: 0.6, medium: 0.8, high: 1.0 };
const TIMELINE_SCORES: Record<string, number> = { '2 weeks': 3, '1 month': 2, '3 months': 1, '6 months': 0.5 };

const DEFAULT_EFFORT = 5;
const DEFAULT_CONFIDENCE = 0.8;
const DEFAULT_TIMELINE = 1;
/** Assumed when a record names no timeline */
const UNSTATED_TIMELINE = '1 month';

/** "Low (5-10h)" -> "low" */
function categoryOf(value: string | undefined): string {
  if (!value) return '';
  const parenthesis = value.indexOf('(');
  return (parenthesis >= 0 ? value.slice(0, parenthesis) : value).trim().toLowerCase();
}

function lookup(table: Record<string, number>, key: string, fallback: number): number {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : fallback;
}

export function impactScore(record: RecommendationRecord): number {
  const estimate = parseImpactEstimate(record.impactEstimate);
  let score = 0;
  if (estimate.clicks > 0) score += Math.min(estimate.clicks / 50, 5);
  if (estimate.conversions > 0) score += Math.min(estimate.conversions / 10, 3);
  if (estimate.mentionsRevenue) score += 2;
  if (record.dataEvidence && record.dataEvidence.length > 0) score += 1;
  return Math.min(score, 10);
}

export function effortScore(record: RecommendationRecord): number {
  let score = lookup(EFFORT_SCORES, categoryOf(record.effort), DEFAULT_EFFORT);
  if (record.dependencies && record.dependencies.length > 2) score += 1;
  if (record.implementationSteps && record.implementationSteps.length > 5) score += 0.5;
  return Math.min(score, 10);
}

export function confidenceMultiplier(record: RecommendationRecord): number {
  return lookup(CONFIDENCE_MULTIPLIERS, categoryOf(record.confidence), DEFAULT_CONFIDENCE);
}

export function timelineUrgency(record: RecommendationRecord): number {
  const timeline = record.timeline?.trim().toLowerCase() || UNSTATED_TIMELINE;
  return lookup(TIMELINE_SCORES, timeline, DEFAULT_TIMELINE);
}

export function priorityLabel(finalScore: number, effort: number, urgency: number): PriorityLabel {
  if (finalScore > 8 && effort < 4 && urgency >= 2) return 'QUICK WIN';
  if (finalScore > 6) return 'HIGH IMPACT';
  return 'STRATEGIC';
}

/**
 * Validates upstream recommendation JSON into records.
 */
export function parseRecommendationRecords(input: unknown): Result<RecommendationRecord[]> {
  const parsed = z.array(RecommendationRecordSchema).safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    logger.debug('Rejected recommendation payload', { issues });
    return Result.fail('INVALID_INPUT', `Invalid recommendation records: ${issues}`, parsed.error);
  }
  return Result.ok(parsed.data);
}

export class PrioritizationEngine {
  scoreRecommendation(record: RecommendationRecord): ScoredRecommendation {
    const impact = impactScore(record);
    const effort = effortScore(record);
    const multiplier = confidenceMultiplier(record);
    const urgency = timelineUrgency(record);

    const roi = (impact / Math.max(effort, 1)) * multiplier;
    const finalScore = roi + urgency;

    return {
      ...record,
      impactScore: round(impact),
      effortScore: effort,
      roiScore: round(roi),
      finalScore: round(finalScore),
      priority: priorityLabel(finalScore, effort, urgency),
      scoringBreakdown: {
        impact,
        effort,
        confidenceMultiplier: multiplier,
        timelineUrgency: urgency,
        roi,
      },
    };
  }

  /** Highest final score first; ties keep their input order */
  prioritizeRecommendations(records: readonly RecommendationRecord[]): RankedRecommendation[] {
    const ranked = records
      .map(record => this.scoreRecommendation(record))
      .sort((a, b) => b.finalScore - a.finalScore)
      .map((scored, index) => ({ ...scored, rank: index + 1 }));

    logger.debug('Recommendations prioritized', { count: ranked.length });
    return ranked;
  }

  getPrioritySummary(scored: readonly ScoredRecommendation[]): PrioritySummary {
    const total = scored.length;
    const count = (label: PriorityLabel) => scored.filter(item => item.priority === label).length;
    const share = (n: number) => round((n / Math.max(total, 1)) * 100, 1);

    const quickWins = count('QUICK WIN');
    const highImpact = count('HIGH IMPACT');
    const strategic = count('STRATEGIC');

    return {
      totalRecommendations: total,
      breakdown: { quickWins, highImpact, strategic },
      percentages: { quickWins: share(quickWins), highImpact: share(highImpact), strategic: share(strategic) },
      averageScores: {
        impact: round(mean(scored.map(item => item.impactScore))),
        effort: round(mean(scored.map(item => item.effortScore))),
        roi: round(mean(scored.map(item => item.roiScore))),
      },
      topPriority: total > 0 ? scored[0].recommendation : null,
    };
  }
}
