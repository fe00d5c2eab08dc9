/**
 * Domain Entity: scored recommendation
 */

import type { RecommendationRecord } from '@seo-insights/shared-contracts';

export type PriorityLabel = 'QUICK WIN' | 'HIGH IMPACT' | 'STRATEGIC';

export interface ScoringBreakdown {
  impact: number;
  effort: number;
  confidenceMultiplier: number;
  timelineUrgency: number;
  roi: number;
}

export type ScoredRecommendation = Omit<RecommendationRecord, 'priority'> & {
  impactScore: number;
  effortScore: number;
  roiScore: number;
  finalScore: number;
  priority: PriorityLabel;
  scoringBreakdown: ScoringBreakdown;
};

export type RankedRecommendation = ScoredRecommendation & { rank: number };

export interface PrioritySummary {
  totalRecommendations: number;
  breakdown: { quickWins: number; highImpact: number; strategic: number };
  percentages: { quickWins: number; highImpact: number; strategic: number };
  averageScores: { impact: number; effort: number; roi: number };
  topPriority: string | null;
}
