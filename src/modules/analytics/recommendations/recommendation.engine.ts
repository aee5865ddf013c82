// api/src/modules/analytics/recommendations/recommendation.engine.ts

import { DEFAULT_RECOMMENDATION_THRESHOLDS, RECOMMENDATION_PRIORITY_ORDER } from '@constants';
import type { RecommendationThresholds } from '@constants';
import type {
  Recommendation,
  RecommendationGroup,
} from '../../../types/quick-commerce-analytics';
import { RECOMMENDATION_RULES } from './recommendation-rules';
import type { RecommendationInput, RecommendationRule } from './recommendation-rules';

/**
 * Evaluates every rule once against the views, in declaration order.
 */
export function evaluateRecommendations(
  views: RecommendationInput,
  thresholds: RecommendationThresholds = DEFAULT_RECOMMENDATION_THRESHOLDS,
  rules: ReadonlyArray<RecommendationRule> = RECOMMENDATION_RULES,
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  for (const rule of rules) {
    const recommendation = rule.evaluate(views, thresholds);
    if (recommendation) recommendations.push(recommendation);
  }
  return recommendations;
}

/**
 * Buckets recommendations by priority for presentation, most urgent first.
 * Within a bucket the evaluation order is kept.
 */
export function groupRecommendationsByPriority(
  recommendations: ReadonlyArray<Recommendation>,
): RecommendationGroup[] {
  return RECOMMENDATION_PRIORITY_ORDER.map(priority => ({
    priority,
    recommendations: recommendations.filter(item => item.priority === priority),
  })).filter(group => group.recommendations.length > 0);
}
