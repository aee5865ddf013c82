// api/src/modules/analytics/recommendations/recommendation-rules.ts

import { RECOMMENDATION_CATEGORY, RECOMMENDATION_PRIORITY } from '@constants';
import type { RecommendationThresholds } from '@constants';
import type {
  AnalyticsViews,
  Recommendation,
  RiderPerformance,
  ZoneDelay,
  ZonePickingTime,
} from '../../../types/quick-commerce-analytics';
import { average, roundTo } from '@utils/metric-aggregation.util';

/**
 * Any view may be absent (e.g. a partial dashboard); a rule reading a
 * missing view does not fire.
 */
export type RecommendationInput = Partial<AnalyticsViews>;

/**
 * Declarative rule: `match` returns the values the messages need, or null
 * when the condition is not met.
 */
export interface RecommendationRuleDescriptor<TMatch> {
  id: string;
  category: RECOMMENDATION_CATEGORY;
  priority: RECOMMENDATION_PRIORITY;
  match: (views: RecommendationInput, thresholds: RecommendationThresholds) => TMatch | null;
  issue: (match: TMatch) => string;
  recommendation: (match: TMatch) => string;
}

export interface RecommendationRule {
  id: string;
  category: RECOMMENDATION_CATEGORY;
  priority: RECOMMENDATION_PRIORITY;
  evaluate: (
    views: RecommendationInput,
    thresholds: RecommendationThresholds,
  ) => Recommendation | null;
}

export function defineRule<TMatch>(
  descriptor: RecommendationRuleDescriptor<TMatch>,
): RecommendationRule {
  const { id, category, priority } = descriptor;
  return {
    id,
    category,
    priority,
    evaluate: (views, thresholds) => {
      const match = descriptor.match(views, thresholds);
      if (match === null) return null;
      return {
        category,
        priority,
        issue: descriptor.issue(match),
        recommendation: descriptor.recommendation(match),
      };
    },
  };
}

// =====================
// Helpers
// =====================

/** Entry with the highest value; the earliest one wins a tie. */
function maxBy<T>(entries: ReadonlyArray<T>, valueFn: (entry: T) => number): T | null {
  let best: T | null = null;
  let bestValue = -Infinity;
  for (const entry of entries) {
    const value = valueFn(entry);
    if (value > bestValue) {
      best = entry;
      bestValue = value;
    }
  }
  return best;
}

// =====================
// Rules (evaluation and output order)
// =====================

const deliveryDelaysRule = defineRule<{ avgDelay: number; worstZone: ZoneDelay | null }>({
  id: 'delivery-delays',
  category: RECOMMENDATION_CATEGORY.DELIVERY_DELAYS,
  priority: RECOMMENDATION_PRIORITY.HIGH,
  match: (views, thresholds) => {
    const avgDelay = views.overview?.avgDelay;
    if (avgDelay === undefined || avgDelay <= thresholds.maxAvgDelayMinutes) return null;
    return {
      avgDelay,
      worstZone: maxBy(views.delays?.delaysByZone ?? [], zone => zone.avgDelay),
    };
  },
  issue: ({ avgDelay, worstZone }) =>
    worstZone
      ? `Average delay is ${avgDelay} minutes, worst in zone '${worstZone.zone}' (${worstZone.avgDelay} minutes)`
      : `Average delay is ${avgDelay} minutes`,
  recommendation: ({ worstZone }) =>
    worstZone
      ? `Increase rider capacity in '${worstZone.zone}' during peak hours and optimize routing algorithms`
      : 'Increase rider capacity during peak hours and optimize routing algorithms',
});

const orderCancellationsRule = defineRule<{ cancellationRate: number; topReason: string }>({
  id: 'order-cancellations',
  category: RECOMMENDATION_CATEGORY.ORDER_CANCELLATIONS,
  priority: RECOMMENDATION_PRIORITY.HIGH,
  match: (views, thresholds) => {
    const cancellationRate = views.overview?.cancellationRate;
    if (cancellationRate === undefined || cancellationRate <= thresholds.maxCancellationRate) {
      return null;
    }
    const top = maxBy(views.cancellations?.cancellationReasons ?? [], reason => reason.count);
    return top ? { cancellationRate, topReason: top.reason } : null;
  },
  issue: ({ cancellationRate, topReason }) =>
    `Cancellation rate is ${cancellationRate}%, mainly due to '${topReason}'`,
  recommendation: ({ topReason }) =>
    `Address '${topReason}' issue through improved inventory management or customer communication`,
});

const inventoryStockoutsRule = defineRule<{ stockoutRate: number; department: string | null }>({
  id: 'inventory-stockouts',
  category: RECOMMENDATION_CATEGORY.INVENTORY_STOCKOUTS,
  priority: RECOMMENDATION_PRIORITY.HIGH,
  match: (views, thresholds) => {
    const stockoutRate = views.overview?.stockoutRate;
    if (stockoutRate === undefined || stockoutRate <= thresholds.maxStockoutRate) return null;
    const worst = maxBy(
      views.stockouts?.stockoutsByDepartment ?? [],
      department => department.stockoutCount,
    );
    return { stockoutRate, department: worst?.department ?? null };
  },
  issue: ({ stockoutRate, department }) =>
    department
      ? `Stockout rate is ${stockoutRate}%, concentrated in '${department}'`
      : `Stockout rate is ${stockoutRate}%`,
  recommendation: () =>
    'Implement predictive inventory management and increase safety stock for high-demand items',
});

const storePickingRule = defineRule<ZonePickingTime>({
  id: 'store-picking',
  category: RECOMMENDATION_CATEGORY.STORE_OPERATIONS,
  priority: RECOMMENDATION_PRIORITY.MEDIUM,
  match: (views, thresholds) => {
    const slowest = maxBy(views.picking?.pickingTimeByZone ?? [], zone => zone.avgPickingTime);
    if (!slowest || slowest.avgPickingTime <= thresholds.maxAvgPickingTimeMinutes) return null;
    return slowest;
  },
  issue: ({ zone, avgPickingTime }) =>
    `Average picking time in zone '${zone}' is ${avgPickingTime} minutes`,
  recommendation: () =>
    'Optimize store layout, train staff on efficient picking, and consider automation tools',
});

const riderLoadRule = defineRule<{ rider: RiderPerformance; cohortAverage: number }>({
  id: 'rider-load',
  category: RECOMMENDATION_CATEGORY.RIDER_MANAGEMENT,
  priority: RECOMMENDATION_PRIORITY.MEDIUM,
  match: (views, thresholds) => {
    const riders = views.riders?.riders ?? [];
    if (riders.length === 0) return null;
    const cohortAverage = average(riders.map(rider => rider.totalDeliveries));
    const busiest = maxBy(riders, rider => rider.totalDeliveries);
    if (!busiest) return null;
    if (busiest.totalDeliveries <= cohortAverage * thresholds.riderLoadImbalanceFactor) {
      return null;
    }
    return { rider: busiest, cohortAverage: roundTo(cohortAverage) };
  },
  issue: ({ rider, cohortAverage }) =>
    `Rider '${rider.name}' (${rider.zone}) handled ${rider.totalDeliveries} deliveries against a cohort average of ${cohortAverage}`,
  recommendation: () =>
    'Hire additional riders and implement better load balancing across zones',
});

const onTimeDeliveryRule = defineRule<{ onTimeRate: number }>({
  id: 'on-time-delivery',
  category: RECOMMENDATION_CATEGORY.CUSTOMER_EXPERIENCE,
  priority: RECOMMENDATION_PRIORITY.CRITICAL,
  match: (views, thresholds) => {
    const overview = views.overview;
    if (!overview || overview.deliveredOrders === 0) return null;
    return overview.onTimeRate < thresholds.minOnTimeRate
      ? { onTimeRate: overview.onTimeRate }
      : null;
  },
  issue: ({ onTimeRate }) => `Only ${onTimeRate}% of orders delivered on time`,
  recommendation: () =>
    'Review entire fulfillment process, increase buffer time in delivery estimates, and optimize operations',
});

export const RECOMMENDATION_RULES: ReadonlyArray<RecommendationRule> = [
  deliveryDelaysRule,
  orderCancellationsRule,
  inventoryStockoutsRule,
  storePickingRule,
  riderLoadRule,
  onTimeDeliveryRule,
];
