// api/src/types/quick-commerce-analytics.ts

import type { BaseResponse } from './common';
import type { RECOMMENDATION_CATEGORY, RECOMMENDATION_PRIORITY } from '@constants';

// =====================
// Overview
// =====================

export interface OverviewMetrics {
  totalOrders: number;
  deliveredOrders: number;
  cancelledOrders: number;
  pendingOrders: number;
  cancellationRate: number;
  avgDeliveryTime: number;
  avgDelay: number;
  onTimeRate: number;
  stockoutRate: number;
}

// =====================
// Delays
// =====================

export interface DelayDistribution {
  onTime: number;
  slightDelay: number;
  moderateDelay: number;
  severeDelay: number;
}

export interface ZoneDelay {
  zone: string;
  avgDelay: number;
  count: number;
}

export interface HourlyDelay {
  hour: number;
  avgDelay: number;
  count: number;
}

export interface StoreDelay {
  storeId: number;
  storeName: string;
  zone: string;
  avgDelay: number;
  orderCount: number;
}

export interface DelayAnalysis {
  delayDistribution: DelayDistribution;
  delaysByZone: ZoneDelay[];
  hourlyDelays: HourlyDelay[];
  topDelayedStores: StoreDelay[];
}

// =====================
// Cancellations
// =====================

export interface CancellationReasonCount {
  reason: string;
  count: number;
}

export interface ZoneCancellationCount {
  zone: string;
  count: number;
}

export interface CancellationTrendPoint {
  /** yyyy-MM-dd */
  date: string;
  count: number;
}

export interface CancellationAnalysis {
  cancellationReasons: CancellationReasonCount[];
  cancellationsByZone: ZoneCancellationCount[];
  cancellationTrend: CancellationTrendPoint[];
}

// =====================
// Stockouts
// =====================

export interface ProductStockout {
  productId: number;
  productName: string;
  department: string;
  stockoutCount: number;
}

export interface DepartmentStockout {
  department: string;
  stockoutCount: number;
}

export interface StoreStockout {
  storeId: number;
  storeName: string;
  zone: string;
  stockoutCount: number;
}

export interface StockoutAnalysis {
  topStockoutProducts: ProductStockout[];
  stockoutsByDepartment: DepartmentStockout[];
  stockoutsByStore: StoreStockout[];
}

// =====================
// Riders
// =====================

export interface RiderPerformance {
  riderId: number;
  name: string;
  zone: string;
  maxCapacity: number;
  totalDeliveries: number;
  avgDeliveryTime: number;
  avgDelay: number;
  /** Deliveries per unit of capacity */
  loadEfficiency: number;
}

export interface ZoneRiderCount {
  zone: string;
  riderCount: number;
}

export interface RiderAnalysis {
  riders: RiderPerformance[];
  topPerformers: RiderPerformance[];
  overloadedRiders: RiderPerformance[];
  zoneDistribution: ZoneRiderCount[];
  avgLoadEfficiency: number;
}

// =====================
// Picking Time
// =====================

export interface StorePickingTime {
  storeId: number;
  storeName: string;
  zone: string;
  avgPickingTime: number;
  orderCount: number;
}

export interface OrderSizePickingTime {
  totalItems: number;
  avgPickingTime: number;
  orderCount: number;
}

export interface ZonePickingTime {
  zone: string;
  avgPickingTime: number;
  orderCount: number;
}

export interface PickingSpeedDistribution {
  fast: number;
  medium: number;
  slow: number;
}

export interface PickingTimeAnalysis {
  slowestStores: StorePickingTime[];
  pickingTimeByOrderSize: OrderSizePickingTime[];
  pickingTimeByZone: ZonePickingTime[];
  pickingSpeedDistribution: PickingSpeedDistribution;
  avgPickingTime: number;
}

// =====================
// Recommendations
// =====================

export interface Recommendation {
  category: RECOMMENDATION_CATEGORY;
  priority: RECOMMENDATION_PRIORITY;
  issue: string;
  recommendation: string;
}

// =====================
// Composite Views
// =====================

export interface AnalyticsViews {
  overview: OverviewMetrics;
  delays: DelayAnalysis;
  cancellations: CancellationAnalysis;
  stockouts: StockoutAnalysis;
  riders: RiderAnalysis;
  picking: PickingTimeAnalysis;
}

export interface RecommendationGroup {
  priority: RECOMMENDATION_PRIORITY;
  recommendations: Recommendation[];
}

export interface AnalyticsDashboard extends AnalyticsViews {
  recommendations: Recommendation[];
  /** Same findings bucketed by priority, most urgent first */
  recommendationsByPriority: RecommendationGroup[];
  generatedAt: Date;
}

export interface AnalyticsResponse<TData> extends BaseResponse<TData> {
  data: TData;
}
