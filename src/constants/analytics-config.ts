import { DELAY_SEVERITY, PICKING_SPEED, RECOMMENDATION_PRIORITY } from './enums';

// =====================
// Delivery Punctuality
// =====================

/** A delivered order is on time when its delay is at or below this many minutes */
export const ON_TIME_DELAY_MINUTES = 5;

// =====================
// Bucket Boundaries
// =====================

/**
 * Bucket boundaries are evaluated in order; the first bucket whose upper bound
 * admits the value wins. `inclusive` decides whether the bound itself belongs
 * to the bucket. The last bucket has no upper bound.
 */
export interface BucketBoundary<TLabel extends string> {
  label: TLabel;
  upTo: number | null;
  inclusive: boolean;
}

export type BucketBoundaries<TLabel extends string> = readonly [
  BucketBoundary<TLabel>,
  ...BucketBoundary<TLabel>[],
];

/** <= 5 on time, (5, 15] slight, (15, 30] moderate, > 30 severe */
export const DELAY_SEVERITY_BOUNDARIES: BucketBoundaries<DELAY_SEVERITY> = [
  { label: DELAY_SEVERITY.ON_TIME, upTo: ON_TIME_DELAY_MINUTES, inclusive: true },
  { label: DELAY_SEVERITY.SLIGHT, upTo: 15, inclusive: true },
  { label: DELAY_SEVERITY.MODERATE, upTo: 30, inclusive: true },
  { label: DELAY_SEVERITY.SEVERE, upTo: null, inclusive: false },
];

/** < 10 fast, [10, 15] medium, > 15 slow */
export const PICKING_SPEED_BOUNDARIES: BucketBoundaries<PICKING_SPEED> = [
  { label: PICKING_SPEED.FAST, upTo: 10, inclusive: false },
  { label: PICKING_SPEED.MEDIUM, upTo: 15, inclusive: true },
  { label: PICKING_SPEED.SLOW, upTo: null, inclusive: false },
];

// =====================
// Ranking Sizes
// =====================

export const TOP_DELAYED_STORES_LIMIT = 5;
export const TOP_STOCKOUT_PRODUCTS_LIMIT = 10;
export const TOP_RIDERS_LIMIT = 10;
export const SLOWEST_STORES_LIMIT = 10;

export const HOURS_PER_DAY = 24;

// =====================
// Recommendation Thresholds
// =====================

export interface RecommendationThresholds {
  /** Average delay (minutes) above which delivery delays are flagged */
  maxAvgDelayMinutes: number;
  /** Cancellation rate (%) above which cancellations are flagged */
  maxCancellationRate: number;
  /** Stockout rate (%) above which inventory is flagged */
  maxStockoutRate: number;
  /** Zone average picking time (minutes) above which store operations are flagged */
  maxAvgPickingTimeMinutes: number;
  /** A rider is overloaded when their deliveries exceed this multiple of the cohort average */
  riderLoadImbalanceFactor: number;
  /** On-time rate (%) below which customer experience is flagged */
  minOnTimeRate: number;
}

export const DEFAULT_RECOMMENDATION_THRESHOLDS: Readonly<RecommendationThresholds> = {
  maxAvgDelayMinutes: 10,
  maxCancellationRate: 10,
  maxStockoutRate: 5,
  maxAvgPickingTimeMinutes: 15,
  riderLoadImbalanceFactor: 1.5,
  minOnTimeRate: 70,
};

/** Presentation order of priorities, most urgent first */
export const RECOMMENDATION_PRIORITY_ORDER: ReadonlyArray<RECOMMENDATION_PRIORITY> = [
  RECOMMENDATION_PRIORITY.CRITICAL,
  RECOMMENDATION_PRIORITY.HIGH,
  RECOMMENDATION_PRIORITY.MEDIUM,
  RECOMMENDATION_PRIORITY.LOW,
];
