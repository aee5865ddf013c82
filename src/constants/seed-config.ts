// =====================
// Synthetic Dataset Shape
// =====================

export const SEED_ZONES = ['North', 'South', 'East', 'West', 'Central'] as const;

export const SEED_DEPARTMENTS = [
  'Fresh Produce',
  'Dairy',
  'Bakery',
  'Beverages',
  'Snacks',
  'Frozen Foods',
  'Personal Care',
  'Household',
  'Meat & Seafood',
] as const;

export const SEED_CANCELLATION_REASONS = [
  'Out of stock',
  'Customer requested',
  'Delivery delay',
  'Payment issue',
  'Address not found',
  'Weather conditions',
] as const;

export const SEED_STORE_COUNT = 10;
export const SEED_PRODUCT_COUNT = 200;
export const SEED_RIDER_COUNT = 30;
export const SEED_ORDER_COUNT = 5000;
export const SEED_CUSTOMER_COUNT = 1000;
export const SEED_HISTORY_DAYS = 90;

/** Status weights for generated orders (delivered / cancelled / pending) */
export const SEED_STATUS_WEIGHTS = { delivered: 0.75, cancelled: 0.15, pending: 0.1 } as const;

/** Share of delivered orders that arrive within the on-time window */
export const SEED_ON_TIME_SHARE = 0.6;

/** Chance that an in-stock line item is still reported out of stock at fulfillment */
export const SEED_RANDOM_STOCKOUT_CHANCE = 0.05;

/** Inclusive ranges the generator draws from */
export const SEED_RANGES = {
  storePickingTime: { min: 5, max: 20 },
  aisle: { min: 1, max: 20 },
  price: { min: 2, max: 50 },
  stockLevel: { min: 0, max: 100 },
  inventoryStockouts: { min: 0, max: 10 },
  riderCapacity: { min: 3, max: 6 },
  orderHour: { min: 6, max: 22 },
  promisedMinutes: { min: 20, max: 45 },
  pickingTime: { min: 3, max: 25 },
  totalItems: { min: 3, max: 25 },
  totalAmount: { min: 20, max: 200 },
  onTimeDelay: { min: -5, max: 5 },
  lateDelay: { min: 5, max: 45 },
  quantity: { min: 1, max: 5 },
} as const;
