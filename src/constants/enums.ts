// =====================
// Quick-Commerce Enums
// =====================

export enum ORDER_STATUS {
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled',
  PENDING = 'pending',
}

export enum RECOMMENDATION_PRIORITY {
  CRITICAL = 'Critical',
  HIGH = 'High',
  MEDIUM = 'Medium',
  LOW = 'Low',
}

export enum RECOMMENDATION_CATEGORY {
  DELIVERY_DELAYS = 'Delivery Delays',
  ORDER_CANCELLATIONS = 'Order Cancellations',
  INVENTORY_STOCKOUTS = 'Inventory Stockouts',
  STORE_OPERATIONS = 'Store Operations',
  RIDER_MANAGEMENT = 'Rider Management',
  CUSTOMER_EXPERIENCE = 'Customer Experience',
}

export enum DELAY_SEVERITY {
  ON_TIME = 'onTime',
  SLIGHT = 'slightDelay',
  MODERATE = 'moderateDelay',
  SEVERE = 'severeDelay',
}

export enum PICKING_SPEED {
  FAST = 'fast',
  MEDIUM = 'medium',
  SLOW = 'slow',
}

export enum SORT_DIRECTION {
  ASC = 'asc',
  DESC = 'desc',
}
