// api/src/types/quick-commerce.ts

// =====================
// Quick-Commerce Records
// =====================

export interface StoreRecord {
  storeId: number;
  name: string;
  zone: string;
  avgPickingTime: number | null;
}

export interface RiderRecord {
  riderId: number;
  name: string;
  zone: string;
  maxCapacity: number;
}

export interface ProductRecord {
  productId: number;
  productName: string;
  department: string;
  aisle: string | null;
  price: number | null;
}

/**
 * An order as seen by the analytics core. `status` is usually one of
 * ORDER_STATUS but is kept as a string so unknown statuses still count
 * toward totals.
 */
export interface OrderRecord {
  orderId: number;
  userId: number | null;
  storeId: number;
  riderId: number | null;
  orderDatetime: Date;
  promisedDeliveryTime: Date | null;
  actualDeliveryTime: Date | null;
  status: string;
  cancellationReason: string | null;
  totalItems: number;
  totalAmount: number | null;
  pickingTimeMinutes: number | null;
  deliveryTimeMinutes: number | null;
  delayMinutes: number | null;
}

export interface OrderProductRecord {
  id: number;
  orderId: number;
  productId: number;
  quantity: number;
  wasOutOfStock: boolean;
}

export interface InventoryRecord {
  id: number;
  productId: number;
  storeId: number;
  stockLevel: number;
  lastUpdated: Date;
  stockoutCount: number;
}

/**
 * Read-only snapshot the analytics views are computed from
 */
export interface QuickCommerceDataset {
  readonly orders: ReadonlyArray<OrderRecord>;
  readonly stores: ReadonlyArray<StoreRecord>;
  readonly riders: ReadonlyArray<RiderRecord>;
  readonly products: ReadonlyArray<ProductRecord>;
  readonly orderProducts: ReadonlyArray<OrderProductRecord>;
}
