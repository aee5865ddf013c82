import type {
  OrderProductRecord,
  OrderRecord,
  ProductRecord,
  QuickCommerceDataset,
  RiderRecord,
  StoreRecord,
} from '../../../types/quick-commerce';

export function buildOrder(
  overrides: Partial<OrderRecord> & Pick<OrderRecord, 'orderId'>,
): OrderRecord {
  return {
    userId: null,
    storeId: 1,
    riderId: null,
    orderDatetime: new Date(2024, 0, 15, 10, 0),
    promisedDeliveryTime: null,
    actualDeliveryTime: null,
    status: 'delivered',
    cancellationReason: null,
    totalItems: 3,
    totalAmount: null,
    pickingTimeMinutes: null,
    deliveryTimeMinutes: null,
    delayMinutes: null,
    ...overrides,
  };
}

export function emptyDataset(): QuickCommerceDataset {
  return { orders: [], stores: [], riders: [], products: [], orderProducts: [] };
}

const stores: StoreRecord[] = [
  { storeId: 1, name: 'Store A', zone: 'North', avgPickingTime: 10 },
  { storeId: 2, name: 'Store B', zone: 'South', avgPickingTime: 12 },
  { storeId: 3, name: 'Store C', zone: 'North', avgPickingTime: null },
];

const riders: RiderRecord[] = [
  { riderId: 1, name: 'Rider 1', zone: 'North', maxCapacity: 4 },
  { riderId: 2, name: 'Rider 2', zone: 'South', maxCapacity: 4 },
  { riderId: 3, name: 'Rider 3', zone: 'East', maxCapacity: 3 },
];

const products: ProductRecord[] = [
  { productId: 1, productName: 'Milk', department: 'Dairy', aisle: 'Aisle 1', price: 1.5 },
  { productId: 2, productName: 'Bread', department: 'Bakery', aisle: 'Aisle 2', price: 2 },
  { productId: 3, productName: 'Cheese', department: 'Dairy', aisle: null, price: null },
];

const orders: OrderRecord[] = [
  buildOrder({
    orderId: 1,
    storeId: 1,
    riderId: 1,
    orderDatetime: new Date(2024, 0, 15, 10, 20),
    delayMinutes: 2,
    deliveryTimeMinutes: 30,
    pickingTimeMinutes: 8,
    totalItems: 3,
  }),
  buildOrder({
    orderId: 2,
    storeId: 1,
    riderId: 1,
    orderDatetime: new Date(2024, 0, 15, 10, 50),
    delayMinutes: 12,
    deliveryTimeMinutes: 40,
    pickingTimeMinutes: 12,
    totalItems: 5,
  }),
  buildOrder({
    orderId: 3,
    storeId: 2,
    riderId: 2,
    orderDatetime: new Date(2024, 0, 16, 18, 5),
    delayMinutes: 40,
    deliveryTimeMinutes: 70,
    pickingTimeMinutes: 20,
    totalItems: 5,
  }),
  buildOrder({
    orderId: 4,
    storeId: 3,
    riderId: 1,
    orderDatetime: new Date(2024, 0, 16, 10, 10),
    delayMinutes: -4,
    deliveryTimeMinutes: 22,
    pickingTimeMinutes: 9,
    totalItems: 3,
  }),
  buildOrder({
    orderId: 5,
    storeId: 2,
    status: 'cancelled',
    cancellationReason: 'Out of stock',
    orderDatetime: new Date(2024, 0, 16, 9, 0),
    totalItems: 4,
  }),
  buildOrder({
    orderId: 6,
    storeId: 1,
    status: 'cancelled',
    cancellationReason: 'Customer requested',
    orderDatetime: new Date(2024, 0, 15, 12, 0),
  }),
  buildOrder({
    orderId: 7,
    storeId: 3,
    status: 'cancelled',
    cancellationReason: 'Out of stock',
    orderDatetime: new Date(2024, 0, 17, 8, 0),
  }),
  buildOrder({
    orderId: 8,
    storeId: 2,
    status: 'pending',
    orderDatetime: new Date(2024, 0, 17, 20, 0),
  }),
];

const orderProducts: OrderProductRecord[] = [
  { id: 1, orderId: 1, productId: 1, quantity: 2, wasOutOfStock: true },
  { id: 2, orderId: 1, productId: 2, quantity: 1, wasOutOfStock: false },
  { id: 3, orderId: 3, productId: 1, quantity: 1, wasOutOfStock: true },
  { id: 4, orderId: 5, productId: 3, quantity: 3, wasOutOfStock: true },
  { id: 5, orderId: 4, productId: 2, quantity: 1, wasOutOfStock: false },
];

/**
 * Three stores (two in North), three riders (one without deliveries),
 * four delivered, three cancelled and one pending order.
 */
export function sampleDataset(): QuickCommerceDataset {
  return { stores, riders, products, orders, orderProducts };
}
