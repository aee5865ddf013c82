import { addDays, addHours, addMilliseconds, addMinutes, startOfDay, subDays } from 'date-fns';
import {
  ORDER_STATUS,
  SEED_CANCELLATION_REASONS,
  SEED_CUSTOMER_COUNT,
  SEED_DEPARTMENTS,
  SEED_HISTORY_DAYS,
  SEED_ON_TIME_SHARE,
  SEED_ORDER_COUNT,
  SEED_PRODUCT_COUNT,
  SEED_RANDOM_STOCKOUT_CHANCE,
  SEED_RANGES,
  SEED_RIDER_COUNT,
  SEED_STATUS_WEIGHTS,
  SEED_STORE_COUNT,
  SEED_ZONES,
} from '@constants';
import type {
  InventoryRecord,
  OrderProductRecord,
  OrderRecord,
  ProductRecord,
  RiderRecord,
  StoreRecord,
} from '../../../../types/quick-commerce';

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface GeneratedQuickCommerceData {
  stores: StoreRecord[];
  products: ProductRecord[];
  inventory: InventoryRecord[];
  riders: RiderRecord[];
  orders: OrderRecord[];
  orderProducts: OrderProductRecord[];
}

export interface GeneratorOptions {
  random: RandomSource;
  /** Orders are spread over the days before this date */
  referenceDate: Date;
  storeCount?: number;
  productCount?: number;
  riderCount?: number;
  orderCount?: number;
}

interface Range {
  min: number;
  max: number;
}

const MS_PER_MINUTE = 60_000;

/**
 * mulberry32: small deterministic PRNG so a seed reproduces a dataset
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class Draw {
  constructor(private readonly random: RandomSource) {}

  chance(probability: number): boolean {
    return this.random() < probability;
  }

  uniform({ min, max }: Range): number {
    return min + this.random() * (max - min);
  }

  int({ min, max }: Range): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  pick<T>(items: ReadonlyArray<T>): T {
    return items[Math.min(Math.floor(this.random() * items.length), items.length - 1)];
  }

  weighted<T extends string>(weights: Readonly<Record<T, number>>, keys: ReadonlyArray<T>): T {
    const total = keys.reduce((sum, key) => sum + weights[key], 0);
    let roll = this.random() * total;
    for (const key of keys) {
      roll -= weights[key];
      if (roll < 0) return key;
    }
    return keys[keys.length - 1];
  }

  /** `count` distinct items (partial Fisher-Yates) */
  sample<T>(items: ReadonlyArray<T>, count: number): T[] {
    const pool = [...items];
    const size = Math.min(count, pool.length);
    for (let i = 0; i < size; i++) {
      const j = i + Math.floor(this.random() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, size);
  }
}

const STATUS_KEYS: ReadonlyArray<keyof typeof SEED_STATUS_WEIGHTS> = [
  'delivered',
  'cancelled',
  'pending',
];

const STATUS_BY_KEY: Record<keyof typeof SEED_STATUS_WEIGHTS, ORDER_STATUS> = {
  delivered: ORDER_STATUS.DELIVERED,
  cancelled: ORDER_STATUS.CANCELLED,
  pending: ORDER_STATUS.PENDING,
};

/**
 * Builds a synthetic quick-commerce dataset. Pure: everything random comes
 * from `options.random`, so the same source and reference date give the same
 * rows.
 */
export function generateQuickCommerceDataset(
  options: GeneratorOptions,
): GeneratedQuickCommerceData {
  const draw = new Draw(options.random);
  const { referenceDate } = options;
  const storeCount = options.storeCount ?? SEED_STORE_COUNT;
  const productCount = options.productCount ?? SEED_PRODUCT_COUNT;
  const riderCount = options.riderCount ?? SEED_RIDER_COUNT;
  const orderCount = options.orderCount ?? SEED_ORDER_COUNT;

  const stores: StoreRecord[] = Array.from({ length: storeCount }, (_, index) => ({
    storeId: index + 1,
    name: `QuickMart Store ${index + 1}`,
    zone: draw.pick(SEED_ZONES),
    avgPickingTime: draw.uniform(SEED_RANGES.storePickingTime),
  }));

  const products: ProductRecord[] = Array.from({ length: productCount }, (_, index) => ({
    productId: index + 1,
    productName: `Product ${index + 1}`,
    department: draw.pick(SEED_DEPARTMENTS),
    aisle: `Aisle ${draw.int(SEED_RANGES.aisle)}`,
    price: draw.uniform(SEED_RANGES.price),
  }));

  const inventory: InventoryRecord[] = [];
  const stockLevels = new Map<string, number>();
  for (const store of stores) {
    for (const product of products) {
      const stockLevel = draw.int(SEED_RANGES.stockLevel);
      stockLevels.set(`${store.storeId}:${product.productId}`, stockLevel);
      inventory.push({
        id: inventory.length + 1,
        productId: product.productId,
        storeId: store.storeId,
        stockLevel,
        lastUpdated: referenceDate,
        stockoutCount: draw.int(SEED_RANGES.inventoryStockouts),
      });
    }
  }

  const riders: RiderRecord[] = Array.from({ length: riderCount }, (_, index) => ({
    riderId: index + 1,
    name: `Rider ${index + 1}`,
    zone: draw.pick(SEED_ZONES),
    maxCapacity: draw.int(SEED_RANGES.riderCapacity),
  }));

  const historyStart = startOfDay(subDays(referenceDate, SEED_HISTORY_DAYS));
  const orders: OrderRecord[] = [];
  const orderProducts: OrderProductRecord[] = [];

  for (let orderId = 1; orderId <= orderCount; orderId++) {
    const orderDatetime = addMinutes(
      addHours(
        addDays(historyStart, draw.int({ min: 0, max: SEED_HISTORY_DAYS - 1 })),
        draw.int(SEED_RANGES.orderHour),
      ),
      draw.int({ min: 0, max: 59 }),
    );
    const promisedDeliveryTime = addMinutes(orderDatetime, draw.int(SEED_RANGES.promisedMinutes));
    const status = STATUS_BY_KEY[draw.weighted(SEED_STATUS_WEIGHTS, STATUS_KEYS)];
    const pickingTimeMinutes = draw.uniform(SEED_RANGES.pickingTime);
    const totalItems = draw.int(SEED_RANGES.totalItems);

    let actualDeliveryTime: Date | null = null;
    let delayMinutes: number | null = null;
    let deliveryTimeMinutes: number | null = null;
    let cancellationReason: string | null = null;

    if (status === ORDER_STATUS.DELIVERED) {
      const offset = draw.chance(SEED_ON_TIME_SHARE)
        ? draw.uniform(SEED_RANGES.onTimeDelay)
        : draw.uniform(SEED_RANGES.lateDelay);
      const delivered = addMilliseconds(promisedDeliveryTime, Math.round(offset * MS_PER_MINUTE));
      actualDeliveryTime = delivered;
      delayMinutes = (delivered.getTime() - promisedDeliveryTime.getTime()) / MS_PER_MINUTE;
      deliveryTimeMinutes = (delivered.getTime() - orderDatetime.getTime()) / MS_PER_MINUTE;
    } else if (status === ORDER_STATUS.CANCELLED) {
      cancellationReason = draw.pick(SEED_CANCELLATION_REASONS);
    }

    const store = draw.pick(stores);
    const order: OrderRecord = {
      orderId,
      userId: draw.int({ min: 1, max: SEED_CUSTOMER_COUNT }),
      storeId: store.storeId,
      riderId: draw.pick(riders).riderId,
      orderDatetime,
      promisedDeliveryTime,
      actualDeliveryTime,
      status,
      cancellationReason,
      totalItems,
      totalAmount: draw.uniform(SEED_RANGES.totalAmount),
      pickingTimeMinutes,
      deliveryTimeMinutes,
      delayMinutes,
    };
    orders.push(order);

    for (const product of draw.sample(products, totalItems)) {
      // Empty shelves always stock out; the rest occasionally fail at fulfilment
      const stockLevel = stockLevels.get(`${store.storeId}:${product.productId}`) ?? 0;
      orderProducts.push({
        id: orderProducts.length + 1,
        orderId,
        productId: product.productId,
        quantity: draw.int(SEED_RANGES.quantity),
        wasOutOfStock: stockLevel === 0 || draw.chance(SEED_RANDOM_STOCKOUT_CHANCE),
      });
    }
  }

  return { stores, products, inventory, riders, orders, orderProducts };
}
