// api/src/modules/analytics/analytics-views.composer.ts

import { format, getHours } from 'date-fns';
import {
  DELAY_SEVERITY,
  DELAY_SEVERITY_BOUNDARIES,
  HOURS_PER_DAY,
  ORDER_STATUS,
  PICKING_SPEED,
  PICKING_SPEED_BOUNDARIES,
  SLOWEST_STORES_LIMIT,
  SORT_DIRECTION,
  TOP_DELAYED_STORES_LIMIT,
  TOP_RIDERS_LIMIT,
  TOP_STOCKOUT_PRODUCTS_LIMIT,
} from '@constants';
import {
  average,
  countByBucket,
  countByStatus,
  groupAverage,
  groupCount,
  isOnTime,
  rate,
  ratio,
  roundTo,
  topN,
} from '@utils/metric-aggregation.util';
import type {
  OrderRecord,
  ProductRecord,
  QuickCommerceDataset,
  RiderRecord,
  StoreRecord,
} from '../../types/quick-commerce';
import type {
  AnalyticsViews,
  CancellationAnalysis,
  DelayAnalysis,
  OverviewMetrics,
  PickingTimeAnalysis,
  RiderAnalysis,
  RiderPerformance,
  StockoutAnalysis,
} from '../../types/quick-commerce-analytics';

// =====================
// Lookups & Filters
// =====================

type DelayedOrder = OrderRecord & { delayMinutes: number };

function hasDelay(order: OrderRecord): order is DelayedOrder {
  return order.delayMinutes !== null && Number.isFinite(order.delayMinutes);
}

function deliveredOrders(dataset: QuickCommerceDataset): OrderRecord[] {
  return dataset.orders.filter(order => order.status === ORDER_STATUS.DELIVERED);
}

function cancelledOrders(dataset: QuickCommerceDataset): OrderRecord[] {
  return dataset.orders.filter(order => order.status === ORDER_STATUS.CANCELLED);
}

function indexStores(dataset: QuickCommerceDataset): Map<number, StoreRecord> {
  return new Map(dataset.stores.map(store => [store.storeId, store]));
}

function indexRiders(dataset: QuickCommerceDataset): Map<number, RiderRecord> {
  return new Map(dataset.riders.map(rider => [rider.riderId, rider]));
}

function indexProducts(dataset: QuickCommerceDataset): Map<number, ProductRecord> {
  return new Map(dataset.products.map(product => [product.productId, product]));
}

function indexOrders(dataset: QuickCommerceDataset): Map<number, OrderRecord> {
  return new Map(dataset.orders.map(order => [order.orderId, order]));
}

// =====================
// Overview
// =====================

export function composeOverview(dataset: QuickCommerceDataset): OverviewMetrics {
  const { orders, orderProducts } = dataset;
  const delivered = deliveredOrders(dataset);

  const totalOrders = orders.length;
  const deliveredCount = countByStatus(orders, ORDER_STATUS.DELIVERED);
  const cancelledCount = countByStatus(orders, ORDER_STATUS.CANCELLED);
  const onTimeCount = delivered.filter(order => isOnTime(order.delayMinutes)).length;
  const stockoutCount = orderProducts.filter(item => item.wasOutOfStock).length;

  return {
    totalOrders,
    deliveredOrders: deliveredCount,
    cancelledOrders: cancelledCount,
    pendingOrders: countByStatus(orders, ORDER_STATUS.PENDING),
    cancellationRate: rate(cancelledCount, totalOrders),
    avgDeliveryTime: roundTo(average(delivered.map(order => order.deliveryTimeMinutes))),
    avgDelay: roundTo(average(delivered.map(order => order.delayMinutes))),
    onTimeRate: rate(onTimeCount, deliveredCount),
    stockoutRate: rate(stockoutCount, orderProducts.length),
  };
}

// =====================
// Delays
// =====================

export function composeDelayAnalysis(dataset: QuickCommerceDataset): DelayAnalysis {
  const stores = indexStores(dataset);
  const delayed = deliveredOrders(dataset).filter(hasDelay);

  const severity = countByBucket(
    delayed.map(order => order.delayMinutes),
    DELAY_SEVERITY_BOUNDARIES,
  );

  const delaysByZone = groupAverage(
    delayed,
    order => stores.get(order.storeId)?.zone,
    order => order.delayMinutes,
  ).map(group => ({ zone: group.key, avgDelay: roundTo(group.average), count: group.count }));

  const byHour = new Map(
    groupAverage(
      delayed,
      order => getHours(order.orderDatetime),
      order => order.delayMinutes,
    ).map(group => [group.key, group]),
  );
  const hourlyDelays = Array.from({ length: HOURS_PER_DAY }, (_, hour) => {
    const group = byHour.get(hour);
    return {
      hour,
      avgDelay: group ? roundTo(group.average) : 0,
      count: group?.count ?? 0,
    };
  });

  const storeGroups = groupAverage(
    delayed,
    order => stores.get(order.storeId),
    order => order.delayMinutes,
  );
  const topDelayedStores = topN(
    storeGroups,
    TOP_DELAYED_STORES_LIMIT,
    group => group.average,
    SORT_DIRECTION.DESC,
  ).map(group => ({
    storeId: group.key.storeId,
    storeName: group.key.name,
    zone: group.key.zone,
    avgDelay: roundTo(group.average),
    orderCount: group.count,
  }));

  return {
    delayDistribution: {
      onTime: severity.get(DELAY_SEVERITY.ON_TIME) ?? 0,
      slightDelay: severity.get(DELAY_SEVERITY.SLIGHT) ?? 0,
      moderateDelay: severity.get(DELAY_SEVERITY.MODERATE) ?? 0,
      severeDelay: severity.get(DELAY_SEVERITY.SEVERE) ?? 0,
    },
    delaysByZone,
    hourlyDelays,
    topDelayedStores,
  };
}

// =====================
// Cancellations
// =====================

export function composeCancellationAnalysis(dataset: QuickCommerceDataset): CancellationAnalysis {
  const stores = indexStores(dataset);
  const cancelled = cancelledOrders(dataset);

  const cancellationReasons = groupCount(cancelled, order => order.cancellationReason).map(
    group => ({ reason: group.key, count: group.count }),
  );

  const cancellationsByZone = groupCount(cancelled, order => stores.get(order.storeId)?.zone).map(
    group => ({ zone: group.key, count: group.count }),
  );

  // yyyy-MM-dd sorts chronologically as a string
  const cancellationTrend = groupCount(cancelled, order =>
    format(order.orderDatetime, 'yyyy-MM-dd'),
  )
    .map(group => ({ date: group.key, count: group.count }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return { cancellationReasons, cancellationsByZone, cancellationTrend };
}

// =====================
// Stockouts
// =====================

export function composeStockoutAnalysis(dataset: QuickCommerceDataset): StockoutAnalysis {
  const products = indexProducts(dataset);
  const orders = indexOrders(dataset);
  const stores = indexStores(dataset);
  const outOfStock = dataset.orderProducts.filter(item => item.wasOutOfStock);

  const productGroups = groupCount(outOfStock, item => products.get(item.productId));
  const topStockoutProducts = topN(
    productGroups,
    TOP_STOCKOUT_PRODUCTS_LIMIT,
    group => group.count,
    SORT_DIRECTION.DESC,
  ).map(group => ({
    productId: group.key.productId,
    productName: group.key.productName,
    department: group.key.department,
    stockoutCount: group.count,
  }));

  const stockoutsByDepartment = groupCount(
    outOfStock,
    item => products.get(item.productId)?.department,
  ).map(group => ({ department: group.key, stockoutCount: group.count }));

  const stockoutsByStore = groupCount(outOfStock, item => {
    const order = orders.get(item.orderId);
    return order ? stores.get(order.storeId) : undefined;
  }).map(group => ({
    storeId: group.key.storeId,
    storeName: group.key.name,
    zone: group.key.zone,
    stockoutCount: group.count,
  }));

  return { topStockoutProducts, stockoutsByDepartment, stockoutsByStore };
}

// =====================
// Riders
// =====================

export function composeRiderAnalysis(dataset: QuickCommerceDataset): RiderAnalysis {
  const riderIndex = indexRiders(dataset);
  const delivered = deliveredOrders(dataset);
  const riderOf = (order: OrderRecord): RiderRecord | undefined =>
    order.riderId === null ? undefined : riderIndex.get(order.riderId);

  const deliveryTimes = groupAverage(delivered, riderOf, order => order.deliveryTimeMinutes);
  const delays = new Map(
    groupAverage(delivered, riderOf, order => order.delayMinutes).map(group => [
      group.key.riderId,
      group.average,
    ]),
  );

  const riders: RiderPerformance[] = deliveryTimes.map(group => ({
    riderId: group.key.riderId,
    name: group.key.name,
    zone: group.key.zone,
    maxCapacity: group.key.maxCapacity,
    totalDeliveries: group.count,
    avgDeliveryTime: roundTo(group.average),
    avgDelay: roundTo(delays.get(group.key.riderId) ?? 0),
    loadEfficiency: ratio(group.count, group.key.maxCapacity),
  }));

  return {
    riders,
    topPerformers: topN(riders, TOP_RIDERS_LIMIT, rider => rider.avgDelay, SORT_DIRECTION.ASC),
    overloadedRiders: topN(
      riders,
      TOP_RIDERS_LIMIT,
      rider => rider.totalDeliveries,
      SORT_DIRECTION.DESC,
    ),
    zoneDistribution: groupCount(riders, rider => rider.zone).map(group => ({
      zone: group.key,
      riderCount: group.count,
    })),
    avgLoadEfficiency: roundTo(average(riders.map(rider => rider.loadEfficiency))),
  };
}

// =====================
// Picking Time
// =====================

export function composePickingTimeAnalysis(dataset: QuickCommerceDataset): PickingTimeAnalysis {
  const stores = indexStores(dataset);
  const delivered = deliveredOrders(dataset);
  const pickingTime = (order: OrderRecord) => order.pickingTimeMinutes;

  const storeGroups = groupAverage(delivered, order => stores.get(order.storeId), pickingTime);
  const slowestStores = topN(
    storeGroups,
    SLOWEST_STORES_LIMIT,
    group => group.average,
    SORT_DIRECTION.DESC,
  ).map(group => ({
    storeId: group.key.storeId,
    storeName: group.key.name,
    zone: group.key.zone,
    avgPickingTime: roundTo(group.average),
    orderCount: group.count,
  }));

  const pickingTimeByOrderSize = groupAverage(delivered, order => order.totalItems, pickingTime)
    .sort((a, b) => a.key - b.key)
    .map(group => ({
      totalItems: group.key,
      avgPickingTime: roundTo(group.average),
      orderCount: group.count,
    }));

  const pickingTimeByZone = groupAverage(
    delivered,
    order => stores.get(order.storeId)?.zone,
    pickingTime,
  ).map(group => ({
    zone: group.key,
    avgPickingTime: roundTo(group.average),
    orderCount: group.count,
  }));

  const speed = countByBucket(delivered.map(pickingTime), PICKING_SPEED_BOUNDARIES);

  return {
    slowestStores,
    pickingTimeByOrderSize,
    pickingTimeByZone,
    pickingSpeedDistribution: {
      fast: speed.get(PICKING_SPEED.FAST) ?? 0,
      medium: speed.get(PICKING_SPEED.MEDIUM) ?? 0,
      slow: speed.get(PICKING_SPEED.SLOW) ?? 0,
    },
    avgPickingTime: roundTo(average(delivered.map(pickingTime))),
  };
}

// =====================
// All Views
// =====================

export function composeAnalyticsViews(dataset: QuickCommerceDataset): AnalyticsViews {
  return {
    overview: composeOverview(dataset),
    delays: composeDelayAnalysis(dataset),
    cancellations: composeCancellationAnalysis(dataset),
    stockouts: composeStockoutAnalysis(dataset),
    riders: composeRiderAnalysis(dataset),
    picking: composePickingTimeAnalysis(dataset),
  };
}
