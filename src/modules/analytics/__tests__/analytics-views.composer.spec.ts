import {
  composeAnalyticsViews,
  composeCancellationAnalysis,
  composeDelayAnalysis,
  composeOverview,
  composePickingTimeAnalysis,
  composeRiderAnalysis,
  composeStockoutAnalysis,
} from '../analytics-views.composer';
import { average, isOnTime, rate, roundTo } from '@utils/metric-aggregation.util';
import {
  createSeededRandom,
  generateQuickCommerceDataset,
} from '../../common/database/seed/quick-commerce-dataset.generator';
import { buildOrder, emptyDataset, sampleDataset } from './quick-commerce.fixtures';

describe('analytics views', () => {
  describe('composeOverview', () => {
    it('should summarise order outcomes', () => {
      expect(composeOverview(sampleDataset())).toEqual({
        totalOrders: 8,
        deliveredOrders: 4,
        cancelledOrders: 3,
        pendingOrders: 1,
        cancellationRate: 37.5,
        avgDeliveryTime: 40.5,
        avgDelay: 12.5,
        onTimeRate: 50,
        stockoutRate: 60,
      });
    });

    it('should return zeroes for an empty dataset', () => {
      expect(composeOverview(emptyDataset())).toEqual({
        totalOrders: 0,
        deliveredOrders: 0,
        cancelledOrders: 0,
        pendingOrders: 0,
        cancellationRate: 0,
        avgDeliveryTime: 0,
        avgDelay: 0,
        onTimeRate: 0,
        stockoutRate: 0,
      });
    });

    it('should count unknown statuses toward the total only', () => {
      const dataset = {
        ...emptyDataset(),
        orders: [
          buildOrder({ orderId: 1, status: 'cancelled', cancellationReason: 'Payment issue' }),
          buildOrder({ orderId: 2, status: 'returned' }),
        ],
      };

      const overview = composeOverview(dataset);

      expect(overview.totalOrders).toBe(2);
      expect(overview.deliveredOrders).toBe(0);
      expect(overview.pendingOrders).toBe(0);
      expect(overview.cancellationRate).toBe(50);
    });

    it('should leave delivered orders without a delay out of the delay average', () => {
      const dataset = {
        ...emptyDataset(),
        orders: [
          buildOrder({ orderId: 1, delayMinutes: 20, deliveryTimeMinutes: 50 }),
          buildOrder({ orderId: 2, delayMinutes: null, deliveryTimeMinutes: null }),
        ],
      };

      const overview = composeOverview(dataset);

      expect(overview.avgDelay).toBe(20);
      expect(overview.avgDeliveryTime).toBe(50);
      expect(overview.onTimeRate).toBe(0);
    });

    it('should treat delays up to five minutes as on time', () => {
      const dataset = {
        ...emptyDataset(),
        orders: Array.from({ length: 10 }, (_, delay) =>
          buildOrder({ orderId: delay + 1, delayMinutes: delay }),
        ),
      };

      expect(composeOverview(dataset).onTimeRate).toBe(60);
    });

    it('should agree with the aggregator applied to the raw rows', () => {
      const dataset = generateQuickCommerceDataset({
        random: createSeededRandom(11),
        referenceDate: new Date(2024, 5, 30, 12, 0, 0),
        orderCount: 300,
        productCount: 40,
      });
      const delivered = dataset.orders.filter(order => order.status === 'delivered');

      const overview = composeOverview(dataset);

      expect(overview.cancellationRate).toBe(
        rate(
          dataset.orders.filter(order => order.status === 'cancelled').length,
          dataset.orders.length,
        ),
      );
      expect(overview.avgDeliveryTime).toBe(
        roundTo(average(delivered.map(order => order.deliveryTimeMinutes))),
      );
      expect(overview.avgDelay).toBe(roundTo(average(delivered.map(order => order.delayMinutes))));
      expect(overview.onTimeRate).toBe(
        rate(delivered.filter(order => isOnTime(order.delayMinutes)).length, delivered.length),
      );
      expect(overview.stockoutRate).toBe(
        rate(
          dataset.orderProducts.filter(item => item.wasOutOfStock).length,
          dataset.orderProducts.length,
        ),
      );
    });
  });

  describe('composeDelayAnalysis', () => {
    it('should bucket delays by severity', () => {
      expect(composeDelayAnalysis(sampleDataset()).delayDistribution).toEqual({
        onTime: 2,
        slightDelay: 1,
        moderateDelay: 0,
        severeDelay: 1,
      });
    });

    it('should average delays per zone', () => {
      expect(composeDelayAnalysis(sampleDataset()).delaysByZone).toEqual([
        { zone: 'North', avgDelay: 3.33, count: 3 },
        { zone: 'South', avgDelay: 40, count: 1 },
      ]);
    });

    it('should report all 24 hours', () => {
      const { hourlyDelays } = composeDelayAnalysis(sampleDataset());

      expect(hourlyDelays).toHaveLength(24);
      expect(hourlyDelays[10]).toEqual({ hour: 10, avgDelay: 3.33, count: 3 });
      expect(hourlyDelays[18]).toEqual({ hour: 18, avgDelay: 40, count: 1 });
      expect(hourlyDelays[3]).toEqual({ hour: 3, avgDelay: 0, count: 0 });
    });

    it('should rank stores by average delay', () => {
      expect(composeDelayAnalysis(sampleDataset()).topDelayedStores).toEqual([
        { storeId: 2, storeName: 'Store B', zone: 'South', avgDelay: 40, orderCount: 1 },
        { storeId: 1, storeName: 'Store A', zone: 'North', avgDelay: 7, orderCount: 2 },
        { storeId: 3, storeName: 'Store C', zone: 'North', avgDelay: -4, orderCount: 1 },
      ]);
    });

    it('should account for every delayed order in the zone and hour counts', () => {
      const dataset = generateQuickCommerceDataset({
        random: createSeededRandom(5),
        referenceDate: new Date(2024, 5, 30, 12, 0, 0),
        orderCount: 300,
        productCount: 40,
      });
      const delayedCount = dataset.orders.filter(
        order => order.status === 'delivered' && order.delayMinutes !== null,
      ).length;

      const analysis = composeDelayAnalysis(dataset);
      const sum = (counts: number[]) => counts.reduce((total, count) => total + count, 0);

      expect(delayedCount).toBeGreaterThan(0);
      expect(sum(analysis.delaysByZone.map(zone => zone.count))).toBe(delayedCount);
      expect(sum(analysis.hourlyDelays.map(hour => hour.count))).toBe(delayedCount);
    });

    it('should rank tied stores in the order they first appear', () => {
      const dataset = {
        ...sampleDataset(),
        orders: [
          buildOrder({ orderId: 1, storeId: 2, delayMinutes: 10 }),
          buildOrder({ orderId: 2, storeId: 1, delayMinutes: 10 }),
          buildOrder({ orderId: 3, storeId: 3, delayMinutes: 20 }),
        ],
      };

      const { topDelayedStores } = composeDelayAnalysis(dataset);

      expect(topDelayedStores.map(store => store.storeId)).toEqual([3, 2, 1]);
    });

    it('should keep at most five stores', () => {
      const dataset = {
        ...emptyDataset(),
        stores: Array.from({ length: 7 }, (_, index) => ({
          storeId: index + 1,
          name: `Store ${index + 1}`,
          zone: 'West',
          avgPickingTime: null,
        })),
        orders: Array.from({ length: 7 }, (_, index) =>
          buildOrder({ orderId: index + 1, storeId: index + 1, delayMinutes: index }),
        ),
      };

      const { topDelayedStores } = composeDelayAnalysis(dataset);

      expect(topDelayedStores.map(store => store.storeId)).toEqual([7, 6, 5, 4, 3]);
    });

    it('should skip orders whose store is unknown when grouping', () => {
      const dataset = {
        ...sampleDataset(),
        orders: [buildOrder({ orderId: 99, storeId: 42, delayMinutes: 50 })],
      };

      const analysis = composeDelayAnalysis(dataset);

      expect(analysis.delaysByZone).toEqual([]);
      expect(analysis.topDelayedStores).toEqual([]);
      expect(analysis.delayDistribution.severeDelay).toBe(1);
    });

    it('should return empty groupings for an empty dataset', () => {
      const analysis = composeDelayAnalysis(emptyDataset());

      expect(analysis.delaysByZone).toEqual([]);
      expect(analysis.topDelayedStores).toEqual([]);
      expect(analysis.hourlyDelays.every(hour => hour.count === 0)).toBe(true);
    });
  });

  describe('composeCancellationAnalysis', () => {
    it('should count reasons, zones and days', () => {
      expect(composeCancellationAnalysis(sampleDataset())).toEqual({
        cancellationReasons: [
          { reason: 'Out of stock', count: 2 },
          { reason: 'Customer requested', count: 1 },
        ],
        cancellationsByZone: [
          { zone: 'South', count: 1 },
          { zone: 'North', count: 2 },
        ],
        cancellationTrend: [
          { date: '2024-01-15', count: 1 },
          { date: '2024-01-16', count: 1 },
          { date: '2024-01-17', count: 1 },
        ],
      });
    });

    it('should leave cancellations without a reason out of the reason counts', () => {
      const dataset = {
        ...emptyDataset(),
        orders: [buildOrder({ orderId: 1, status: 'cancelled', cancellationReason: null })],
      };

      const analysis = composeCancellationAnalysis(dataset);

      expect(analysis.cancellationReasons).toEqual([]);
      expect(analysis.cancellationTrend).toEqual([{ date: '2024-01-15', count: 1 }]);
    });
  });

  describe('composeStockoutAnalysis', () => {
    it('should attribute stockouts to products, departments and stores', () => {
      expect(composeStockoutAnalysis(sampleDataset())).toEqual({
        topStockoutProducts: [
          { productId: 1, productName: 'Milk', department: 'Dairy', stockoutCount: 2 },
          { productId: 3, productName: 'Cheese', department: 'Dairy', stockoutCount: 1 },
        ],
        stockoutsByDepartment: [{ department: 'Dairy', stockoutCount: 3 }],
        stockoutsByStore: [
          { storeId: 1, storeName: 'Store A', zone: 'North', stockoutCount: 1 },
          { storeId: 2, storeName: 'Store B', zone: 'South', stockoutCount: 2 },
        ],
      });
    });
  });

  describe('composeRiderAnalysis', () => {
    it('should only include riders with deliveries', () => {
      const { riders } = composeRiderAnalysis(sampleDataset());

      expect(riders).toEqual([
        {
          riderId: 1,
          name: 'Rider 1',
          zone: 'North',
          maxCapacity: 4,
          totalDeliveries: 3,
          avgDeliveryTime: 30.67,
          avgDelay: 3.33,
          loadEfficiency: 0.75,
        },
        {
          riderId: 2,
          name: 'Rider 2',
          zone: 'South',
          maxCapacity: 4,
          totalDeliveries: 1,
          avgDeliveryTime: 70,
          avgDelay: 40,
          loadEfficiency: 0.25,
        },
      ]);
    });

    it('should rank performers and summarise load', () => {
      const analysis = composeRiderAnalysis(sampleDataset());

      expect(analysis.topPerformers.map(rider => rider.riderId)).toEqual([1, 2]);
      expect(analysis.overloadedRiders.map(rider => rider.riderId)).toEqual([1, 2]);
      expect(analysis.zoneDistribution).toEqual([
        { zone: 'North', riderCount: 1 },
        { zone: 'South', riderCount: 1 },
      ]);
      expect(analysis.avgLoadEfficiency).toBe(0.5);
    });

    it('should rank tied riders in the order they first appear', () => {
      const dataset = {
        ...sampleDataset(),
        orders: [
          buildOrder({ orderId: 1, riderId: 3, delayMinutes: 5, deliveryTimeMinutes: 25 }),
          buildOrder({ orderId: 2, riderId: 1, delayMinutes: 5, deliveryTimeMinutes: 30 }),
          buildOrder({ orderId: 3, riderId: 2, delayMinutes: 1, deliveryTimeMinutes: 20 }),
        ],
      };

      const analysis = composeRiderAnalysis(dataset);

      expect(analysis.topPerformers.map(rider => rider.riderId)).toEqual([2, 3, 1]);
      expect(analysis.overloadedRiders.map(rider => rider.riderId)).toEqual([3, 1, 2]);
    });

    it('should return an empty cohort for an empty dataset', () => {
      expect(composeRiderAnalysis(emptyDataset())).toEqual({
        riders: [],
        topPerformers: [],
        overloadedRiders: [],
        zoneDistribution: [],
        avgLoadEfficiency: 0,
      });
    });
  });

  describe('composePickingTimeAnalysis', () => {
    it('should rank the slowest stores', () => {
      expect(composePickingTimeAnalysis(sampleDataset()).slowestStores).toEqual([
        { storeId: 2, storeName: 'Store B', zone: 'South', avgPickingTime: 20, orderCount: 1 },
        { storeId: 1, storeName: 'Store A', zone: 'North', avgPickingTime: 10, orderCount: 2 },
        { storeId: 3, storeName: 'Store C', zone: 'North', avgPickingTime: 9, orderCount: 1 },
      ]);
    });

    it('should group by order size in ascending item count', () => {
      expect(composePickingTimeAnalysis(sampleDataset()).pickingTimeByOrderSize).toEqual([
        { totalItems: 3, avgPickingTime: 8.5, orderCount: 2 },
        { totalItems: 5, avgPickingTime: 16, orderCount: 2 },
      ]);
    });

    it('should average per zone and bucket by speed', () => {
      const analysis = composePickingTimeAnalysis(sampleDataset());

      expect(analysis.pickingTimeByZone).toEqual([
        { zone: 'North', avgPickingTime: 9.67, orderCount: 3 },
        { zone: 'South', avgPickingTime: 20, orderCount: 1 },
      ]);
      expect(analysis.pickingSpeedDistribution).toEqual({ fast: 2, medium: 1, slow: 1 });
      expect(analysis.avgPickingTime).toBe(12.25);
    });
  });

  describe('composeAnalyticsViews', () => {
    it('should compose every view from the same dataset', () => {
      const dataset = sampleDataset();

      const views = composeAnalyticsViews(dataset);

      expect(views.overview).toEqual(composeOverview(dataset));
      expect(views.delays).toEqual(composeDelayAnalysis(dataset));
      expect(views.cancellations).toEqual(composeCancellationAnalysis(dataset));
      expect(views.stockouts).toEqual(composeStockoutAnalysis(dataset));
      expect(views.riders).toEqual(composeRiderAnalysis(dataset));
      expect(views.picking).toEqual(composePickingTimeAnalysis(dataset));
    });
  });
});
