import { Injectable, Logger } from '@nestjs/common';
import { format } from 'date-fns';
import * as XLSX from 'xlsx';
import { AnalyticsService } from './analytics.service';
import { AnalyticsComputationException } from './exceptions/analytics-computation.exception';
import type {
  AnalyticsDashboard,
  DelayDistribution,
  OverviewMetrics,
} from '../../types/quick-commerce-analytics';

export const EXCEL_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface ExcelReport {
  buffer: Buffer;
  filename: string;
}

type Cell = string | number;
type Row = Cell[];

const OVERVIEW_METRICS: ReadonlyArray<keyof OverviewMetrics> = [
  'totalOrders',
  'deliveredOrders',
  'cancelledOrders',
  'pendingOrders',
  'cancellationRate',
  'avgDeliveryTime',
  'avgDelay',
  'onTimeRate',
  'stockoutRate',
];

const DELAY_CATEGORIES: ReadonlyArray<keyof DelayDistribution> = [
  'onTime',
  'slightDelay',
  'moderateDelay',
  'severeDelay',
];

/** `avgDeliveryTime` -> `Avg Delivery Time` */
export function humanizeKey(key: string): string {
  const spaced = key.replace(/([A-Z])/g, ' $1').trim();
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function appendSheet(workbook: XLSX.WorkBook, name: string, rows: Row[], widths: number[]): void {
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  worksheet['!cols'] = widths.map(wch => ({ wch }));
  XLSX.utils.book_append_sheet(workbook, worksheet, name);
}

/**
 * Spreadsheet export of the analytics dashboard
 */
@Injectable()
export class AnalyticsExportService {
  private readonly logger = new Logger(AnalyticsExportService.name);

  constructor(private readonly analyticsService: AnalyticsService) {}

  async createExcelReport(): Promise<ExcelReport> {
    const dashboard = await this.analyticsService.getDashboard();

    try {
      const workbook = this.buildWorkbook(dashboard);
      const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
      const stamp = format(dashboard.generatedAt, 'yyyyMMdd_HHmmss');
      const filename = `quick_commerce_analytics_${stamp}.xlsx`;

      this.logger.log(`Excel export completed. Size: ${buffer.length} bytes`);
      return { buffer, filename };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error building Excel export: ${message}`);
      throw new AnalyticsComputationException('excel export', error);
    }
  }

  buildWorkbook(dashboard: AnalyticsDashboard): XLSX.WorkBook {
    const workbook = XLSX.utils.book_new();
    const { overview, delays, cancellations, stockouts, picking, riders, recommendations } =
      dashboard;

    appendSheet(
      workbook,
      'Overview',
      [
        ['Quick-Commerce Analytics Report'],
        ['Generated At', format(dashboard.generatedAt, 'yyyy-MM-dd HH:mm:ss')],
        [],
        ['Metric', 'Value'],
        ...OVERVIEW_METRICS.map((key): Row => [humanizeKey(key), overview[key]]),
      ],
      [30, 20],
    );

    appendSheet(
      workbook,
      'Order Delays',
      [
        ['Delay Distribution'],
        ['Category', 'Orders'],
        ...DELAY_CATEGORIES.map((key): Row => [humanizeKey(key), delays.delayDistribution[key]]),
        [],
        [],
        ['Delays by Zone'],
        ['Zone', 'Avg Delay (min)', 'Orders'],
        ...delays.delaysByZone.map((zone): Row => [zone.zone, zone.avgDelay, zone.count]),
      ],
      [25, 18, 12],
    );

    appendSheet(
      workbook,
      'Cancellations',
      [
        ['Reason', 'Count'],
        ...cancellations.cancellationReasons.map((reason): Row => [reason.reason, reason.count]),
      ],
      [30, 12],
    );

    appendSheet(
      workbook,
      'Stockouts',
      [
        ['Product ID', 'Product', 'Department', 'Stockouts'],
        ...stockouts.topStockoutProducts.map((product): Row => [
          product.productId,
          product.productName,
          product.department,
          product.stockoutCount,
        ]),
      ],
      [12, 30, 20, 12],
    );

    appendSheet(
      workbook,
      'Picking Time',
      [
        ['Store ID', 'Store', 'Zone', 'Avg Picking Time (min)', 'Orders'],
        ...picking.slowestStores.map((store): Row => [
          store.storeId,
          store.storeName,
          store.zone,
          store.avgPickingTime,
          store.orderCount,
        ]),
      ],
      [10, 25, 15, 22, 10],
    );

    appendSheet(
      workbook,
      'Rider Performance',
      [
        [
          'Rider ID',
          'Name',
          'Zone',
          'Deliveries',
          'Avg Delivery Time (min)',
          'Avg Delay (min)',
          'Load Efficiency',
        ],
        ...riders.topPerformers.map((rider): Row => [
          rider.riderId,
          rider.name,
          rider.zone,
          rider.totalDeliveries,
          rider.avgDeliveryTime,
          rider.avgDelay,
          rider.loadEfficiency,
        ]),
      ],
      [10, 20, 15, 12, 22, 16, 16],
    );

    appendSheet(
      workbook,
      'Recommendations',
      [
        ['Category', 'Priority', 'Issue', 'Recommendation'],
        ...recommendations.map((item): Row => [
          item.category,
          item.priority,
          item.issue,
          item.recommendation,
        ]),
      ],
      [22, 10, 60, 80],
    );

    return workbook;
  }
}
