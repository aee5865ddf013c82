import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import * as XLSX from 'xlsx';
import { AnalyticsExportService, humanizeKey } from '../analytics-export.service';
import { AnalyticsService } from '../analytics.service';
import { AnalyticsComputationException } from '../exceptions/analytics-computation.exception';
import { composeAnalyticsViews } from '../analytics-views.composer';
import {
  evaluateRecommendations,
  groupRecommendationsByPriority,
} from '../recommendations/recommendation.engine';
import { sampleDataset } from './quick-commerce.fixtures';
import type { AnalyticsDashboard } from '../../../types/quick-commerce-analytics';

function buildDashboard(): AnalyticsDashboard {
  const views = composeAnalyticsViews(sampleDataset());
  const recommendations = evaluateRecommendations(views);
  return {
    ...views,
    recommendations,
    recommendationsByPriority: groupRecommendationsByPriority(recommendations),
    generatedAt: new Date(2024, 2, 5, 14, 7, 9),
  };
}

function sheetRows(workbook: XLSX.WorkBook, name: string): unknown[][] {
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[name], { header: 1 });
}

function findRow(rows: unknown[][], label: string): unknown[] | undefined {
  return rows.find(row => row[0] === label);
}

describe('AnalyticsExportService', () => {
  let service: AnalyticsExportService;

  const mockAnalyticsService = {
    getDashboard: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalyticsExportService,
        {
          provide: AnalyticsService,
          useValue: mockAnalyticsService,
        },
      ],
    }).compile();

    service = module.get<AnalyticsExportService>(AnalyticsExportService);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  describe('humanizeKey', () => {
    it('should title-case camelCase keys', () => {
      expect(humanizeKey('avgDeliveryTime')).toBe('Avg Delivery Time');
      expect(humanizeKey('onTimeRate')).toBe('On Time Rate');
      expect(humanizeKey('totalOrders')).toBe('Total Orders');
    });
  });

  describe('createExcelReport', () => {
    it('should name the file after the generation time', async () => {
      mockAnalyticsService.getDashboard.mockResolvedValue(buildDashboard());

      const report = await service.createExcelReport();

      expect(report.filename).toBe('quick_commerce_analytics_20240305_140709.xlsx');
      expect(report.buffer.length).toBeGreaterThan(0);
    });

    it('should write the sheets in report order', async () => {
      mockAnalyticsService.getDashboard.mockResolvedValue(buildDashboard());

      const { buffer } = await service.createExcelReport();
      const workbook = XLSX.read(buffer, { type: 'buffer' });

      expect(workbook.SheetNames).toEqual([
        'Overview',
        'Order Delays',
        'Cancellations',
        'Stockouts',
        'Picking Time',
        'Rider Performance',
        'Recommendations',
      ]);
    });

    it('should propagate a dashboard failure unchanged', async () => {
      const failure = new AnalyticsComputationException('dashboard', new Error('down'));
      mockAnalyticsService.getDashboard.mockRejectedValue(failure);

      await expect(service.createExcelReport()).rejects.toBe(failure);
    });
  });

  describe('buildWorkbook', () => {
    let workbook: XLSX.WorkBook;

    beforeEach(() => {
      workbook = service.buildWorkbook(buildDashboard());
    });

    it('should lead the overview with a title and the generation time', () => {
      const rows = sheetRows(workbook, 'Overview');

      expect(rows[0]).toEqual(['Quick-Commerce Analytics Report']);
      expect(rows[1]).toEqual(['Generated At', '2024-03-05 14:07:09']);
      expect(findRow(rows, 'Metric')).toEqual(['Metric', 'Value']);
      expect(findRow(rows, 'Total Orders')).toEqual(['Total Orders', 8]);
      expect(findRow(rows, 'Cancellation Rate')).toEqual(['Cancellation Rate', 37.5]);
      expect(findRow(rows, 'Stockout Rate')).toEqual(['Stockout Rate', 60]);
    });

    it('should list the delay distribution and the zone table', () => {
      const rows = sheetRows(workbook, 'Order Delays');

      expect(rows[0]).toEqual(['Delay Distribution']);
      expect(findRow(rows, 'On Time')).toEqual(['On Time', 2]);
      expect(findRow(rows, 'Severe Delay')).toEqual(['Severe Delay', 1]);
      expect(findRow(rows, 'Zone')).toEqual(['Zone', 'Avg Delay (min)', 'Orders']);
      expect(findRow(rows, 'South')).toEqual(['South', 40, 1]);
    });

    it('should tabulate cancellations, stockouts, picking and riders', () => {
      expect(sheetRows(workbook, 'Cancellations')).toEqual([
        ['Reason', 'Count'],
        ['Out of stock', 2],
        ['Customer requested', 1],
      ]);
      expect(sheetRows(workbook, 'Stockouts')[1]).toEqual([1, 'Milk', 'Dairy', 2]);
      expect(sheetRows(workbook, 'Picking Time')[1]).toEqual([2, 'Store B', 'South', 20, 1]);
      expect(sheetRows(workbook, 'Rider Performance')[1]).toEqual([
        1,
        'Rider 1',
        'North',
        3,
        30.67,
        3.33,
        0.75,
      ]);
    });

    it('should write one row per recommendation', () => {
      const rows = sheetRows(workbook, 'Recommendations');

      expect(rows[0]).toEqual(['Category', 'Priority', 'Issue', 'Recommendation']);
      expect(rows).toHaveLength(6);
      expect(rows[5]).toEqual([
        'Customer Experience',
        'Critical',
        'Only 50% of orders delivered on time',
        'Review entire fulfillment process, increase buffer time in delivery estimates, and optimize operations',
      ]);
    });

    it('should set column widths', () => {
      expect(workbook.Sheets['Recommendations']['!cols']).toEqual([
        { wch: 22 },
        { wch: 10 },
        { wch: 60 },
        { wch: 80 },
      ]);
    });
  });
});
