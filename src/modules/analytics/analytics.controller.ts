import { Controller, Get, HttpCode, HttpStatus, StreamableFile } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnalyticsService } from './analytics.service';
import { AnalyticsExportService, EXCEL_CONTENT_TYPE } from './analytics-export.service';
import type {
  AnalyticsDashboard,
  AnalyticsResponse,
  CancellationAnalysis,
  DelayAnalysis,
  OverviewMetrics,
  PickingTimeAnalysis,
  Recommendation,
  RiderAnalysis,
  StockoutAnalysis,
} from '../../types/quick-commerce-analytics';

@ApiTags('Analytics')
@Controller('analytics')
export class AnalyticsController {
  constructor(
    private readonly analyticsService: AnalyticsService,
    private readonly exportService: AnalyticsExportService,
  ) {}

  // =====================
  // VIEWS
  // =====================

  @Get('overview')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get headline order and fulfilment metrics' })
  @ApiResponse({ status: 200, description: 'Overview metrics retrieved successfully' })
  async getOverview(): Promise<AnalyticsResponse<OverviewMetrics>> {
    const data = await this.analyticsService.getOverviewMetrics();
    return { success: true, message: 'Overview metrics retrieved successfully', data };
  }

  @Get('order-delays')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get delivery delay distribution by severity, zone, hour and store' })
  @ApiResponse({ status: 200, description: 'Delay analysis retrieved successfully' })
  async getOrderDelays(): Promise<AnalyticsResponse<DelayAnalysis>> {
    const data = await this.analyticsService.getOrderDelaysAnalysis();
    return { success: true, message: 'Delay analysis retrieved successfully', data };
  }

  @Get('cancellations')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get cancellations by reason, zone and day' })
  @ApiResponse({ status: 200, description: 'Cancellation analysis retrieved successfully' })
  async getCancellations(): Promise<AnalyticsResponse<CancellationAnalysis>> {
    const data = await this.analyticsService.getCancellationAnalysis();
    return { success: true, message: 'Cancellation analysis retrieved successfully', data };
  }

  @Get('stockouts')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get stockouts by product, department and store' })
  @ApiResponse({ status: 200, description: 'Stockout analysis retrieved successfully' })
  async getStockouts(): Promise<AnalyticsResponse<StockoutAnalysis>> {
    const data = await this.analyticsService.getStockoutAnalysis();
    return { success: true, message: 'Stockout analysis retrieved successfully', data };
  }

  @Get('riders')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get per-rider delivery performance and load' })
  @ApiResponse({ status: 200, description: 'Rider performance retrieved successfully' })
  async getRiders(): Promise<AnalyticsResponse<RiderAnalysis>> {
    const data = await this.analyticsService.getRiderPerformance();
    return { success: true, message: 'Rider performance retrieved successfully', data };
  }

  @Get('picking-time')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get picking time by store, order size and zone' })
  @ApiResponse({ status: 200, description: 'Picking time analysis retrieved successfully' })
  async getPickingTime(): Promise<AnalyticsResponse<PickingTimeAnalysis>> {
    const data = await this.analyticsService.getPickingTimeAnalysis();
    return { success: true, message: 'Picking time analysis retrieved successfully', data };
  }

  @Get('recommendations')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get prioritized operational recommendations' })
  @ApiResponse({ status: 200, description: 'Recommendations generated successfully' })
  async getRecommendations(): Promise<AnalyticsResponse<Recommendation[]>> {
    const data = await this.analyticsService.getRecommendations();
    return { success: true, message: 'Recommendations generated successfully', data };
  }

  @Get('dashboard')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get every analytics view and the recommendations in one response' })
  @ApiResponse({ status: 200, description: 'Dashboard retrieved successfully' })
  async getDashboard(): Promise<AnalyticsResponse<AnalyticsDashboard>> {
    const data = await this.analyticsService.getDashboard();
    return { success: true, message: 'Dashboard retrieved successfully', data };
  }

  // =====================
  // EXPORT
  // =====================

  @Get('export-excel')
  @ApiOperation({ summary: 'Download the analytics report as an Excel workbook' })
  @ApiProduces(EXCEL_CONTENT_TYPE)
  @ApiResponse({ status: 200, description: 'Excel report file' })
  async exportExcel(): Promise<StreamableFile> {
    const { buffer, filename } = await this.exportService.createExcelReport();
    return new StreamableFile(buffer, {
      type: EXCEL_CONTENT_TYPE,
      disposition: `attachment; filename="${filename}"`,
      length: buffer.length,
    });
  }
}
