import { Inject, Injectable, Logger } from '@nestjs/common';
import type { RecommendationThresholds } from '@constants';
import { QuickCommerceDatasetRepository } from './repositories/quick-commerce-dataset/quick-commerce-dataset.repository';
import { RECOMMENDATION_THRESHOLDS } from './analytics.providers';
import { AnalyticsComputationException } from './exceptions/analytics-computation.exception';
import {
  composeAnalyticsViews,
  composeCancellationAnalysis,
  composeDelayAnalysis,
  composeOverview,
  composePickingTimeAnalysis,
  composeRiderAnalysis,
  composeStockoutAnalysis,
} from './analytics-views.composer';
import {
  evaluateRecommendations,
  groupRecommendationsByPriority,
} from './recommendations/recommendation.engine';
import type { QuickCommerceDataset } from '../../types/quick-commerce';
import type {
  AnalyticsDashboard,
  CancellationAnalysis,
  DelayAnalysis,
  OverviewMetrics,
  PickingTimeAnalysis,
  Recommendation,
  RiderAnalysis,
  StockoutAnalysis,
} from '../../types/quick-commerce-analytics';

/**
 * Loads one snapshot per call and composes the requested view from it.
 * Nothing is cached between calls.
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly datasetRepository: QuickCommerceDatasetRepository,
    @Inject(RECOMMENDATION_THRESHOLDS)
    private readonly thresholds: RecommendationThresholds,
  ) {}

  async getOverviewMetrics(): Promise<OverviewMetrics> {
    return this.compute('overview', composeOverview);
  }

  async getOrderDelaysAnalysis(): Promise<DelayAnalysis> {
    return this.compute('order delays', composeDelayAnalysis);
  }

  async getCancellationAnalysis(): Promise<CancellationAnalysis> {
    return this.compute('cancellations', composeCancellationAnalysis);
  }

  async getStockoutAnalysis(): Promise<StockoutAnalysis> {
    return this.compute('stockouts', composeStockoutAnalysis);
  }

  async getRiderPerformance(): Promise<RiderAnalysis> {
    return this.compute('rider performance', composeRiderAnalysis);
  }

  async getPickingTimeAnalysis(): Promise<PickingTimeAnalysis> {
    return this.compute('picking time', composePickingTimeAnalysis);
  }

  async getRecommendations(): Promise<Recommendation[]> {
    return this.compute('recommendations', dataset =>
      evaluateRecommendations(composeAnalyticsViews(dataset), this.thresholds),
    );
  }

  /**
   * All six views and the recommendations, composed from the same snapshot
   * so the figures agree with each other.
   */
  async getDashboard(): Promise<AnalyticsDashboard> {
    return this.compute('dashboard', dataset => {
      const views = composeAnalyticsViews(dataset);
      const recommendations = evaluateRecommendations(views, this.thresholds);
      return {
        ...views,
        recommendations,
        recommendationsByPriority: groupRecommendationsByPriority(recommendations),
        generatedAt: new Date(),
      };
    });
  }

  private async compute<TView>(
    view: string,
    composer: (dataset: QuickCommerceDataset) => TView,
  ): Promise<TView> {
    const startedAt = Date.now();
    try {
      const dataset = await this.datasetRepository.loadSnapshot();
      const result = composer(dataset);
      this.logger.debug(`Computed ${view} analytics in ${Date.now() - startedAt}ms`);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Error computing ${view} analytics: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new AnalyticsComputationException(view, error);
    }
  }
}
