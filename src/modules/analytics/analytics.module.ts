import { Module } from '@nestjs/common';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { AnalyticsExportService } from './analytics-export.service';
import { recommendationThresholdsProvider } from './analytics.providers';
import { QuickCommerceDatasetRepository } from './repositories/quick-commerce-dataset/quick-commerce-dataset.repository';
import { QuickCommerceDatasetTypeOrmRepository } from './repositories/quick-commerce-dataset/quick-commerce-dataset-typeorm.repository';

@Module({
  controllers: [AnalyticsController],
  providers: [
    AnalyticsService,
    AnalyticsExportService,
    recommendationThresholdsProvider,
    {
      provide: QuickCommerceDatasetRepository,
      useClass: QuickCommerceDatasetTypeOrmRepository,
    },
  ],
})
export class AnalyticsModule {}
