import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { RecommendationThresholds } from '@constants';
import { loadRecommendationThresholds } from '../../common/config/env.validation';
import type { EnvConfig } from '../../common/config/env.validation';

export const RECOMMENDATION_THRESHOLDS = Symbol('RECOMMENDATION_THRESHOLDS');

export const recommendationThresholdsProvider: FactoryProvider<RecommendationThresholds> = {
  provide: RECOMMENDATION_THRESHOLDS,
  inject: [ConfigService],
  useFactory: (config: ConfigService<EnvConfig, true>) =>
    loadRecommendationThresholds({
      RECOMMENDATION_MAX_AVG_DELAY: config.get('RECOMMENDATION_MAX_AVG_DELAY', { infer: true }),
      RECOMMENDATION_MAX_CANCELLATION_RATE: config.get('RECOMMENDATION_MAX_CANCELLATION_RATE', {
        infer: true,
      }),
      RECOMMENDATION_MAX_STOCKOUT_RATE: config.get('RECOMMENDATION_MAX_STOCKOUT_RATE', {
        infer: true,
      }),
      RECOMMENDATION_MAX_AVG_PICKING_TIME: config.get('RECOMMENDATION_MAX_AVG_PICKING_TIME', {
        infer: true,
      }),
      RECOMMENDATION_RIDER_LOAD_FACTOR: config.get('RECOMMENDATION_RIDER_LOAD_FACTOR', {
        infer: true,
      }),
      RECOMMENDATION_MIN_ON_TIME_RATE: config.get('RECOMMENDATION_MIN_ON_TIME_RATE', {
        infer: true,
      }),
    }),
};
