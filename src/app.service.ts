import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type { HealthCheckResponse } from './types/common';

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(private readonly dataSource: DataSource) {}

  getHello(): string {
    return 'Quick-Commerce Analytics API';
  }

  getHealthCheck(): HealthCheckResponse {
    const database = this.dataSource.isInitialized ? 'connected' : 'disconnected';
    return {
      status: database === 'connected' ? 'ok' : 'degraded',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      database,
    };
  }
}
