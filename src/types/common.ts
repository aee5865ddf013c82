// api/src/types/common.ts

/**
 * Standard envelope returned by every JSON endpoint
 */
export interface BaseResponse<TData = unknown> {
  success: boolean;
  message: string;
  data?: TData;
}

export interface HealthCheckResponse {
  status: 'ok' | 'degraded';
  /** Seconds since the service started */
  uptime: number;
  timestamp: string;
  database: 'connected' | 'disconnected';
}
