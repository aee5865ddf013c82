// Body of an HttpException built from an object
export interface HttpExceptionResponse {
  message?: string | string[];
  error?: string;
  statusCode?: number;
  details?: unknown;
}

export function isHttpExceptionResponse(value: unknown): value is HttpExceptionResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
