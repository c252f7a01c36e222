import type { ErrorCode } from './error.types';

/**
 * HTTP envelope types
 */

export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
}

// `NOT_FOUND` is the unknown-route code; everything else is an ErrorCode
export interface ApiErrorResponse {
  error: {
    code: ErrorCode | 'NOT_FOUND';
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface FieldError {
  field: string;
  message: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  store: 'supabase' | 'memory';
  uptime: number;
}
