/**
 * Common DTOs
 *
 * Response envelope and health-check shapes shared across the API.
 */

// ============================================================================
// API Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// ============================================================================
// Health Check
// ============================================================================

export interface ServiceHealth {
  status: 'up' | 'down' | 'disabled';
  latency?: number;
  error?: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  services: {
    tripStore: ServiceHealth;
    redis: ServiceHealth;
    routing: { provider: 'azure-maps' | 'straight-line' };
  };
}
