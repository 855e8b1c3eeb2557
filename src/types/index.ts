// API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}

// Readiness response
export interface ReadinessResponse {
  ready: boolean;
  checks: {
    server: boolean;
    matcher: boolean;
  };
}
