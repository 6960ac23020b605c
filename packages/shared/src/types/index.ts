export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  correlationId: string;
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResponse {
  status: ServiceStatus;
  service: string;
  version: string;
  timestamp: string;
  checks: {
    database: boolean;
    messaging?: boolean;
    external?: boolean;
  };
}

/** Every reported check down is unhealthy; some down is degraded. */
export const healthStatus = (checks: HealthCheckResponse['checks']): ServiceStatus => {
  const results = [checks.database, checks.messaging, checks.external].filter(
    (result): result is boolean => result !== undefined
  );
  if (results.every(Boolean)) return 'healthy';
  if (results.some(Boolean)) return 'degraded';
  return 'unhealthy';
};
