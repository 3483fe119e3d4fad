export interface APIError {
  code: string;
  message: string;
  details?: ValidationIssue[];
}

export interface ErrorResponse {
  success: false;
  error: APIError;
  timestamp: Date;
  stack?: string;
}

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export interface CreatedResponse {
  id: string;
  status: 'ok';
}

/** Wire shape of GET /stats. */
export interface StatsPayload {
  wait: number;
  beds: number;
  doctors: number;
  activity: number;
  note?: string;
}

export interface DiagnosticsPayload {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  checks: {
    database: boolean;
    timestamp: string;
    uptime: number;
    version: string;
  };
  environment: string;
}
