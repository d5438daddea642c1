// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Redis (OPTIONAL - app works without Redis)
  REDIS_HOST?: string;
  REDIS_PORT: number;
  // Matching tolerance overrides (unset = engine defaults)
  MATCH_EDIT_DISTANCE_THRESHOLD?: number;
  MATCH_JACCARD_THRESHOLD?: number;
  MATCH_AMOUNT_TOLERANCE_CEILING?: number;
  MATCH_ENFORCE_AMOUNT_CEILING?: boolean;
  MATCH_DATE_WINDOW_DAYS?: number;
  MATCH_DUPLICATE_WINDOW_DAYS?: number;
  MATCH_ACCEPT_THRESHOLD?: number;
  MATCH_REJECT_THRESHOLD?: number;
  MATCH_AMBIGUITY_EPSILON?: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  details?: unknown;
  timestamp: string;
}

// Optional dependency state as reported by /health
export type DependencyState = 'disabled' | 'up' | 'down';

// Sweeps go through BullMQ when Redis is configured, otherwise they run in the request
export type SweepMode = 'queued' | 'inline';

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  redis: DependencyState;
  sweepMode: SweepMode;
}

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, boolean>;
}
