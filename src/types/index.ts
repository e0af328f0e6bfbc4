import { Request, Response, NextFunction } from 'express';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: string;
  MAX_UPLOAD_MB: number;
  // Matching engine tuning
  MATCH_TIME_TOLERANCE_SECONDS: number;
  MATCH_PRODUCT_THRESHOLD: number;
  DELIVERY_KEYWORDS: string[];
  ORDER_SHEET_NAME: string;
  FILTERED_SHEET_NAME: string;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Route handlers may be sync or async; see utils/asyncHandler
export type RouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
