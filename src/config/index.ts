import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().default('/api/v1'),
  CORS_ORIGIN: commaList('*'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.string().default('info'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),

  // Matching engine tuning
  MATCH_TIME_TOLERANCE_SECONDS: z.coerce.number().nonnegative().default(10),
  MATCH_PRODUCT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
  DELIVERY_KEYWORDS: commaList('채널추가무료배송,택배요청'),
  ORDER_SHEET_NAME: z.string().default('상품 주문 상세내역'),
  FILTERED_SHEET_NAME: z.string().default('필터링_결과'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment configuration: ${issues}`);
}

export const env: EnvConfig = parsed.data;

export default env;
