import { z } from 'zod';
import { RateLimiterConfigSchema, type RateLimiterConfig } from '../core/rate-limiter.js';

export const ProviderBreakerConfigSchema = z.object({
  threshold: z.number().int().min(1).default(5),
  halfOpenAfterMs: z.number().min(100).default(30000),
});

export type ProviderBreakerConfig = z.infer<typeof ProviderBreakerConfigSchema>;

export function loadProviderBreakerConfig(): ProviderBreakerConfig {
  return ProviderBreakerConfigSchema.parse({
    threshold: Number(process.env.PROVIDER_BREAKER_THRESHOLD) || 5,
    halfOpenAfterMs: Number(process.env.PROVIDER_BREAKER_HALF_OPEN_MS) || 30000,
  });
}

export function loadRateLimiterConfig(): RateLimiterConfig {
  return RateLimiterConfigSchema.parse({
    maxConcurrent: Number(process.env.RATE_LIMITER_MAX_CONCURRENT) || 20,
    minTime: Number(process.env.RATE_LIMITER_MIN_TIME) || 0,
    reservoir: Number(process.env.RATE_LIMITER_RESERVOIR) || 120,
    reservoirRefreshAmount: Number(process.env.RATE_LIMITER_RESERVOIR_REFRESH_AMOUNT) || 20,
    reservoirRefreshInterval: Number(process.env.RATE_LIMITER_RESERVOIR_REFRESH_INTERVAL) || 10000,
  });
}
