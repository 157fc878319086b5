import { z } from 'zod';

export const ChannelLimitsSchema = z
  .object({
    ratePerSecond: z.number().positive().max(1000),
    burst: z.number().int().min(1).max(10_000),
    concurrency: z.number().int().min(1).max(256),
  })
  .strict();

export const RetryPolicySchema = z
  .object({
    maxRetries: z.number().int().min(0).max(50),
    backoffBaseMs: z.number().int().min(0),
    backoffCapMs: z.number().int().min(0),
    jitterRatio: z.number().min(0).max(1),
  })
  .strict();

/** PATCH 로도 바꿀 수 있는 값 */
export const RuntimeSettingsSchema = z
  .object({
    retry: RetryPolicySchema,
    channels: z
      .object({ EMAIL: ChannelLimitsSchema, SMS: ChannelLimitsSchema })
      .strict(),
    pollIntervalMs: z.number().int().min(100),
    leaseTimeoutMs: z.number().int().min(1000),
    batchSize: z.number().int().min(1).max(1000),
    retentionDays: z.number().int().min(1),
  })
  .strict();

/**
 * 시작 시 환경변수 검증.
 * dedupWindowMs / regionCellDegrees 는 환경변수 전용. 바뀌면 시간 버킷 번호와
 * 구독자에 저장된 격자 코드(G:lat:lon)가 어긋난다.
 */
export const EnvSettingsSchema = RuntimeSettingsSchema.extend({
  dedupWindowMs: z.number().int().min(1000),
  regionCellDegrees: z.number().positive().max(10),
  retentionSweepIntervalMs: z.number().int().min(1000),
  retry: RetryPolicySchema.refine((r) => r.backoffCapMs >= r.backoffBaseMs, {
    message: 'backoffCapMs must be >= backoffBaseMs',
  }),
}).passthrough();
