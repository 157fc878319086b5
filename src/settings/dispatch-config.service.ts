// 디스패치 설정 서비스 — .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import {
  CHANNEL_DRIVER,
  STORAGE_DRIVER,
  type Channel,
  type ChannelDriver,
  type StorageDriver,
} from '../db/types/index.js';
import type {
  ChannelLimits,
  DispatchConfig,
  RetryPolicy,
} from './types/dispatch-config.types.js';
import { EnvSettingsSchema } from './dto/dispatch-settings.schema.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';

/** PATCH /v1/settings/dispatch 에서 변경 가능한 필드 */
export interface DispatchConfigPatch {
  retry?: Partial<RetryPolicy>;
  channels?: Partial<Record<Channel, Partial<ChannelLimits>>>;
  pollIntervalMs?: number;
  leaseTimeoutMs?: number;
  batchSize?: number;
  retentionDays?: number;
}

/** GET 응답 — 자격 증명은 설정 여부만 노출 */
export interface DispatchConfigPublic {
  dedupWindowMs: number;
  regionCellDegrees: number;
  retry: RetryPolicy;
  channels: Record<Channel, ChannelLimits>;
  pollIntervalMs: number;
  leaseTimeoutMs: number;
  batchSize: number;
  workerEnabled: boolean;
  retentionDays: number;
  storageDriver: StorageDriver;
  channelDriver: ChannelDriver;
  smtpConfigured: boolean;
  twilioConfigured: boolean;
}

const MINUTE_MS = 60_000;

function intEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

function pickEnv<T extends string>(
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = process.env[name];
  return allowed.find((v) => v === raw) ?? fallback;
}

@Injectable()
export class DispatchConfigService {
  private readonly logger = new Logger(DispatchConfigService.name);
  private config: DispatchConfig;

  constructor() {
    this.config = {
      dedupWindowMs: intEnv('DEDUP_WINDOW_MINUTES', 30) * MINUTE_MS,
      regionCellDegrees: floatEnv('REGION_CELL_DEGREES', 0.25),
      retry: {
        maxRetries: intEnv('DISPATCH_MAX_RETRIES', 5),
        backoffBaseMs: intEnv('DISPATCH_BACKOFF_BASE_MS', 30_000),
        backoffCapMs: intEnv('DISPATCH_BACKOFF_CAP_MS', 30 * MINUTE_MS),
        jitterRatio: floatEnv('DISPATCH_JITTER_RATIO', 0.2),
      },
      channels: {
        EMAIL: {
          ratePerSecond: floatEnv('EMAIL_RATE_PER_SECOND', 10),
          burst: intEnv('EMAIL_BURST', 20),
          concurrency: intEnv('EMAIL_CONCURRENCY', 4),
        },
        SMS: {
          ratePerSecond: floatEnv('SMS_RATE_PER_SECOND', 1),
          burst: intEnv('SMS_BURST', 5),
          concurrency: intEnv('SMS_CONCURRENCY', 2),
        },
      },
      pollIntervalMs: intEnv('DISPATCH_POLL_INTERVAL_MS', 5000),
      leaseTimeoutMs: intEnv('DISPATCH_LEASE_TIMEOUT_MS', 60_000),
      batchSize: intEnv('DISPATCH_BATCH_SIZE', 100),
      workerEnabled: boolEnv('DISPATCH_WORKER_ENABLED', true),
      retentionDays: intEnv('ALERT_RETENTION_DAYS', 90),
      retentionSweepIntervalMs: intEnv('RETENTION_SWEEP_INTERVAL_MS', 60 * MINUTE_MS),
      storageDriver: pickEnv('STORAGE_DRIVER', STORAGE_DRIVER, 'postgres'),
      channelDriver: pickEnv('CHANNEL_DRIVER', CHANNEL_DRIVER, 'mock'),
      smtp: {
        host: process.env.SMTP_HOST ?? '',
        port: intEnv('SMTP_PORT', 587),
        secure: boolEnv('SMTP_SECURE', false),
        user: process.env.SMTP_USER ?? '',
        pass: process.env.SMTP_PASS ?? '',
        from: process.env.EMAIL_FROM ?? 'Bushfire Beacon <alerts@localhost>',
      },
      twilio: {
        accountSid: process.env.TWILIO_ACCOUNT_SID ?? '',
        authToken: process.env.TWILIO_AUTH_TOKEN ?? '',
        fromNumber: process.env.TWILIO_FROM_NUMBER ?? '',
      },
    };

    // 범위 밖 값(창 0, 동시 전송 0, 속도 0 등)은 기동 시점에 거부
    const checked = EnvSettingsSchema.safeParse(this.config);
    if (!checked.success) {
      throw new Error(
        `Invalid dispatch configuration: ${formatZodIssues(checked.error).join('; ')}`,
      );
    }
  }

  get(): DispatchConfig {
    return this.config;
  }

  channelLimits(channel: Channel): ChannelLimits {
    return this.config.channels[channel];
  }

  /** 런타임 설정 변경 — 다음 전송/poll 부터 반영 */
  update(patch: DispatchConfigPatch): DispatchConfig {
    const { retry, channels, ...scalars } = patch;
    this.config = {
      ...this.config,
      ...scalars,
      retry: { ...this.config.retry, ...retry },
      channels: {
        EMAIL: { ...this.config.channels.EMAIL, ...channels?.EMAIL },
        SMS: { ...this.config.channels.SMS, ...channels?.SMS },
      },
    };
    this.logger.log(`Dispatch config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  getPublic(): DispatchConfigPublic {
    const c = this.config;
    return {
      dedupWindowMs: c.dedupWindowMs,
      regionCellDegrees: c.regionCellDegrees,
      retry: { ...c.retry },
      channels: { EMAIL: { ...c.channels.EMAIL }, SMS: { ...c.channels.SMS } },
      pollIntervalMs: c.pollIntervalMs,
      leaseTimeoutMs: c.leaseTimeoutMs,
      batchSize: c.batchSize,
      workerEnabled: c.workerEnabled,
      retentionDays: c.retentionDays,
      storageDriver: c.storageDriver,
      channelDriver: c.channelDriver,
      smtpConfigured: !!c.smtp.host,
      twilioConfigured: !!c.twilio.accountSid && !!c.twilio.authToken,
    };
  }
}
