import type {
  Channel,
  ChannelDriver,
  StorageDriver,
} from '../../db/types/index.js';

export interface ChannelLimits {
  /** 초당 토큰 보충량 */
  ratePerSecond: number;
  /** 버킷 최대 토큰 */
  burst: number;
  /** 채널 내 동시 전송 수 */
  concurrency: number;
}

export interface RetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  /** 0~1, 지연을 최대 이 비율만큼 줄인다 */
  jitterRatio: number;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
}

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export interface DispatchConfig {
  dedupWindowMs: number;
  regionCellDegrees: number;
  retry: RetryPolicy;
  channels: Record<Channel, ChannelLimits>;
  pollIntervalMs: number;
  leaseTimeoutMs: number;
  batchSize: number;
  workerEnabled: boolean;
  retentionDays: number;
  retentionSweepIntervalMs: number;
  storageDriver: StorageDriver;
  channelDriver: ChannelDriver;
  smtp: SmtpConfig;
  twilio: TwilioConfig;
}
