import { DispatchConfigService } from './dispatch-config.service.js';
import { SettingsController } from './settings.controller.js';
import { BadRequestError } from '../common/errors/beacon-errors.js';
import { PatchDispatchSettingsBodySchema } from './dto/patch-dispatch-settings.dto.js';

const ENV_KEYS = [
  'DEDUP_WINDOW_MINUTES',
  'SMS_RATE_PER_SECOND',
  'EMAIL_CONCURRENCY',
  'DISPATCH_BACKOFF_CAP_MS',
  'DISPATCH_WORKER_ENABLED',
  'CHANNEL_DRIVER',
  'STORAGE_DRIVER',
  'SMTP_HOST',
  'SMTP_PASS',
  'TWILIO_ACCOUNT_SID',
  'TWILIO_AUTH_TOKEN',
];

describe('DispatchConfigService', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('환경변수가 없으면 기본값', () => {
    const config = new DispatchConfigService().get();
    expect(config.dedupWindowMs).toBe(30 * 60_000);
    expect(config.retry).toEqual({
      maxRetries: 5,
      backoffBaseMs: 30_000,
      backoffCapMs: 30 * 60_000,
      jitterRatio: 0.2,
    });
    expect(config.channels.SMS).toEqual({ ratePerSecond: 1, burst: 5, concurrency: 2 });
    expect(config.workerEnabled).toBe(true);
    expect(config.channelDriver).toBe('mock');
    expect(config.storageDriver).toBe('postgres');
  });

  it('환경변수를 읽고, 허용되지 않은 드라이버 값은 무시', () => {
    process.env.DEDUP_WINDOW_MINUTES = '10';
    process.env.SMS_RATE_PER_SECOND = '0.5';
    process.env.DISPATCH_WORKER_ENABLED = 'false';
    process.env.CHANNEL_DRIVER = 'live';
    process.env.STORAGE_DRIVER = 'sqlite';

    const config = new DispatchConfigService().get();
    expect(config.dedupWindowMs).toBe(10 * 60_000);
    expect(config.channels.SMS.ratePerSecond).toBe(0.5);
    expect(config.workerEnabled).toBe(false);
    expect(config.channelDriver).toBe('live');
    expect(config.storageDriver).toBe('postgres');
  });

  const invalidEnv: [string, string, string][] = [
    ['DEDUP_WINDOW_MINUTES', '0', 'dedupWindowMs'],
    ['EMAIL_CONCURRENCY', '0', 'channels.EMAIL.concurrency'],
    ['SMS_RATE_PER_SECOND', '0', 'channels.SMS.ratePerSecond'],
    ['DISPATCH_BACKOFF_CAP_MS', '1000', 'retry: backoffCapMs must be >= backoffBaseMs'],
  ];

  it.each(invalidEnv)('%s=%s 이면 기동 실패', (name, value, issue) => {
    process.env[name] = value;
    expect(() => new DispatchConfigService()).toThrow(issue);
  });

  it('update 는 중첩 설정을 병합한다', () => {
    const service = new DispatchConfigService();
    service.update({ retry: { maxRetries: 2 }, channels: { EMAIL: { burst: 1 } } });

    const config = service.get();
    expect(config.retry.maxRetries).toBe(2);
    expect(config.retry.backoffBaseMs).toBe(30_000);
    expect(config.channels.EMAIL).toEqual({ ratePerSecond: 10, burst: 1, concurrency: 4 });
    expect(config.channels.SMS.burst).toBe(5);
  });

  it('getPublic 은 자격 증명을 노출하지 않는다', () => {
    process.env.SMTP_HOST = 'smtp.test.local';
    process.env.SMTP_PASS = 'test-secret';
    process.env.TWILIO_ACCOUNT_SID = 'AC-test';

    const view = new DispatchConfigService().getPublic();
    expect(view.smtpConfigured).toBe(true);
    expect(view.twilioConfigured).toBe(false);
    expect(JSON.stringify(view)).not.toContain('test-secret');
    expect(Object.keys(view)).not.toContain('smtp');
  });
});

describe('SettingsController', () => {
  it('PATCH 는 변경 후 공개 설정을 돌려준다', () => {
    const controller = new SettingsController(new DispatchConfigService());
    const result = controller.updateSettings('ops-1', { retry: { maxRetries: 1 } });
    expect(result.retry.maxRetries).toBe(1);
    expect(result.message).toBe(
      'Dispatch settings updated by ops-1. Changes apply to the next dispatch cycle.',
    );
  });

  it('dedup 창과 격자 크기는 PATCH 로 바꿀 수 없다', () => {
    expect(PatchDispatchSettingsBodySchema.safeParse({ dedupWindowMs: 60_000 }).success).toBe(
      false,
    );
    expect(PatchDispatchSettingsBodySchema.safeParse({ regionCellDegrees: 0.5 }).success).toBe(
      false,
    );
    expect(
      PatchDispatchSettingsBodySchema.safeParse({ channels: { SMS: { concurrency: 3 } } })
        .success,
    ).toBe(true);
  });

  it('cap < base 는 거부', () => {
    const controller = new SettingsController(new DispatchConfigService());
    expect(() =>
      controller.updateSettings('ops-1', { retry: { backoffCapMs: 1000 } }),
    ).toThrow(BadRequestError);
  });
});
