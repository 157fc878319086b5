import type {
  Alert,
  Channel,
  DeliveryTarget,
  NewSubscriber,
} from '../db/types/index.js';
import { DispatchConfigService } from '../settings/dispatch-config.service.js';
import type {
  ChannelAdapter,
  ChannelMessage,
  SendResult,
} from '../channels/types/channel.types.js';

/** 재시도/채널 한도를 고정값으로 덮어쓴 설정. dedup 창과 격자는 기본값 */
export function makeConfig(): DispatchConfigService {
  const config = new DispatchConfigService();
  config.update({
    retry: { maxRetries: 5, backoffBaseMs: 1000, backoffCapMs: 60_000, jitterRatio: 0 },
    channels: {
      EMAIL: { ratePerSecond: 100, burst: 100, concurrency: 4 },
      SMS: { ratePerSecond: 100, burst: 100, concurrency: 2 },
    },
    leaseTimeoutMs: 60_000,
    batchSize: 100,
    retentionDays: 90,
  });
  return config;
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'alert-1',
    hazardType: 'bushfire',
    geographicRegion: 'NSW-BLUE-MOUNTAINS',
    severity: 'high',
    reportedAt: new Date('2025-01-01T00:00:00.000Z'),
    dedupKey: 'key-1',
    source: 'rfs-feed',
    location: null,
    description: null,
    ...overrides,
  };
}

export function makeTarget(overrides: Partial<DeliveryTarget> = {}): DeliveryTarget {
  return {
    alertId: 'alert-1',
    subscriberId: 'sub-1',
    channel: 'EMAIL',
    destination: 'resident@example.com',
    status: 'PENDING',
    attemptCount: 0,
    nextAttemptAt: null,
    lastError: null,
    sentAt: null,
    ...overrides,
  };
}

export function makeSubscriber(overrides: Partial<NewSubscriber> = {}): NewSubscriber {
  return {
    name: 'Resident',
    email: 'resident@example.com',
    emailOptIn: true,
    phone: null,
    smsOptIn: false,
    regions: ['NSW-BLUE-MOUNTAINS'],
    hazardTypes: [],
    active: true,
    ...overrides,
  };
}

/** 미리 정한 결과를 순서대로 돌려주는 어댑터. 결과가 떨어지면 OK */
export class ScriptedAdapter implements ChannelAdapter {
  readonly name = 'scripted';
  readonly sent: { destination: string; message: ChannelMessage }[] = [];
  private readonly script: (SendResult | Error)[];
  inFlight = 0;
  maxInFlight = 0;
  /** 설정 시 send 가 이 promise 가 풀릴 때까지 대기 */
  gate: Promise<void> | null = null;

  constructor(
    readonly channel: Channel,
    script: (SendResult | Error)[] = [],
  ) {
    this.script = [...script];
  }

  async send(destination: string, message: ChannelMessage): Promise<SendResult> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.gate) await this.gate;
      this.sent.push({ destination, message });
      const next = this.script.shift();
      if (next instanceof Error) throw next;
      return next ?? { kind: 'OK', providerMessageId: `msg-${this.sent.length}` };
    } finally {
      this.inFlight--;
    }
  }

  /** 다음 send 결과들을 뒤에 추가 */
  willReturn(...results: (SendResult | Error)[]): void {
    this.script.push(...results);
  }

  isAvailable(): boolean {
    return true;
  }
}
