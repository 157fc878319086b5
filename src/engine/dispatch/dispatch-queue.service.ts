// Dispatch Queue — 채널별 lane, 동시 전송 상한, 토큰 버킷, 재시도 재등록

import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
} from '@nestjs/common';
import {
  CHANNEL,
  targetKeyOf,
  type Channel,
  type DeliveryTarget,
} from '../../db/types/index.js';
import {
  ALERT_REPOSITORY,
  DELIVERY_TARGET_REPOSITORY,
  type AlertRepository,
  type DeliveryTargetRepository,
} from '../../db/repositories/repository.types.js';
import { DispatchConfigService } from '../../settings/dispatch-config.service.js';
import type { ChannelLimits } from '../../settings/types/dispatch-config.types.js';
import { DeliveryDispatcherService } from './delivery-dispatcher.service.js';
import {
  withdrawTarget,
  WITHDRAWN_REASON,
  type Transition,
} from './delivery-state.js';
import { SCHEDULER, type CancelTask, type Scheduler } from './scheduler.js';
import { TokenBucket } from './token-bucket.js';

export const WORKER_ID = `dispatcher_${process.pid}_${Date.now()}`;

const ALERT_MISSING_REASON = 'ALERT_NOT_FOUND';

interface Lane {
  channel: Channel;
  queued: DeliveryTarget[];
  active: number;
  bucket: TokenBucket;
  limits: ChannelLimits;
  wakeup: CancelTask | null;
}

export interface LaneStats {
  queued: number;
  inFlight: number;
  scheduledRetries: number;
}

@Injectable()
export class DispatchQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(DispatchQueueService.name);
  private readonly lanes: Record<Channel, Lane>;
  /** 큐 대기 / 전송 중 / 재시도 예약 중인 대상 — 같은 프로세스에서 동시에 두 번 보내지 않는다 */
  private readonly tracked = new Set<string>();
  private readonly retryTimers = new Map<
    string,
    { target: DeliveryTarget; cancel: CancelTask }
  >();
  private readonly inFlight = new Set<Promise<void>>();
  private stopped = false;

  constructor(
    @Inject(ALERT_REPOSITORY) private readonly alerts: AlertRepository,
    @Inject(DELIVERY_TARGET_REPOSITORY)
    private readonly targets: DeliveryTargetRepository,
    private readonly dispatcher: DeliveryDispatcherService,
    private readonly configService: DispatchConfigService,
    @Inject(SCHEDULER) private readonly scheduler: Scheduler,
  ) {
    const now = scheduler.now();
    const lane = (channel: Channel): Lane => {
      const limits = { ...configService.channelLimits(channel) };
      return {
        channel,
        queued: [],
        active: 0,
        bucket: new TokenBucket(limits.ratePerSecond, limits.burst, now),
        limits,
        wakeup: null,
      };
    };
    this.lanes = { EMAIL: lane('EMAIL'), SMS: lane('SMS') };
  }

  /** PENDING 대상 등록. 이미 추적 중인 대상은 건너뛴다. 새로 등록된 수를 반환 */
  enqueue(targets: DeliveryTarget[]): number {
    if (this.stopped) return 0;
    let added = 0;
    const touched = new Set<Channel>();
    for (const target of targets) {
      if (target.status !== 'PENDING') continue;
      const key = targetKeyOf(target);
      if (this.tracked.has(key)) continue;
      this.tracked.add(key);
      this.lanes[target.channel].queued.push(target);
      touched.add(target.channel);
      added++;
    }
    for (const channel of touched) this.pump(this.lanes[channel]);
    return added;
  }

  /** 철회된 경보의 대기/예약 대상을 큐에서 제거. 전송 중인 대상은 처리 후 FAILED 가 된다 */
  dropAlert(alertId: string): number {
    let dropped = 0;
    for (const lane of Object.values(this.lanes)) {
      const kept: DeliveryTarget[] = [];
      for (const target of lane.queued) {
        if (target.alertId === alertId) {
          this.tracked.delete(targetKeyOf(target));
          dropped++;
        } else {
          kept.push(target);
        }
      }
      lane.queued = kept;
    }
    for (const [key, retry] of this.retryTimers) {
      if (retry.target.alertId !== alertId) continue;
      retry.cancel();
      this.retryTimers.delete(key);
      this.tracked.delete(key);
      dropped++;
    }
    return dropped;
  }

  /** 현재 전송 중인 작업(과 그 뒤로 이어진 작업)이 모두 끝날 때까지 대기 */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  stats(): Record<Channel, LaneStats> {
    const scheduled = (channel: Channel) =>
      [...this.retryTimers.values()].filter((r) => r.target.channel === channel)
        .length;
    const of = (channel: Channel): LaneStats => ({
      queued: this.lanes[channel].queued.length,
      inFlight: this.lanes[channel].active,
      scheduledRetries: scheduled(channel),
    });
    return { EMAIL: of('EMAIL'), SMS: of('SMS') };
  }

  onModuleDestroy(): void {
    this.stopped = true;
    for (const channel of CHANNEL) {
      const lane = this.lanes[channel];
      lane.wakeup?.();
      lane.wakeup = null;
      lane.queued = [];
    }
    for (const retry of this.retryTimers.values()) retry.cancel();
    this.retryTimers.clear();
    this.tracked.clear();
  }

  private pump(lane: Lane): void {
    if (this.stopped) return;
    this.applyLimits(lane);

    while (lane.active < lane.limits.concurrency && lane.queued.length > 0) {
      const waitMs = lane.bucket.tryTake(this.scheduler.now());
      if (waitMs > 0) {
        // 토큰 부족 — 대상은 큐에 남고 타이머가 lane 을 다시 깨운다
        if (!lane.wakeup) {
          lane.wakeup = this.scheduler.schedule(waitMs, () => {
            lane.wakeup = null;
            this.pump(lane);
          });
        }
        return;
      }

      const target = lane.queued.shift();
      if (!target) return;
      lane.active++;
      const task: Promise<void> = this.run(lane, target).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    }
  }

  // 런타임 설정 변경 반영
  private applyLimits(lane: Lane): void {
    const limits = this.configService.channelLimits(lane.channel);
    if (
      limits.ratePerSecond === lane.limits.ratePerSecond &&
      limits.burst === lane.limits.burst &&
      limits.concurrency === lane.limits.concurrency
    ) {
      return;
    }
    lane.limits = { ...limits };
    lane.bucket.reconfigure(limits.ratePerSecond, limits.burst, this.scheduler.now());
  }

  private async run(lane: Lane, target: DeliveryTarget): Promise<void> {
    const key = targetKeyOf(target);
    let retry: DeliveryTarget | null = null;
    try {
      retry = await this.process(target);
    } catch (err) {
      this.logger.error(`Dispatch of ${key} failed`, err);
    } finally {
      lane.active--;
      if (retry && !this.stopped) {
        this.scheduleRetry(key, retry);
      } else {
        this.tracked.delete(key);
      }
      this.pump(lane);
    }
  }

  /** lease 획득 → 철회 확인 → 전송 → 커밋. 재시도할 대상이면 반환 */
  private async process(queued: DeliveryTarget): Promise<DeliveryTarget | null> {
    const key = targetKeyOf(queued);
    const config = this.configService.get();
    const claimedAt = new Date(this.scheduler.now());

    const target = await this.targets.claim(
      queued,
      WORKER_ID,
      claimedAt,
      config.leaseTimeoutMs,
    );
    if (!target) {
      this.logger.debug(`Skip ${key}: not PENDING or leased elsewhere`);
      return null;
    }

    const alert = await this.alerts.findById(target.alertId);
    if (!alert || alert.withdrawnAt) {
      const reason = alert ? WITHDRAWN_REASON : ALERT_MISSING_REASON;
      await this.commit(target, withdrawTarget(target, reason));
      return null;
    }

    const stopRenewal = this.keepLeaseAlive(target, config.leaseTimeoutMs);
    let transition: Transition;
    try {
      transition = await this.dispatcher.dispatch(
        target,
        alert,
        new Date(this.scheduler.now()),
      );
    } finally {
      stopRenewal();
    }
    const { outcome, next } = transition;

    let final = next;
    if (outcome.kind === 'RETRY') {
      // 전송 중에 철회되었으면 재시도하지 않는다
      const latest = await this.alerts.findById(alert.id);
      if (!latest || latest.withdrawnAt) {
        final = withdrawTarget(next);
      }
    }

    const committed = await this.commit(target, final);
    return committed && final.status === 'PENDING' ? final : null;
  }

  /** 전송이 leaseTimeout 보다 길어도 poll 이 lease 를 회수하지 않도록 lockedAt 을 주기적으로 갱신 */
  private keepLeaseAlive(target: DeliveryTarget, leaseTimeoutMs: number): CancelTask {
    const key = targetKeyOf(target);
    const intervalMs = Math.max(1, Math.floor(leaseTimeoutMs / 3));
    let done = false;
    let cancel: CancelTask = () => undefined;

    const beat = (): void => {
      cancel = this.scheduler.schedule(intervalMs, () => {
        if (done) return;
        this.targets
          .renewLease(target, WORKER_ID, new Date(this.scheduler.now()))
          .then((renewed) => {
            if (!renewed) this.logger.warn(`Lease on ${key} lost during send`);
          })
          .catch((err) => this.logger.error(`Lease renewal for ${key} failed`, err));
        beat();
      });
    };
    beat();

    return () => {
      done = true;
      cancel();
    };
  }

  private async commit(
    target: DeliveryTarget,
    next: DeliveryTarget,
  ): Promise<boolean> {
    const ok = await this.targets.commit(target, WORKER_ID, next);
    if (!ok) {
      this.logger.warn(
        `Lost lease on ${targetKeyOf(target)} before commit; result of this attempt discarded`,
      );
    }
    return ok;
  }

  private scheduleRetry(key: string, target: DeliveryTarget): void {
    const dueAt = target.nextAttemptAt?.getTime() ?? this.scheduler.now();
    const cancel = this.scheduler.schedule(dueAt - this.scheduler.now(), () => {
      this.retryTimers.delete(key);
      this.tracked.delete(key);
      this.enqueue([target]);
    });
    this.retryTimers.set(key, { target, cancel });
  }
}
