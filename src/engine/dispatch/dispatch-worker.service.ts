// Dispatch Worker — DB polling: lease 복구, 만기 대상 등록, 미완료 fan-out 재시도, dedup 정리

import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import {
  ALERT_REPOSITORY,
  DELIVERY_TARGET_REPOSITORY,
  type AlertRepository,
  type DeliveryTargetRepository,
} from '../../db/repositories/repository.types.js';
import { DirectoryUnavailableError } from '../../common/errors/beacon-errors.js';
import { DispatchConfigService } from '../../settings/dispatch-config.service.js';
import { DeduplicatorService } from '../dedup/deduplicator.service.js';
import { AlertDispatchService } from './alert-dispatch.service.js';
import { DispatchQueueService, WORKER_ID } from './dispatch-queue.service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PollReport {
  recoveredLeases: number;
  resolvedAlerts: number;
  enqueued: number;
  evictedDedup: number;
}

@Injectable()
export class DispatchWorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DispatchWorkerService.name);
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private retentionTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    @Inject(ALERT_REPOSITORY) private readonly alerts: AlertRepository,
    @Inject(DELIVERY_TARGET_REPOSITORY)
    private readonly targets: DeliveryTargetRepository,
    private readonly alertDispatch: AlertDispatchService,
    private readonly queue: DispatchQueueService,
    private readonly deduplicator: DeduplicatorService,
    private readonly configService: DispatchConfigService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();
    if (!config.workerEnabled) {
      this.logger.log('Dispatch worker disabled (DISPATCH_WORKER_ENABLED=false)');
      return;
    }

    this.running = true;
    this.scheduleNextPoll();
    this.retentionTimer = setInterval(() => {
      this.purgeExpired().catch((err) =>
        this.logger.error('Retention sweep error', err),
      );
    }, config.retentionSweepIntervalMs);
    this.retentionTimer.unref();

    this.logger.log(
      `Dispatch worker started (id=${WORKER_ID}, poll=${config.pollIntervalMs}ms, channels=${config.channelDriver}, storage=${config.storageDriver})`,
    );
  }

  onModuleDestroy(): void {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }
    this.logger.log('Dispatch worker stopped');
  }

  async poll(now: Date = new Date()): Promise<PollReport> {
    const config = this.configService.get();

    // 타임아웃 복구: lockedAt + leaseTimeout 초과한 lease 해제
    const recoveredLeases = await this.targets.recoverStaleLeases(
      new Date(now.getTime() - config.leaseTimeoutMs),
    );
    if (recoveredLeases > 0) {
      this.logger.warn(`Recovered ${recoveredLeases} stale delivery lease(s)`);
    }

    const resolvedAlerts = await this.resolvePending(config.batchSize, now);

    const due = await this.targets.findDue(now, config.batchSize);
    const enqueued = this.queue.enqueue(due);

    const evictedDedup = await this.deduplicator.sweep(now);

    return { recoveredLeases, resolvedAlerts, enqueued, evictedDedup };
  }

  /** retentionDays 이전 경보 중 모든 대상이 종료된 것을 삭제 */
  async purgeExpired(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(
      now.getTime() - this.configService.get().retentionDays * DAY_MS,
    );
    const purged = await this.alerts.purgeReportedBefore(cutoff);
    if (purged > 0) {
      this.logger.log(`Purged ${purged} alert(s) reported before ${cutoff.toISOString()}`);
    }
    return purged;
  }

  // 승인 후 fan-out 이 끝나지 않은 경보 (디렉터리 장애 등)
  private async resolvePending(limit: number, now: Date): Promise<number> {
    const unresolved = await this.alerts.findUnresolved(limit);
    let resolved = 0;
    for (const alert of unresolved) {
      try {
        await this.alertDispatch.startDispatch(alert, now);
        resolved++;
      } catch (err) {
        if (err instanceof DirectoryUnavailableError) {
          this.logger.warn(
            `Fan-out of alert ${alert.id} still blocked: ${err.message}`,
          );
          // 디렉터리가 내려가 있으면 나머지도 실패한다
          break;
        }
        // 경보 하나의 오류로 poll 의 나머지 단계를 건너뛰지 않는다
        this.logger.error(`Fan-out of alert ${alert.id} failed`, err);
      }
    }
    return resolved;
  }

  // poll 이 겹치지 않도록 setInterval 대신 완료 후 다음 poll 예약
  private scheduleNextPoll(): void {
    if (!this.running) return;
    this.pollTimer = setTimeout(() => {
      this.poll()
        .catch((err) => this.logger.error('Dispatch worker poll error', err))
        .finally(() => this.scheduleNextPoll());
    }, this.configService.get().pollIntervalMs);
    this.pollTimer.unref();
  }
}
