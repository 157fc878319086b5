// 경보 API 서비스 — intake 경계, 상태 조회, 철회, fan-out 재시도

import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  AlertRecord,
  DeliveryStatus,
  DeliveryTarget,
} from '../db/types/index.js';
import {
  ALERT_REPOSITORY,
  DELIVERY_TARGET_REPOSITORY,
  type AlertRepository,
  type DeliveryTargetRepository,
} from '../db/repositories/repository.types.js';
import {
  ConflictError,
  NotFoundError,
} from '../common/errors/beacon-errors.js';
import { EventIntakeService } from '../engine/intake/event-intake.service.js';
import { DeduplicatorService } from '../engine/dedup/deduplicator.service.js';
import { AlertDispatchService } from '../engine/dispatch/alert-dispatch.service.js';
import { DispatchQueueService } from '../engine/dispatch/dispatch-queue.service.js';
import { WITHDRAWN_REASON } from '../engine/dispatch/delivery-state.js';

export type ReportResult =
  | { alertId: string; status: 'ADMITTED'; targets: number }
  | { alertId: string; status: 'DUPLICATE'; duplicateOf: string };

export interface DeliveryStatusView {
  alertId: string;
  withdrawn: boolean;
  resolved: boolean;
  counts: Record<DeliveryStatus, number>;
  targets: DeliveryTarget[];
}

export interface WithdrawResult {
  alertId: string;
  withdrawnAt: Date;
  cancelled: number;
}

@Injectable()
export class AlertsService {
  private readonly logger = new Logger(AlertsService.name);

  constructor(
    @Inject(ALERT_REPOSITORY) private readonly alerts: AlertRepository,
    @Inject(DELIVERY_TARGET_REPOSITORY)
    private readonly targets: DeliveryTargetRepository,
    private readonly intake: EventIntakeService,
    private readonly deduplicator: DeduplicatorService,
    private readonly alertDispatch: AlertDispatchService,
    private readonly queue: DispatchQueueService,
  ) {}

  /**
   * 보고 수신: intake → dedup → (승인 시) 저장 → fan-out → 큐 등록.
   * 디렉터리 장애로 fan-out 이 실패해도 경보는 저장된 상태로 남고 worker 가 재시도한다.
   */
  async report(payload: unknown, now: Date = new Date()): Promise<ReportResult> {
    const alert = this.intake.intake(payload);
    const admission = await this.deduplicator.admit(alert, now);

    if (admission.kind === 'DUPLICATE') {
      await this.alerts.save({
        ...alert,
        status: 'DUPLICATE',
        duplicateOf: admission.of,
        resolvedAt: null,
        withdrawnAt: null,
        createdAt: now,
      });
      return { alertId: alert.id, status: 'DUPLICATE', duplicateOf: admission.of };
    }

    try {
      await this.alerts.save({
        ...alert,
        status: 'ADMITTED',
        duplicateOf: null,
        resolvedAt: null,
        withdrawnAt: null,
        createdAt: now,
      });
    } catch (err) {
      // 저장되지 않은 경보를 가리키는 dedup 기록을 남기지 않는다
      await this.deduplicator.release(alert);
      throw err;
    }
    const targets = await this.alertDispatch.startDispatch(alert, now);
    return { alertId: alert.id, status: 'ADMITTED', targets: targets.length };
  }

  async getAlert(alertId: string): Promise<AlertRecord> {
    const alert = await this.alerts.findById(alertId);
    if (!alert) throw new NotFoundError(`Alert ${alertId} not found`);
    return alert;
  }

  async getDeliveryStatus(alertId: string): Promise<DeliveryStatusView> {
    const alert = await this.getAlert(alertId);
    const targets = await this.targets.findByAlert(alertId);

    const counts: Record<DeliveryStatus, number> = {
      PENDING: 0,
      SENT: 0,
      FAILED: 0,
      EXHAUSTED: 0,
    };
    for (const target of targets) counts[target.status]++;

    return {
      alertId,
      withdrawn: alert.withdrawnAt !== null,
      resolved: alert.resolvedAt !== null,
      counts,
      targets,
    };
  }

  /** 아직 보내지 않은 대상을 중단. 이미 SENT 인 대상은 그대로 */
  async withdraw(alertId: string, now: Date = new Date()): Promise<WithdrawResult> {
    const alert = await this.getAlert(alertId);
    if (alert.status === 'DUPLICATE') {
      throw new ConflictError('Duplicate alerts are never dispatched', {
        alertId,
        duplicateOf: alert.duplicateOf,
      });
    }

    const marked = await this.alerts.markWithdrawn(alertId, now);
    const withdrawnAt = marked ? now : (alert.withdrawnAt ?? now);

    this.queue.dropAlert(alertId);
    const cancelled = await this.targets.cancelPending(alertId, WITHDRAWN_REASON, now);

    this.logger.log(
      `Alert ${alertId} withdrawn (${cancelled} pending target(s) cancelled)`,
    );
    return { alertId, withdrawnAt, cancelled };
  }

  /** fan-out 단계 수동 재시도 — 이미 끝났거나 철회된 경보는 거부 */
  async retryResolve(alertId: string, now: Date = new Date()): Promise<ReportResult> {
    const alert = await this.getAlert(alertId);
    if (alert.status !== 'ADMITTED') {
      throw new ConflictError('Only admitted alerts are dispatched', { alertId });
    }
    if (alert.withdrawnAt) {
      throw new ConflictError('Alert has been withdrawn', { alertId });
    }
    if (alert.resolvedAt) {
      throw new ConflictError('Alert fan-out already completed', {
        alertId,
        resolvedAt: alert.resolvedAt.toISOString(),
      });
    }
    const targets = await this.alertDispatch.startDispatch(alert, now);
    return { alertId, status: 'ADMITTED', targets: targets.length };
  }
}
