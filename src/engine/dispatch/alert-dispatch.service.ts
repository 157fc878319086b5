// 승인된 경보의 fan-out 확정 — 대상 저장 후 resolvedAt 기록, 큐 등록

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Alert, DeliveryTarget } from '../../db/types/index.js';
import {
  ALERT_REPOSITORY,
  DELIVERY_TARGET_REPOSITORY,
  type AlertRepository,
  type DeliveryTargetRepository,
} from '../../db/repositories/repository.types.js';
import { FanoutResolverService } from '../fanout/fanout-resolver.service.js';
import { DispatchQueueService } from './dispatch-queue.service.js';

@Injectable()
export class AlertDispatchService {
  private readonly logger = new Logger(AlertDispatchService.name);

  constructor(
    @Inject(ALERT_REPOSITORY) private readonly alerts: AlertRepository,
    @Inject(DELIVERY_TARGET_REPOSITORY)
    private readonly targets: DeliveryTargetRepository,
    private readonly fanout: FanoutResolverService,
    private readonly queue: DispatchQueueService,
  ) {}

  /**
   * resolve → 대상 저장 → resolvedAt 기록 → 큐 등록.
   * 대상 저장은 유일키 충돌을 건너뛰므로 중간에 실패한 fan-out 을 다시 돌려도
   * (alert, subscriber, channel) 당 대상은 하나다.
   */
  async startDispatch(alert: Alert, now: Date = new Date()): Promise<DeliveryTarget[]> {
    const resolved = await this.fanout.resolve(alert);
    const inserted = await this.targets.insertMany(resolved);
    await this.alerts.markResolved(alert.id, now);
    this.queue.enqueue(inserted);

    this.logger.log(
      `Alert ${alert.id} (${alert.hazardType} @ ${alert.geographicRegion}) fanned out to ${resolved.length} target(s), ${inserted.length} new`,
    );
    return resolved;
  }
}
