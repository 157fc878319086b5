// Deduplicator — dedup key 당 first-writer-wins 승인

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Alert } from '../../db/types/index.js';
import {
  DEDUP_STORE,
  type DedupStore,
} from '../../db/repositories/repository.types.js';
import { DispatchConfigService } from '../../settings/dispatch-config.service.js';

export type AdmitResult =
  | { kind: 'ADMITTED' }
  | { kind: 'DUPLICATE'; of: string };

@Injectable()
export class DeduplicatorService {
  private readonly logger = new Logger(DeduplicatorService.name);

  constructor(
    @Inject(DEDUP_STORE) private readonly store: DedupStore,
    private readonly configService: DispatchConfigService,
  ) {}

  async admit(alert: Alert, now: Date = new Date()): Promise<AdmitResult> {
    const windowMs = this.configService.get().dedupWindowMs;
    const claim = await this.store.claim(
      {
        dedupKey: alert.dedupKey,
        firstAlertId: alert.id,
        windowExpiresAt: new Date(now.getTime() + windowMs),
      },
      now,
    );

    if (claim.kind === 'CLAIMED' && claim.record.firstAlertId === alert.id) {
      return { kind: 'ADMITTED' };
    }

    this.logger.debug(
      `Duplicate report ${alert.id} suppressed (first=${claim.record.firstAlertId})`,
    );
    return { kind: 'DUPLICATE', of: claim.record.firstAlertId };
  }

  /** 승인한 경보를 저장하지 못했을 때 claim 반환 — 다음 보고가 다시 승인될 수 있게 한다 */
  async release(alert: Alert): Promise<void> {
    const released = await this.store.release(alert.dedupKey, alert.id);
    if (released) {
      this.logger.warn(`Released dedup claim of unsaved alert ${alert.id}`);
    }
  }

  /** 만료 기록 정리 — claim 도 만료 여부를 조건으로 하므로 경쟁해도 이중 승인이 없다 */
  async sweep(now: Date = new Date()): Promise<number> {
    const evicted = await this.store.evictExpired(now);
    if (evicted > 0) {
      this.logger.debug(`Evicted ${evicted} expired dedup records`);
    }
    return evicted;
  }
}
