import type { AlertRecord } from '../types/index.js';
import type { AlertRepository } from '../repositories/repository.types.js';
import type { MemoryDeliveryTargetRepository } from './memory-delivery-target.repository.js';

/** 단일 프로세스용 저장소 — 개발 모드와 테스트에서 사용 */
export class MemoryAlertRepository implements AlertRepository {
  private readonly alerts = new Map<string, AlertRecord>();

  constructor(private readonly targets?: MemoryDeliveryTargetRepository) {}

  async save(alert: AlertRecord): Promise<void> {
    this.alerts.set(alert.id, { ...alert });
  }

  async findById(id: string): Promise<AlertRecord | null> {
    const found = this.alerts.get(id);
    return found ? { ...found } : null;
  }

  async markWithdrawn(id: string, at: Date): Promise<boolean> {
    const found = this.alerts.get(id);
    if (!found || found.withdrawnAt) return false;
    found.withdrawnAt = at;
    return true;
  }

  async markResolved(id: string, at: Date): Promise<void> {
    const found = this.alerts.get(id);
    if (found && !found.resolvedAt) found.resolvedAt = at;
  }

  async findUnresolved(limit: number): Promise<AlertRecord[]> {
    return [...this.alerts.values()]
      .filter((a) => a.status === 'ADMITTED' && !a.resolvedAt && !a.withdrawnAt)
      .sort((a, b) => a.reportedAt.getTime() - b.reportedAt.getTime())
      .slice(0, limit)
      .map((a) => ({ ...a }));
  }

  async purgeReportedBefore(cutoff: Date): Promise<number> {
    let purged = 0;
    for (const alert of [...this.alerts.values()]) {
      if (alert.reportedAt.getTime() >= cutoff.getTime()) continue;
      if (this.targets?.hasPending(alert.id)) continue;
      this.targets?.deleteByAlert(alert.id);
      this.alerts.delete(alert.id);
      purged++;
    }
    return purged;
  }
}
