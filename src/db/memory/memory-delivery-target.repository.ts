import {
  targetKeyOf,
  type DeliveryTarget,
  type DeliveryTargetKey,
} from '../types/index.js';
import type { DeliveryTargetRepository } from '../repositories/repository.types.js';

interface StoredTarget {
  target: DeliveryTarget;
  lockOwner: string | null;
  lockedAt: Date | null;
}

function copy(target: DeliveryTarget): DeliveryTarget {
  return { ...target };
}

export class MemoryDeliveryTargetRepository implements DeliveryTargetRepository {
  private readonly rows = new Map<string, StoredTarget>();

  async insertMany(targets: DeliveryTarget[]): Promise<DeliveryTarget[]> {
    const inserted: DeliveryTarget[] = [];
    for (const target of targets) {
      const key = targetKeyOf(target);
      if (this.rows.has(key)) continue;
      this.rows.set(key, { target: copy(target), lockOwner: null, lockedAt: null });
      inserted.push(copy(target));
    }
    return inserted;
  }

  async findByAlert(alertId: string): Promise<DeliveryTarget[]> {
    return [...this.rows.values()]
      .filter((r) => r.target.alertId === alertId)
      .map((r) => copy(r.target));
  }

  async findDue(now: Date, limit: number): Promise<DeliveryTarget[]> {
    return [...this.rows.values()]
      .filter(
        (r) =>
          r.target.status === 'PENDING' &&
          r.lockOwner === null &&
          (r.target.nextAttemptAt === null ||
            r.target.nextAttemptAt.getTime() <= now.getTime()),
      )
      .slice(0, limit)
      .map((r) => copy(r.target));
  }

  async claim(
    key: DeliveryTargetKey,
    owner: string,
    now: Date,
    leaseTimeoutMs: number,
  ): Promise<DeliveryTarget | null> {
    const row = this.rows.get(targetKeyOf(key));
    if (!row || row.target.status !== 'PENDING') return null;
    const leaseLive =
      row.lockedAt !== null &&
      now.getTime() - row.lockedAt.getTime() < leaseTimeoutMs;
    if (row.lockOwner !== null && leaseLive) return null;
    row.lockOwner = owner;
    row.lockedAt = now;
    return copy(row.target);
  }

  async commit(
    key: DeliveryTargetKey,
    owner: string,
    next: DeliveryTarget,
  ): Promise<boolean> {
    const row = this.rows.get(targetKeyOf(key));
    if (!row || row.target.status !== 'PENDING' || row.lockOwner !== owner) {
      return false;
    }
    row.target = copy(next);
    row.lockOwner = null;
    row.lockedAt = null;
    return true;
  }

  async renewLease(
    key: DeliveryTargetKey,
    owner: string,
    now: Date,
  ): Promise<boolean> {
    const row = this.rows.get(targetKeyOf(key));
    if (!row || row.target.status !== 'PENDING' || row.lockOwner !== owner) {
      return false;
    }
    row.lockedAt = now;
    return true;
  }

  async cancelPending(alertId: string, reason: string, _now: Date): Promise<number> {
    let cancelled = 0;
    for (const row of this.rows.values()) {
      if (row.target.alertId !== alertId) continue;
      if (row.target.status !== 'PENDING' || row.lockOwner !== null) continue;
      row.target = {
        ...row.target,
        status: 'FAILED',
        lastError: reason,
        nextAttemptAt: null,
      };
      cancelled++;
    }
    return cancelled;
  }

  async recoverStaleLeases(lockedBefore: Date): Promise<number> {
    let recovered = 0;
    for (const row of this.rows.values()) {
      if (row.lockedAt && row.lockedAt.getTime() < lockedBefore.getTime()) {
        row.lockOwner = null;
        row.lockedAt = null;
        recovered++;
      }
    }
    return recovered;
  }

  hasPending(alertId: string): boolean {
    for (const row of this.rows.values()) {
      if (row.target.alertId === alertId && row.target.status === 'PENDING') {
        return true;
      }
    }
    return false;
  }

  deleteByAlert(alertId: string): void {
    for (const [key, row] of this.rows) {
      if (row.target.alertId === alertId) this.rows.delete(key);
    }
  }
}
