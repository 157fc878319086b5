import { Inject, Injectable } from '@nestjs/common';
import { and, asc, eq, isNull, lt, lte, or } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { deliveryTargets } from '../schema/index.js';
import type { DeliveryTarget, DeliveryTargetKey } from '../types/index.js';
import type { DeliveryTargetRepository } from './repository.types.js';

type TargetRow = typeof deliveryTargets.$inferSelect;

function toTarget(row: TargetRow): DeliveryTarget {
  return {
    alertId: row.alertId,
    subscriberId: row.subscriberId,
    channel: row.channel,
    destination: row.destination,
    status: row.status,
    attemptCount: row.attemptCount,
    nextAttemptAt: row.nextAttemptAt,
    lastError: row.lastError,
    sentAt: row.sentAt,
  };
}

function byKey(key: DeliveryTargetKey) {
  return and(
    eq(deliveryTargets.alertId, key.alertId),
    eq(deliveryTargets.subscriberId, key.subscriberId),
    eq(deliveryTargets.channel, key.channel),
  );
}

@Injectable()
export class DrizzleDeliveryTargetRepository implements DeliveryTargetRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async insertMany(targets: DeliveryTarget[]): Promise<DeliveryTarget[]> {
    if (targets.length === 0) return [];
    const rows = await this.db
      .insert(deliveryTargets)
      .values(targets)
      .onConflictDoNothing()
      .returning();
    return rows.map(toTarget);
  }

  async findByAlert(alertId: string): Promise<DeliveryTarget[]> {
    const rows = await this.db
      .select()
      .from(deliveryTargets)
      .where(eq(deliveryTargets.alertId, alertId))
      .orderBy(asc(deliveryTargets.subscriberId), asc(deliveryTargets.channel));
    return rows.map(toTarget);
  }

  async findDue(now: Date, limit: number): Promise<DeliveryTarget[]> {
    const rows = await this.db
      .select()
      .from(deliveryTargets)
      .where(
        and(
          eq(deliveryTargets.status, 'PENDING'),
          isNull(deliveryTargets.lockOwner),
          or(
            isNull(deliveryTargets.nextAttemptAt),
            lte(deliveryTargets.nextAttemptAt, now),
          ),
        ),
      )
      .orderBy(asc(deliveryTargets.createdAt))
      .limit(limit);
    return rows.map(toTarget);
  }

  async claim(
    key: DeliveryTargetKey,
    owner: string,
    now: Date,
    leaseTimeoutMs: number,
  ): Promise<DeliveryTarget | null> {
    // lease 획득 (FOR UPDATE SKIP LOCKED 대신 조건부 UPDATE)
    const [row] = await this.db
      .update(deliveryTargets)
      .set({ lockOwner: owner, lockedAt: now })
      .where(
        and(
          byKey(key),
          eq(deliveryTargets.status, 'PENDING'),
          or(
            isNull(deliveryTargets.lockedAt),
            lt(deliveryTargets.lockedAt, new Date(now.getTime() - leaseTimeoutMs)),
          ),
        ),
      )
      .returning();
    return row ? toTarget(row) : null;
  }

  async commit(
    key: DeliveryTargetKey,
    owner: string,
    next: DeliveryTarget,
  ): Promise<boolean> {
    const updated = await this.db
      .update(deliveryTargets)
      .set({
        status: next.status,
        attemptCount: next.attemptCount,
        nextAttemptAt: next.nextAttemptAt,
        lastError: next.lastError,
        sentAt: next.sentAt,
        lockOwner: null,
        lockedAt: null,
        updatedAt: new Date(),
      })
      .where(
        and(
          byKey(key),
          eq(deliveryTargets.status, 'PENDING'),
          eq(deliveryTargets.lockOwner, owner),
        ),
      )
      .returning({ alertId: deliveryTargets.alertId });
    return updated.length > 0;
  }

  async renewLease(
    key: DeliveryTargetKey,
    owner: string,
    now: Date,
  ): Promise<boolean> {
    const updated = await this.db
      .update(deliveryTargets)
      .set({ lockedAt: now })
      .where(
        and(
          byKey(key),
          eq(deliveryTargets.status, 'PENDING'),
          eq(deliveryTargets.lockOwner, owner),
        ),
      )
      .returning({ alertId: deliveryTargets.alertId });
    return updated.length > 0;
  }

  async cancelPending(alertId: string, reason: string, now: Date): Promise<number> {
    const updated = await this.db
      .update(deliveryTargets)
      .set({
        status: 'FAILED',
        lastError: reason,
        nextAttemptAt: null,
        updatedAt: now,
      })
      .where(
        and(
          eq(deliveryTargets.alertId, alertId),
          eq(deliveryTargets.status, 'PENDING'),
          isNull(deliveryTargets.lockOwner),
        ),
      )
      .returning({ alertId: deliveryTargets.alertId });
    return updated.length;
  }

  async recoverStaleLeases(lockedBefore: Date): Promise<number> {
    const updated = await this.db
      .update(deliveryTargets)
      .set({ lockOwner: null, lockedAt: null })
      .where(lt(deliveryTargets.lockedAt, lockedBefore))
      .returning({ alertId: deliveryTargets.alertId });
    return updated.length;
  }
}
