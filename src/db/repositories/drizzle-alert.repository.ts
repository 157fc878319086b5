import { Inject, Injectable } from '@nestjs/common';
import { and, asc, eq, isNull, lt, notExists, sql } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { alerts, deliveryTargets } from '../schema/index.js';
import type { AlertRecord } from '../types/index.js';
import type { AlertRepository } from './repository.types.js';

type AlertRow = typeof alerts.$inferSelect;

function toRecord(row: AlertRow): AlertRecord {
  return {
    id: row.id,
    hazardType: row.hazardType,
    geographicRegion: row.geographicRegion,
    severity: row.severity,
    reportedAt: row.reportedAt,
    dedupKey: row.dedupKey,
    source: row.source,
    location:
      row.latitude !== null && row.longitude !== null
        ? { latitude: row.latitude, longitude: row.longitude }
        : null,
    description: row.description,
    status: row.status,
    duplicateOf: row.duplicateOf,
    resolvedAt: row.resolvedAt,
    withdrawnAt: row.withdrawnAt,
    createdAt: row.createdAt,
  };
}

@Injectable()
export class DrizzleAlertRepository implements AlertRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async save(alert: AlertRecord): Promise<void> {
    await this.db.insert(alerts).values({
      id: alert.id,
      hazardType: alert.hazardType,
      geographicRegion: alert.geographicRegion,
      severity: alert.severity,
      reportedAt: alert.reportedAt,
      dedupKey: alert.dedupKey,
      source: alert.source,
      latitude: alert.location?.latitude ?? null,
      longitude: alert.location?.longitude ?? null,
      description: alert.description,
      status: alert.status,
      duplicateOf: alert.duplicateOf,
      resolvedAt: alert.resolvedAt,
      withdrawnAt: alert.withdrawnAt,
      createdAt: alert.createdAt,
    });
  }

  async findById(id: string): Promise<AlertRecord | null> {
    const [row] = await this.db
      .select()
      .from(alerts)
      .where(eq(alerts.id, id))
      .limit(1);
    return row ? toRecord(row) : null;
  }

  async markWithdrawn(id: string, at: Date): Promise<boolean> {
    const updated = await this.db
      .update(alerts)
      .set({ withdrawnAt: at })
      .where(and(eq(alerts.id, id), isNull(alerts.withdrawnAt)))
      .returning({ id: alerts.id });
    return updated.length > 0;
  }

  async markResolved(id: string, at: Date): Promise<void> {
    await this.db
      .update(alerts)
      .set({ resolvedAt: at })
      .where(and(eq(alerts.id, id), isNull(alerts.resolvedAt)));
  }

  async findUnresolved(limit: number): Promise<AlertRecord[]> {
    const rows = await this.db
      .select()
      .from(alerts)
      .where(
        and(
          eq(alerts.status, 'ADMITTED'),
          isNull(alerts.resolvedAt),
          isNull(alerts.withdrawnAt),
        ),
      )
      .orderBy(asc(alerts.reportedAt))
      .limit(limit);
    return rows.map(toRecord);
  }

  async purgeReportedBefore(cutoff: Date): Promise<number> {
    // delivery_targets 는 ON DELETE CASCADE
    const deleted = await this.db
      .delete(alerts)
      .where(
        and(
          lt(alerts.reportedAt, cutoff),
          notExists(
            this.db
              .select({ one: sql`1` })
              .from(deliveryTargets)
              .where(
                and(
                  eq(deliveryTargets.alertId, alerts.id),
                  eq(deliveryTargets.status, 'PENDING'),
                ),
              ),
          ),
        ),
      )
      .returning({ id: alerts.id });
    return deleted.length;
  }
}
