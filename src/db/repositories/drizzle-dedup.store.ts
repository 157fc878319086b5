import { Inject, Injectable } from '@nestjs/common';
import { and, eq, lte } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { dedupRecords } from '../schema/index.js';
import type { DedupRecord } from '../types/index.js';
import type { DedupClaim, DedupStore } from './repository.types.js';

const MAX_CLAIM_ROUNDS = 3;

@Injectable()
export class DrizzleDedupStore implements DedupStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async claim(record: DedupRecord, now: Date): Promise<DedupClaim> {
    for (let round = 0; round < MAX_CLAIM_ROUNDS; round++) {
      // 만료된 기록만 덮어쓴다 — 살아 있는 기록과 충돌하면 아무 행도 반환되지 않는다
      const [claimed] = await this.db
        .insert(dedupRecords)
        .values({
          dedupKey: record.dedupKey,
          firstAlertId: record.firstAlertId,
          windowExpiresAt: record.windowExpiresAt,
          createdAt: now,
        })
        .onConflictDoUpdate({
          target: dedupRecords.dedupKey,
          set: {
            firstAlertId: record.firstAlertId,
            windowExpiresAt: record.windowExpiresAt,
            createdAt: now,
          },
          setWhere: lte(dedupRecords.windowExpiresAt, now),
        })
        .returning();
      if (claimed) {
        return { kind: 'CLAIMED', record: toRecord(claimed) };
      }

      const [existing] = await this.db
        .select()
        .from(dedupRecords)
        .where(eq(dedupRecords.dedupKey, record.dedupKey))
        .limit(1);
      if (existing) {
        return { kind: 'EXISTS', record: toRecord(existing) };
      }
      // 조회 사이에 sweep 으로 삭제됨 → 다시 시도
    }
    throw new Error(`Dedup claim did not settle for key ${record.dedupKey}`);
  }

  async release(dedupKey: string, firstAlertId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(dedupRecords)
      .where(
        and(
          eq(dedupRecords.dedupKey, dedupKey),
          eq(dedupRecords.firstAlertId, firstAlertId),
        ),
      )
      .returning({ dedupKey: dedupRecords.dedupKey });
    return deleted.length > 0;
  }

  async evictExpired(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(dedupRecords)
      .where(lte(dedupRecords.windowExpiresAt, now))
      .returning({ dedupKey: dedupRecords.dedupKey });
    return deleted.length;
  }
}

function toRecord(row: typeof dedupRecords.$inferSelect): DedupRecord {
  return {
    dedupKey: row.dedupKey,
    firstAlertId: row.firstAlertId,
    windowExpiresAt: row.windowExpiresAt,
  };
}
