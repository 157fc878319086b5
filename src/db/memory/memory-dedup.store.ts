import type { DedupRecord } from '../types/index.js';
import type { DedupClaim, DedupStore } from '../repositories/repository.types.js';

/**
 * 프로세스 내 dedup 저장소.
 * claim 은 await 없이 조회와 기록을 끝내므로 동시 호출에도 한 건만 CLAIMED 를 받는다.
 */
export class MemoryDedupStore implements DedupStore {
  private readonly records = new Map<string, DedupRecord>();

  async claim(record: DedupRecord, now: Date): Promise<DedupClaim> {
    const existing = this.records.get(record.dedupKey);
    if (existing && existing.windowExpiresAt.getTime() > now.getTime()) {
      return { kind: 'EXISTS', record: { ...existing } };
    }
    this.records.set(record.dedupKey, { ...record });
    return { kind: 'CLAIMED', record: { ...record } };
  }

  async release(dedupKey: string, firstAlertId: string): Promise<boolean> {
    const existing = this.records.get(dedupKey);
    if (!existing || existing.firstAlertId !== firstAlertId) return false;
    this.records.delete(dedupKey);
    return true;
  }

  async evictExpired(now: Date): Promise<number> {
    let evicted = 0;
    for (const [key, record] of this.records) {
      if (record.windowExpiresAt.getTime() <= now.getTime()) {
        this.records.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  size(): number {
    return this.records.size;
  }
}
