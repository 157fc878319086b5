// 저장소 경계 — 디스패치 코어는 이 인터페이스로만 상태에 접근한다

import type {
  AlertRecord,
  DedupRecord,
  DeliveryTarget,
  DeliveryTargetKey,
  NewSubscriber,
  Subscriber,
  SubscriberPatch,
} from '../types/index.js';

export const ALERT_REPOSITORY = Symbol('ALERT_REPOSITORY');
export const SUBSCRIBER_REPOSITORY = Symbol('SUBSCRIBER_REPOSITORY');
export const DELIVERY_TARGET_REPOSITORY = Symbol('DELIVERY_TARGET_REPOSITORY');
export const DEDUP_STORE = Symbol('DEDUP_STORE');

export interface AlertRepository {
  save(alert: AlertRecord): Promise<void>;
  findById(id: string): Promise<AlertRecord | null>;
  /** 최초 1회만 기록. 이미 철회된 경우 false */
  markWithdrawn(id: string, at: Date): Promise<boolean>;
  markResolved(id: string, at: Date): Promise<void>;
  /** fan-out 이 끝나지 않은 ADMITTED 경보 (철회 제외) */
  findUnresolved(limit: number): Promise<AlertRecord[]>;
  /** cutoff 이전 보고 중 PENDING 대상이 없는 경보와 그 대상을 삭제 */
  purgeReportedBefore(cutoff: Date): Promise<number>;
}

/** 코어가 소비하는 읽기 전용 디렉터리 */
export interface SubscriberDirectory {
  findSubscribers(region: string, hazardType: string): Promise<Subscriber[]>;
}

export interface SubscriberListQuery {
  region?: string;
  limit: number;
  offset: number;
}

export interface SubscriberRepository extends SubscriberDirectory {
  create(input: NewSubscriber): Promise<Subscriber>;
  findById(id: string): Promise<Subscriber | null>;
  update(id: string, patch: SubscriberPatch): Promise<Subscriber | null>;
  list(query: SubscriberListQuery): Promise<Subscriber[]>;
}

export interface DeliveryTargetRepository {
  /** 유일키 충돌은 건너뛰고 실제로 삽입된 대상만 반환 */
  insertMany(targets: DeliveryTarget[]): Promise<DeliveryTarget[]>;
  findByAlert(alertId: string): Promise<DeliveryTarget[]>;
  /** PENDING 이고 lease 가 없으며 nextAttemptAt 이 지난 대상 */
  findDue(now: Date, limit: number): Promise<DeliveryTarget[]>;
  /**
   * lease 획득 (CAS). PENDING 이고 lease 가 비었거나 만료된 경우에만 성공.
   * 성공 시 최신 상태를 반환한다.
   */
  claim(
    key: DeliveryTargetKey,
    owner: string,
    now: Date,
    leaseTimeoutMs: number,
  ): Promise<DeliveryTarget | null>;
  /** lease 보유자만 PENDING 대상을 갱신하고 lease 를 해제한다 (CAS) */
  commit(key: DeliveryTargetKey, owner: string, next: DeliveryTarget): Promise<boolean>;
  /** 전송 중 lease 연장 — 보유자의 PENDING 대상만 lockedAt 갱신 */
  renewLease(key: DeliveryTargetKey, owner: string, now: Date): Promise<boolean>;
  /** lease 가 없는 PENDING 대상을 FAILED 로 전환 */
  cancelPending(alertId: string, reason: string, now: Date): Promise<number>;
  recoverStaleLeases(lockedBefore: Date): Promise<number>;
}

export type DedupClaim =
  | { kind: 'CLAIMED'; record: DedupRecord }
  | { kind: 'EXISTS'; record: DedupRecord };

export interface DedupStore {
  /**
   * 원자적 check-and-set.
   * 만료되지 않은 기록이 있으면 EXISTS, 없으면 (만료 기록을 대체하여) 저장 후 CLAIMED.
   */
  claim(record: DedupRecord, now: Date): Promise<DedupClaim>;
  /** firstAlertId 가 일치할 때만 기록 삭제 (경보 저장 실패 시 claim 반환) */
  release(dedupKey: string, firstAlertId: string): Promise<boolean>;
  /** windowExpiresAt <= now 인 기록 삭제 */
  evictExpired(now: Date): Promise<number>;
}
