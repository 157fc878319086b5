import type { Channel, DeliveryStatus } from './enums.js';

/** (alertId, subscriberId, channel) 하나의 전달 의무 */
export interface DeliveryTarget {
  alertId: string;
  subscriberId: string;
  channel: Channel;
  /** fan-out 시점의 연락처 스냅샷 */
  destination: string;
  status: DeliveryStatus;
  attemptCount: number;
  nextAttemptAt: Date | null;
  lastError: string | null;
  sentAt: Date | null;
}

export interface DeliveryTargetKey {
  alertId: string;
  subscriberId: string;
  channel: Channel;
}

export function targetKeyOf(key: DeliveryTargetKey): string {
  return `${key.alertId}:${key.subscriberId}:${key.channel}`;
}
