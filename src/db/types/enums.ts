// 도메인 Enum 정의

export const SEVERITY = ['low', 'moderate', 'high', 'extreme'] as const;
export type Severity = (typeof SEVERITY)[number];

export const CHANNEL = ['EMAIL', 'SMS'] as const;
export type Channel = (typeof CHANNEL)[number];

export const DELIVERY_STATUS = ['PENDING', 'SENT', 'FAILED', 'EXHAUSTED'] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUS)[number];

/** 더 이상 전이하지 않는 상태 */
export const TERMINAL_DELIVERY_STATUS: readonly DeliveryStatus[] = [
  'SENT',
  'FAILED',
  'EXHAUSTED',
];

export const ALERT_STATUS = ['ADMITTED', 'DUPLICATE'] as const;
export type AlertStatus = (typeof ALERT_STATUS)[number];

export const STORAGE_DRIVER = ['postgres', 'memory'] as const;
export type StorageDriver = (typeof STORAGE_DRIVER)[number];

export const CHANNEL_DRIVER = ['mock', 'live'] as const;
export type ChannelDriver = (typeof CHANNEL_DRIVER)[number];
