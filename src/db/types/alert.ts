import type { AlertStatus, Severity } from './enums.js';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** Intake가 만든 정규화된 경보 — 생성 이후 변경되지 않는다 */
export interface Alert {
  readonly id: string;
  readonly hazardType: string;
  readonly geographicRegion: string;
  readonly severity: Severity;
  readonly reportedAt: Date;
  readonly dedupKey: string;
  readonly source: string;
  readonly location: GeoPoint | null;
  readonly description: string | null;
}

/** 저장된 경보 — 보고 내용 + 수명주기 컬럼 */
export interface AlertRecord extends Alert {
  status: AlertStatus;
  duplicateOf: string | null;
  resolvedAt: Date | null;
  withdrawnAt: Date | null;
  createdAt: Date;
}
