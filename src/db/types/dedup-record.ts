export interface DedupRecord {
  dedupKey: string;
  firstAlertId: string;
  windowExpiresAt: Date;
}
