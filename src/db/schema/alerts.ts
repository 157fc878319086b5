import {
  doublePrecision,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { ALERT_STATUS, SEVERITY } from '../types/index.js';

export const alerts = pgTable(
  'alerts',
  {
    id: uuid('id').primaryKey(),
    hazardType: text('hazard_type').notNull(),
    geographicRegion: text('geographic_region').notNull(),
    severity: text('severity', { enum: SEVERITY }).notNull(),
    reportedAt: timestamp('reported_at', { withTimezone: true }).notNull(),
    dedupKey: text('dedup_key').notNull(),
    source: text('source').notNull(),
    latitude: doublePrecision('latitude'),
    longitude: doublePrecision('longitude'),
    description: text('description'),

    // 수명주기 — 보고 내용과 분리
    status: text('status', { enum: ALERT_STATUS }).notNull(),
    duplicateOf: uuid('duplicate_of'),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
    withdrawnAt: timestamp('withdrawn_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    index('alerts_dedup_key_idx').on(table.dedupKey),
    index('alerts_status_resolved_idx').on(table.status, table.resolvedAt),
    index('alerts_reported_at_idx').on(table.reportedAt),
  ],
);
