import { pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

export const dedupRecords = pgTable('dedup_records', {
  dedupKey: text('dedup_key').primaryKey(),
  firstAlertId: uuid('first_alert_id').notNull(),
  windowExpiresAt: timestamp('window_expires_at', {
    withTimezone: true,
  }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true })
    .defaultNow()
    .notNull(),
});
