import {
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { CHANNEL, DELIVERY_STATUS } from '../types/index.js';
import { alerts } from './alerts.js';
import { subscribers } from './subscribers.js';

export const deliveryTargets = pgTable(
  'delivery_targets',
  {
    alertId: uuid('alert_id')
      .notNull()
      .references(() => alerts.id, { onDelete: 'cascade' }),
    subscriberId: uuid('subscriber_id')
      .notNull()
      .references(() => subscribers.id),
    channel: text('channel', { enum: CHANNEL }).notNull(),
    destination: text('destination').notNull(),
    status: text('status', { enum: DELIVERY_STATUS })
      .notNull()
      .default('PENDING'),
    attemptCount: integer('attempt_count').notNull().default(0),
    nextAttemptAt: timestamp('next_attempt_at', { withTimezone: true }),
    lastError: text('last_error'),
    sentAt: timestamp('sent_at', { withTimezone: true }),

    // 워커 간 단일 전송 보장용 lease
    lockOwner: text('lock_owner'),
    lockedAt: timestamp('locked_at', { withTimezone: true }),

    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    primaryKey({
      columns: [table.alertId, table.subscriberId, table.channel],
    }),
    index('delivery_targets_due_idx').on(table.status, table.nextAttemptAt),
  ],
);
