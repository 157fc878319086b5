import { sql } from 'drizzle-orm';
import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

export const subscribers = pgTable(
  'subscribers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: text('name'),
    email: text('email'),
    emailOptIn: boolean('email_opt_in').notNull().default(false),
    phone: text('phone'),
    smsOptIn: boolean('sms_opt_in').notNull().default(false),
    regions: text('regions')
      .array()
      .notNull()
      .default(sql`'{}'::text[]`),
    hazardTypes: text('hazard_types')
      .array()
      .notNull()
      .default(sql`'{}'::text[]`),
    active: boolean('active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    index('subscribers_regions_idx').using('gin', table.regions),
  ],
);
