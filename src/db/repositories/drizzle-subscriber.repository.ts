import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, arrayContains, asc, eq, or, sql } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../drizzle.module.js';
import { subscribers } from '../schema/index.js';
import type {
  NewSubscriber,
  Subscriber,
  SubscriberPatch,
} from '../types/index.js';
import { DirectoryUnavailableError } from '../../common/errors/beacon-errors.js';
import type {
  SubscriberListQuery,
  SubscriberRepository,
} from './repository.types.js';

type SubscriberRow = typeof subscribers.$inferSelect;

function toSubscriber(row: SubscriberRow): Subscriber {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    emailOptIn: row.emailOptIn,
    phone: row.phone,
    smsOptIn: row.smsOptIn,
    regions: row.regions,
    hazardTypes: row.hazardTypes,
    active: row.active,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

@Injectable()
export class DrizzleSubscriberRepository implements SubscriberRepository {
  private readonly logger = new Logger(DrizzleSubscriberRepository.name);

  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findSubscribers(region: string, hazardType: string): Promise<Subscriber[]> {
    try {
      const rows = await this.db
        .select()
        .from(subscribers)
        .where(
          and(
            eq(subscribers.active, true),
            arrayContains(subscribers.regions, [region]),
            or(
              sql`cardinality(${subscribers.hazardTypes}) = 0`,
              arrayContains(subscribers.hazardTypes, [hazardType]),
            ),
          ),
        )
        .orderBy(asc(subscribers.id));
      return rows.map(toSubscriber);
    } catch (err) {
      this.logger.error(`Directory lookup failed (region=${region})`, err);
      throw new DirectoryUnavailableError('Subscriber directory unavailable', {
        region,
        hazardType,
        cause: String(err),
      });
    }
  }

  async create(input: NewSubscriber): Promise<Subscriber> {
    const [row] = await this.db.insert(subscribers).values(input).returning();
    return toSubscriber(row);
  }

  async findById(id: string): Promise<Subscriber | null> {
    const [row] = await this.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, id))
      .limit(1);
    return row ? toSubscriber(row) : null;
  }

  async update(id: string, patch: SubscriberPatch): Promise<Subscriber | null> {
    const [row] = await this.db
      .update(subscribers)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(subscribers.id, id))
      .returning();
    return row ? toSubscriber(row) : null;
  }

  async list(query: SubscriberListQuery): Promise<Subscriber[]> {
    const rows = await this.db
      .select()
      .from(subscribers)
      .where(
        query.region !== undefined
          ? arrayContains(subscribers.regions, [query.region])
          : undefined,
      )
      .orderBy(asc(subscribers.createdAt))
      .limit(query.limit)
      .offset(query.offset);
    return rows.map(toSubscriber);
  }
}
