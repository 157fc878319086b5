import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Subscriber } from '../db/types/index.js';
import {
  SUBSCRIBER_REPOSITORY,
  type SubscriberRepository,
} from '../db/repositories/repository.types.js';
import {
  InvalidInputError,
  NotFoundError,
} from '../common/errors/beacon-errors.js';
import { maskDestination } from '../common/text-utils.js';
import type {
  CreateSubscriberBody,
  ListSubscribersQuery,
  UpdateSubscriberBody,
} from './dto/subscriber.dto.js';

/** 수신 채널을 켰으면 그 채널의 연락처가 있어야 한다 */
function assertContactable(s: Pick<Subscriber, 'email' | 'emailOptIn' | 'phone' | 'smsOptIn'>): void {
  const issues: string[] = [];
  if (s.emailOptIn && !s.email) issues.push('email: required when emailOptIn is true');
  if (s.smsOptIn && !s.phone) issues.push('phone: required when smsOptIn is true');
  if (issues.length > 0) {
    throw new InvalidInputError('Validation failed', { issues });
  }
}

@Injectable()
export class SubscribersService {
  private readonly logger = new Logger(SubscribersService.name);

  constructor(
    @Inject(SUBSCRIBER_REPOSITORY)
    private readonly subscribers: SubscriberRepository,
  ) {}

  async create(body: CreateSubscriberBody): Promise<Subscriber> {
    assertContactable(body);
    const created = await this.subscribers.create(body);
    this.logger.log(
      `Subscriber ${created.id} created (email=${created.email ? maskDestination(created.email) : '-'}, regions=${created.regions.join(',')})`,
    );
    return created;
  }

  async get(id: string): Promise<Subscriber> {
    const found = await this.subscribers.findById(id);
    if (!found) throw new NotFoundError(`Subscriber ${id} not found`);
    return found;
  }

  async update(id: string, patch: UpdateSubscriberBody): Promise<Subscriber> {
    const current = await this.get(id);
    assertContactable({ ...current, ...patch });
    const updated = await this.subscribers.update(id, patch);
    if (!updated) throw new NotFoundError(`Subscriber ${id} not found`);
    return updated;
  }

  async list(query: ListSubscribersQuery): Promise<Subscriber[]> {
    return this.subscribers.list(query);
  }
}
