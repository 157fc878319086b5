import { randomUUID } from 'crypto';
import type {
  NewSubscriber,
  Subscriber,
  SubscriberPatch,
} from '../types/index.js';
import type {
  SubscriberListQuery,
  SubscriberRepository,
} from '../repositories/repository.types.js';

function copy(s: Subscriber): Subscriber {
  return { ...s, regions: [...s.regions], hazardTypes: [...s.hazardTypes] };
}

export class MemorySubscriberRepository implements SubscriberRepository {
  private readonly subscribers = new Map<string, Subscriber>();

  async create(input: NewSubscriber): Promise<Subscriber> {
    const now = new Date();
    const created: Subscriber = {
      ...input,
      regions: [...input.regions],
      hazardTypes: [...input.hazardTypes],
      id: randomUUID(),
      createdAt: now,
      updatedAt: now,
    };
    this.subscribers.set(created.id, created);
    return copy(created);
  }

  async findById(id: string): Promise<Subscriber | null> {
    const found = this.subscribers.get(id);
    return found ? copy(found) : null;
  }

  async update(id: string, patch: SubscriberPatch): Promise<Subscriber | null> {
    const found = this.subscribers.get(id);
    if (!found) return null;
    const updated: Subscriber = { ...found, ...patch, updatedAt: new Date() };
    this.subscribers.set(id, updated);
    return copy(updated);
  }

  async list(query: SubscriberListQuery): Promise<Subscriber[]> {
    const { region } = query;
    return [...this.subscribers.values()]
      .filter((s) => region === undefined || s.regions.includes(region))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(query.offset, query.offset + query.limit)
      .map(copy);
  }

  async findSubscribers(region: string, hazardType: string): Promise<Subscriber[]> {
    return [...this.subscribers.values()]
      .filter(
        (s) =>
          s.active &&
          s.regions.includes(region) &&
          (s.hazardTypes.length === 0 || s.hazardTypes.includes(hazardType)),
      )
      .map(copy);
  }
}
