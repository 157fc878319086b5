// Fan-out Resolver — Alert 하나를 (구독자 × 채널) 전달 대상으로 확장

import { Inject, Injectable } from '@nestjs/common';
import type {
  Alert,
  Channel,
  DeliveryTarget,
  Subscriber,
} from '../../db/types/index.js';
import {
  SUBSCRIBER_REPOSITORY,
  type SubscriberDirectory,
} from '../../db/repositories/repository.types.js';
import {
  BeaconError,
  DirectoryUnavailableError,
} from '../../common/errors/beacon-errors.js';

/** 구독자의 채널별 연락처 — opt-in 이 꺼져 있거나 연락처가 없으면 null */
function destinationFor(subscriber: Subscriber, channel: Channel): string | null {
  switch (channel) {
    case 'EMAIL':
      return subscriber.emailOptIn && subscriber.email ? subscriber.email : null;
    case 'SMS':
      return subscriber.smsOptIn && subscriber.phone ? subscriber.phone : null;
  }
}

const CHANNEL_ORDER: readonly Channel[] = ['EMAIL', 'SMS'];

@Injectable()
export class FanoutResolverService {
  constructor(
    @Inject(SUBSCRIBER_REPOSITORY)
    private readonly directory: SubscriberDirectory,
  ) {}

  async resolve(alert: Alert): Promise<DeliveryTarget[]> {
    let subscribers: Subscriber[];
    try {
      subscribers = await this.directory.findSubscribers(
        alert.geographicRegion,
        alert.hazardType,
      );
    } catch (err) {
      // 일부만 읽힌 구독자 집합으로 보내지 않는다 — resolve 전체 실패
      if (err instanceof DirectoryUnavailableError) throw err;
      throw new DirectoryUnavailableError('Subscriber directory unavailable', {
        alertId: alert.id,
        cause: err instanceof BeaconError ? err.code : String(err),
      });
    }

    const targets: DeliveryTarget[] = [];
    const seen = new Set<string>();
    for (const subscriber of subscribers) {
      if (!subscriber.active || seen.has(subscriber.id)) continue;
      seen.add(subscriber.id);
      for (const channel of CHANNEL_ORDER) {
        const destination = destinationFor(subscriber, channel);
        if (!destination) continue;
        targets.push({
          alertId: alert.id,
          subscriberId: subscriber.id,
          channel,
          destination,
          status: 'PENDING',
          attemptCount: 0,
          nextAttemptAt: null,
          lastError: null,
          sentAt: null,
        });
      }
    }

    return targets.sort(
      (a, b) =>
        a.subscriberId.localeCompare(b.subscriberId) ||
        CHANNEL_ORDER.indexOf(a.channel) - CHANNEL_ORDER.indexOf(b.channel),
    );
  }
}
