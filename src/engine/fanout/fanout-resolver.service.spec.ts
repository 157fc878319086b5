import { FanoutResolverService } from './fanout-resolver.service.js';
import { MemorySubscriberRepository } from '../../db/memory/memory-subscriber.repository.js';
import { DirectoryUnavailableError } from '../../common/errors/beacon-errors.js';
import type { SubscriberDirectory } from '../../db/repositories/repository.types.js';
import { makeAlert, makeSubscriber } from '../../testing/fixtures.js';

describe('FanoutResolverService', () => {
  const alert = makeAlert();

  it('구독자 3명 (email, email+sms, sms) → 대상 4개', async () => {
    const repo = new MemorySubscriberRepository();
    const a = await repo.create(makeSubscriber({ email: 'a@example.com' }));
    const b = await repo.create(
      makeSubscriber({ email: 'b@example.com', phone: '+61400000002', smsOptIn: true }),
    );
    const c = await repo.create(
      makeSubscriber({ email: null, emailOptIn: false, phone: '+61400000003', smsOptIn: true }),
    );

    const targets = await new FanoutResolverService(repo).resolve(alert);

    expect(targets).toHaveLength(4);
    const keys = targets.map((t) => `${t.subscriberId}/${t.channel}`).sort();
    expect(keys).toEqual(
      [`${a.id}/EMAIL`, `${b.id}/EMAIL`, `${b.id}/SMS`, `${c.id}/SMS`].sort(),
    );
    for (const t of targets) {
      expect(t).toMatchObject({
        alertId: alert.id,
        status: 'PENDING',
        attemptCount: 0,
        nextAttemptAt: null,
      });
    }
  });

  it('같은 입력이면 같은 결과', async () => {
    const repo = new MemorySubscriberRepository();
    await repo.create(makeSubscriber({ phone: '+61400000001', smsOptIn: true }));
    await repo.create(makeSubscriber({ email: 'x@example.com' }));
    const resolver = new FanoutResolverService(repo);

    expect(await resolver.resolve(alert)).toEqual(await resolver.resolve(alert));
  });

  it('opt-out, 연락처 없음, 비활성, 다른 지역, 다른 위험 유형은 제외', async () => {
    const repo = new MemorySubscriberRepository();
    await repo.create(makeSubscriber({ emailOptIn: false }));
    await repo.create(makeSubscriber({ smsOptIn: true, phone: null, emailOptIn: false }));
    await repo.create(makeSubscriber({ active: false }));
    await repo.create(makeSubscriber({ regions: ['VIC-GIPPSLAND'] }));
    await repo.create(makeSubscriber({ hazardTypes: ['flood'] }));
    const wanted = await repo.create(makeSubscriber({ hazardTypes: ['bushfire'] }));

    const targets = await new FanoutResolverService(repo).resolve(alert);

    expect(targets.map((t) => t.subscriberId)).toEqual([wanted.id]);
  });

  it('구독자가 없으면 빈 목록', async () => {
    const targets = await new FanoutResolverService(new MemorySubscriberRepository()).resolve(alert);
    expect(targets).toEqual([]);
  });

  it('디렉터리 장애 → DirectoryUnavailable, 부분 결과 없음', async () => {
    const broken: SubscriberDirectory = {
      findSubscribers: async () => {
        throw new Error('connection refused');
      },
    };

    await expect(new FanoutResolverService(broken).resolve(alert)).rejects.toThrow(
      DirectoryUnavailableError,
    );
  });
});
