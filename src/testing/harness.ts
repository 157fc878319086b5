import { MemoryAlertRepository } from '../db/memory/memory-alert.repository.js';
import { MemoryDedupStore } from '../db/memory/memory-dedup.store.js';
import { MemoryDeliveryTargetRepository } from '../db/memory/memory-delivery-target.repository.js';
import { MemorySubscriberRepository } from '../db/memory/memory-subscriber.repository.js';
import type { SubscriberDirectory } from '../db/repositories/repository.types.js';
import { ChannelRegistryService } from '../channels/channel-registry.service.js';
import { MessageBuilderService } from '../channels/message-builder.service.js';
import { EventIntakeService } from '../engine/intake/event-intake.service.js';
import { DeduplicatorService } from '../engine/dedup/deduplicator.service.js';
import { FanoutResolverService } from '../engine/fanout/fanout-resolver.service.js';
import { DeliveryDispatcherService } from '../engine/dispatch/delivery-dispatcher.service.js';
import { DispatchQueueService } from '../engine/dispatch/dispatch-queue.service.js';
import { AlertDispatchService } from '../engine/dispatch/alert-dispatch.service.js';
import { DispatchWorkerService } from '../engine/dispatch/dispatch-worker.service.js';
import { AlertsService } from '../alerts/alerts.service.js';
import { makeConfig, ScriptedAdapter } from './fixtures.js';
import { ManualScheduler } from './manual-scheduler.js';

/** 메모리 저장소 + 수동 시계 + 스크립트 어댑터로 엔진 전체를 조립 */
export function buildEngine(
  options: {
    directory?: (subscribers: MemorySubscriberRepository) => SubscriberDirectory;
  } = {},
) {
  const scheduler = new ManualScheduler();
  const config = makeConfig();
  const targets = new MemoryDeliveryTargetRepository();
  const alerts = new MemoryAlertRepository(targets);
  const subscribers = new MemorySubscriberRepository();
  const dedupStore = new MemoryDedupStore();

  const email = new ScriptedAdapter('EMAIL');
  const sms = new ScriptedAdapter('SMS');
  const registry = new ChannelRegistryService();
  registry.register(email);
  registry.register(sms);

  const deduplicator = new DeduplicatorService(dedupStore, config);
  const fanout = new FanoutResolverService(
    options.directory ? options.directory(subscribers) : subscribers,
  );
  const dispatcher = new DeliveryDispatcherService(
    registry,
    new MessageBuilderService(),
    config,
    () => 0,
  );
  const queue = new DispatchQueueService(alerts, targets, dispatcher, config, scheduler);
  const alertDispatch = new AlertDispatchService(alerts, targets, fanout, queue);
  const worker = new DispatchWorkerService(
    alerts,
    targets,
    alertDispatch,
    queue,
    deduplicator,
    config,
  );
  const alertsService = new AlertsService(
    alerts,
    targets,
    new EventIntakeService(config),
    deduplicator,
    alertDispatch,
    queue,
  );

  return {
    scheduler,
    config,
    targets,
    alerts,
    subscribers,
    dedupStore,
    email,
    sms,
    queue,
    worker,
    alertsService,
    /** scheduler 시각을 Date 로 */
    now: () => new Date(scheduler.now()),
  };
}

export type Engine = ReturnType<typeof buildEngine>;
