import { Module } from '@nestjs/common';
import { ChannelsModule } from '../channels/channels.module.js';
import { EventIntakeService } from './intake/event-intake.service.js';
import { DeduplicatorService } from './dedup/deduplicator.service.js';
import { FanoutResolverService } from './fanout/fanout-resolver.service.js';
import {
  DeliveryDispatcherService,
  RANDOM_SOURCE,
} from './dispatch/delivery-dispatcher.service.js';
import { DispatchQueueService } from './dispatch/dispatch-queue.service.js';
import { AlertDispatchService } from './dispatch/alert-dispatch.service.js';
import { DispatchWorkerService } from './dispatch/dispatch-worker.service.js';
import { SCHEDULER, SystemScheduler } from './dispatch/scheduler.js';

const providers = [
  // Layer 1 — 보고 수신
  EventIntakeService,
  DeduplicatorService,
  // Layer 2 — 대상 확장
  FanoutResolverService,
  // Layer 3 — 전송
  DeliveryDispatcherService,
  DispatchQueueService,
  AlertDispatchService,
  // Layer 4 — 백그라운드
  DispatchWorkerService,
];

@Module({
  imports: [ChannelsModule],
  providers: [
    ...providers,
    { provide: SCHEDULER, useClass: SystemScheduler },
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
  exports: providers,
})
export class EngineModule {}
