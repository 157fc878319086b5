import { Global, Logger, Module } from '@nestjs/common';
import { DB, DrizzleModule, type DrizzleDB } from './drizzle.module.js';
import { DispatchConfigService } from '../settings/dispatch-config.service.js';
import {
  ALERT_REPOSITORY,
  DEDUP_STORE,
  DELIVERY_TARGET_REPOSITORY,
  SUBSCRIBER_REPOSITORY,
} from './repositories/repository.types.js';
import { DrizzleAlertRepository } from './repositories/drizzle-alert.repository.js';
import { DrizzleSubscriberRepository } from './repositories/drizzle-subscriber.repository.js';
import { DrizzleDeliveryTargetRepository } from './repositories/drizzle-delivery-target.repository.js';
import { DrizzleDedupStore } from './repositories/drizzle-dedup.store.js';
import { MemoryAlertRepository } from './memory/memory-alert.repository.js';
import { MemorySubscriberRepository } from './memory/memory-subscriber.repository.js';
import { MemoryDeliveryTargetRepository } from './memory/memory-delivery-target.repository.js';
import { MemoryDedupStore } from './memory/memory-dedup.store.js';

const MEMORY_STORAGE = Symbol('MEMORY_STORAGE');

interface MemoryStorage {
  alerts: MemoryAlertRepository;
  subscribers: MemorySubscriberRepository;
  targets: MemoryDeliveryTargetRepository;
  dedup: MemoryDedupStore;
}

function createMemoryStorage(): MemoryStorage {
  const targets = new MemoryDeliveryTargetRepository();
  return {
    alerts: new MemoryAlertRepository(targets),
    subscribers: new MemorySubscriberRepository(),
    targets,
    dedup: new MemoryDedupStore(),
  };
}

function isMemory(config: DispatchConfigService): boolean {
  return config.get().storageDriver === 'memory';
}

// STORAGE_DRIVER=memory 는 단일 프로세스 개발용
@Global()
@Module({
  imports: [DrizzleModule],
  providers: [
    {
      provide: MEMORY_STORAGE,
      inject: [DispatchConfigService],
      useFactory: (config: DispatchConfigService): MemoryStorage | null => {
        if (!isMemory(config)) return null;
        new Logger('StorageModule').warn(
          'STORAGE_DRIVER=memory — state is lost on restart',
        );
        return createMemoryStorage();
      },
    },
    {
      provide: ALERT_REPOSITORY,
      inject: [MEMORY_STORAGE, DB],
      useFactory: (memory: MemoryStorage | null, db: DrizzleDB) =>
        memory?.alerts ?? new DrizzleAlertRepository(db),
    },
    {
      provide: SUBSCRIBER_REPOSITORY,
      inject: [MEMORY_STORAGE, DB],
      useFactory: (memory: MemoryStorage | null, db: DrizzleDB) =>
        memory?.subscribers ?? new DrizzleSubscriberRepository(db),
    },
    {
      provide: DELIVERY_TARGET_REPOSITORY,
      inject: [MEMORY_STORAGE, DB],
      useFactory: (memory: MemoryStorage | null, db: DrizzleDB) =>
        memory?.targets ?? new DrizzleDeliveryTargetRepository(db),
    },
    {
      provide: DEDUP_STORE,
      inject: [MEMORY_STORAGE, DB],
      useFactory: (memory: MemoryStorage | null, db: DrizzleDB) =>
        memory?.dedup ?? new DrizzleDedupStore(db),
    },
  ],
  exports: [
    ALERT_REPOSITORY,
    SUBSCRIBER_REPOSITORY,
    DELIVERY_TARGET_REPOSITORY,
    DEDUP_STORE,
  ],
})
export class StorageModule {}
