import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { BeaconExceptionFilter } from './common/filters/beacon-exception.filter.js';
import { SettingsModule } from './settings/settings.module.js';
import { StorageModule } from './db/storage.module.js';
import { EngineModule } from './engine/engine.module.js';
import { AlertsModule } from './alerts/alerts.module.js';
import { SubscribersModule } from './subscribers/subscribers.module.js';

@Module({
  imports: [
    // 토큰 발급은 외부 — 여기서는 검증만 한다
    JwtModule.register({
      global: true,
      secret: process.env.JWT_SECRET ?? 'dev-secret',
    }),
    SettingsModule,
    StorageModule,
    EngineModule,
    AlertsModule,
    SubscribersModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: BeaconExceptionFilter,
    },
  ],
})
export class AppModule {}
