import { Global, Module } from '@nestjs/common';
import { DispatchConfigService } from './dispatch-config.service.js';
import { SettingsController } from './settings.controller.js';

@Global()
@Module({
  controllers: [SettingsController],
  providers: [DispatchConfigService],
  exports: [DispatchConfigService],
})
export class SettingsModule {}
