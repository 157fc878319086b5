import { Module, type OnModuleInit } from '@nestjs/common';
import { DispatchConfigService } from '../settings/dispatch-config.service.js';
import { ChannelRegistryService } from './channel-registry.service.js';
import { MessageBuilderService } from './message-builder.service.js';
import { EmailAdapter } from './email.adapter.js';
import { SmsAdapter } from './sms.adapter.js';
import { MockChannelAdapter } from './mock.adapter.js';

@Module({
  providers: [ChannelRegistryService, MessageBuilderService],
  exports: [ChannelRegistryService, MessageBuilderService],
})
export class ChannelsModule implements OnModuleInit {
  constructor(
    private readonly registry: ChannelRegistryService,
    private readonly configService: DispatchConfigService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();

    if (config.channelDriver === 'mock') {
      this.registry.register(new MockChannelAdapter('EMAIL'));
      this.registry.register(new MockChannelAdapter('SMS'));
      return;
    }

    this.registry.register(new EmailAdapter(config.smtp));
    this.registry.register(new SmsAdapter(config.twilio));
  }
}
