// 채널 어댑터 레지스트리 — 채널별 전송 전략 관리

import { Injectable, Logger } from '@nestjs/common';
import type { Channel } from '../db/types/index.js';
import type { ChannelAdapter } from './types/channel.types.js';

@Injectable()
export class ChannelRegistryService {
  private readonly logger = new Logger(ChannelRegistryService.name);
  private readonly adapters = new Map<Channel, ChannelAdapter>();

  register(adapter: ChannelAdapter): void {
    this.adapters.set(adapter.channel, adapter);
    this.logger.log(
      `Registered ${adapter.channel} adapter: ${adapter.name} (available: ${adapter.isAvailable()})`,
    );
  }

  get(channel: Channel): ChannelAdapter {
    const adapter = this.adapters.get(channel);
    if (!adapter) {
      throw new Error(`No adapter registered for channel "${channel}"`);
    }
    return adapter;
  }
}
