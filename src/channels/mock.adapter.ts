// Mock 채널 — 실제 공급자 없이 전송을 로그로 남긴다 (CHANNEL_DRIVER=mock)

import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Channel } from '../db/types/index.js';
import { maskDestination } from '../common/text-utils.js';
import type {
  ChannelAdapter,
  ChannelMessage,
  SendResult,
} from './types/channel.types.js';

export class MockChannelAdapter implements ChannelAdapter {
  readonly name = 'mock';
  private readonly logger = new Logger(MockChannelAdapter.name);

  constructor(readonly channel: Channel) {}

  async send(destination: string, message: ChannelMessage): Promise<SendResult> {
    this.logger.log(
      `[${this.channel}] → ${maskDestination(destination)}: ${message.subject}`,
    );
    return { kind: 'OK', providerMessageId: `mock-${randomUUID()}` };
  }

  isAvailable(): boolean {
    return true;
  }
}
