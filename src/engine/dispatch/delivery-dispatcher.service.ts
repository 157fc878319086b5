// Delivery Dispatcher — 대상 하나를 어댑터로 1회 전송하고 다음 상태를 계산

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Alert, DeliveryTarget } from '../../db/types/index.js';
import { ChannelRegistryService } from '../../channels/channel-registry.service.js';
import { MessageBuilderService } from '../../channels/message-builder.service.js';
import {
  transientError,
  type SendResult,
} from '../../channels/types/channel.types.js';
import { maskDestination } from '../../common/text-utils.js';
import { DispatchConfigService } from '../../settings/dispatch-config.service.js';
import {
  applySendResult,
  isTerminal,
  TerminalTargetError,
  type Transition,
} from './delivery-state.js';

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export type RandomSource = () => number;

@Injectable()
export class DeliveryDispatcherService {
  private readonly logger = new Logger(DeliveryDispatcherService.name);

  constructor(
    private readonly registry: ChannelRegistryService,
    private readonly messageBuilder: MessageBuilderService,
    private readonly configService: DispatchConfigService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  async dispatch(
    target: DeliveryTarget,
    alert: Alert,
    now: Date = new Date(),
  ): Promise<Transition> {
    if (isTerminal(target)) throw new TerminalTargetError(target);

    const result = await this.send(target, alert);
    const transition = applySendResult(
      target,
      result,
      now,
      this.configService.get().retry,
      this.random,
    );

    const label = `${target.channel} ${maskDestination(target.destination)} (alert=${target.alertId})`;
    const { outcome, next } = transition;
    switch (outcome.kind) {
      case 'SENT':
        this.logger.log(`Delivered ${label}`);
        break;
      case 'RETRY':
        this.logger.warn(
          `Transient failure ${label}, attempt ${next.attemptCount}, retry at ${outcome.after.toISOString()}: ${next.lastError ?? 'unknown error'}`,
        );
        break;
      case 'EXHAUSTED':
        this.logger.error(
          `Gave up on ${label} after ${next.attemptCount} attempt(s): ${outcome.reason}`,
        );
        break;
    }
    return transition;
  }

  // 어댑터 예외(조회 실패 포함)는 일시 오류로 취급
  private async send(target: DeliveryTarget, alert: Alert): Promise<SendResult> {
    try {
      const adapter = this.registry.get(target.channel);
      const message = this.messageBuilder.build(alert, target.channel);
      return await adapter.send(target.destination, message);
    } catch (err) {
      return transientError(err instanceof Error ? err.message : String(err));
    }
  }
}
