// SMS 채널 — Twilio Messages API

import { Logger } from '@nestjs/common';
import twilio from 'twilio';
import type { TwilioConfig } from '../settings/types/dispatch-config.types.js';
import { maskDestination, truncate } from '../common/text-utils.js';
import {
  permanentError,
  readErrorField,
  transientError,
  type ChannelAdapter,
  type ChannelMessage,
  type FailureClass,
  type SendResult,
} from './types/channel.types.js';

export interface SmsClient {
  messages: {
    create(params: { to: string; from: string; body: string }): Promise<{ sid: string }>;
  };
}

/** E.164 — '+' 와 국가 코드 포함 최대 15자리 */
export const E164_PATTERN = /^\+[1-9]\d{7,14}$/;

const SMS_MAX_LENGTH = 480;

const TWILIO_REQUEST_TIMEOUT_MS = 30_000;

// 수신 번호 자체가 문제인 Twilio 오류 코드
const PERMANENT_TWILIO_CODES = new Set([21211, 21214, 21408, 21610, 21612, 21614]);

export function classifySmsError(err: unknown): FailureClass {
  const code = readErrorField(err, 'code');
  if (typeof code === 'number' && PERMANENT_TWILIO_CODES.has(code)) {
    return 'PERMANENT';
  }

  const status = readErrorField(err, 'status');
  if (typeof status === 'number') {
    if (status === 408 || status === 429 || status >= 500) return 'TRANSIENT';
    if (status >= 400) return 'PERMANENT';
  }

  // 네트워크 오류, 타임아웃
  return 'TRANSIENT';
}

function createTwilioClient(config: TwilioConfig): SmsClient | null {
  if (!config.accountSid || !config.authToken) return null;
  return twilio(config.accountSid, config.authToken, {
    timeout: TWILIO_REQUEST_TIMEOUT_MS,
  });
}

export class SmsAdapter implements ChannelAdapter {
  readonly channel = 'SMS' as const;
  readonly name = 'twilio';
  private readonly logger = new Logger(SmsAdapter.name);

  constructor(
    private readonly config: TwilioConfig,
    private readonly client: SmsClient | null = createTwilioClient(config),
  ) {}

  async send(destination: string, message: ChannelMessage): Promise<SendResult> {
    if (!E164_PATTERN.test(destination)) {
      return permanentError('Invalid phone number (E.164 required)');
    }
    if (!this.client) {
      return transientError('Twilio credentials not configured');
    }

    try {
      const result = await this.client.messages.create({
        to: destination,
        from: this.config.fromNumber,
        body: truncate(message.text, SMS_MAX_LENGTH),
      });
      return { kind: 'OK', providerMessageId: result.sid };
    } catch (err) {
      const failure = classifySmsError(err);
      this.logger.warn(
        `Twilio send to ${maskDestination(destination)} failed (${failure}): ${String(err)}`,
      );
      return failure === 'PERMANENT'
        ? permanentError(String(err))
        : transientError(String(err));
    }
  }

  isAvailable(): boolean {
    return this.client !== null && !!this.config.fromNumber;
  }
}
