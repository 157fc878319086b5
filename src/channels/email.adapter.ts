// 이메일 채널 — nodemailer SMTP 전송

import { Logger } from '@nestjs/common';
import { createTransport, type SendMailOptions } from 'nodemailer';
import { z } from 'zod';
import type { SmtpConfig } from '../settings/types/dispatch-config.types.js';
import { maskDestination } from '../common/text-utils.js';
import {
  permanentError,
  readErrorField,
  transientError,
  type ChannelAdapter,
  type ChannelMessage,
  type FailureClass,
  type SendResult,
} from './types/channel.types.js';

export interface MailTransport {
  sendMail(
    options: SendMailOptions,
  ): Promise<{ messageId?: string; rejected?: unknown[] }>;
}

const EmailSchema = z.string().email();

// SMTP 단계별 대기 상한
const SMTP_CONNECTION_TIMEOUT_MS = 10_000;
const SMTP_GREETING_TIMEOUT_MS = 10_000;
const SMTP_SOCKET_TIMEOUT_MS = 30_000;

// nodemailer 오류 code 분류
const PERMANENT_CODES = new Set(['EENVELOPE', 'EMESSAGE', 'EAUTH']);

export function classifyEmailError(err: unknown): FailureClass {
  const code = readErrorField(err, 'code');
  if (typeof code === 'string' && PERMANENT_CODES.has(code)) return 'PERMANENT';

  // SMTP 응답 코드: 5xx 영구 거부, 4xx 일시 오류
  const responseCode = readErrorField(err, 'responseCode');
  if (typeof responseCode === 'number') {
    if (responseCode >= 500 && responseCode < 600) return 'PERMANENT';
    return 'TRANSIENT';
  }

  // ECONNECTION, ETIMEDOUT, ESOCKET, 기타 → 재시도
  return 'TRANSIENT';
}

export class EmailAdapter implements ChannelAdapter {
  readonly channel = 'EMAIL' as const;
  readonly name = 'smtp';
  private readonly logger = new Logger(EmailAdapter.name);

  constructor(
    private readonly config: SmtpConfig,
    private readonly transport: MailTransport = createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user ? { user: config.user, pass: config.pass } : undefined,
      connectionTimeout: SMTP_CONNECTION_TIMEOUT_MS,
      greetingTimeout: SMTP_GREETING_TIMEOUT_MS,
      socketTimeout: SMTP_SOCKET_TIMEOUT_MS,
    }),
  ) {}

  async send(destination: string, message: ChannelMessage): Promise<SendResult> {
    if (!EmailSchema.safeParse(destination).success) {
      return permanentError(`Invalid email address`);
    }

    try {
      const info = await this.transport.sendMail({
        from: this.config.from,
        to: destination,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
      if (info.rejected && info.rejected.length > 0) {
        return permanentError('Recipient rejected by SMTP server');
      }
      return {
        kind: 'OK',
        providerMessageId: info.messageId ?? null,
      };
    } catch (err) {
      const failure = classifyEmailError(err);
      this.logger.warn(
        `SMTP send to ${maskDestination(destination)} failed (${failure}): ${String(err)}`,
      );
      return failure === 'PERMANENT'
        ? permanentError(String(err))
        : transientError(String(err));
    }
  }

  isAvailable(): boolean {
    return !!this.config.host;
  }
}
