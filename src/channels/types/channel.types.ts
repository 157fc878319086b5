// 채널 어댑터 공통 인터페이스 — 공급자별 오류는 TRANSIENT / PERMANENT 로만 드러난다

import type { Channel } from '../../db/types/index.js';

export interface ChannelMessage {
  subject: string;
  text: string;
  html?: string;
}

export type SendResult =
  | { kind: 'OK'; providerMessageId: string | null }
  | { kind: 'TRANSIENT_ERROR'; error: string }
  | { kind: 'PERMANENT_ERROR'; error: string };

export type FailureClass = 'TRANSIENT' | 'PERMANENT';

export interface ChannelAdapter {
  readonly channel: Channel;
  readonly name: string;
  send(destination: string, message: ChannelMessage): Promise<SendResult>;
  isAvailable(): boolean;
}

export function transientError(error: string): SendResult {
  return { kind: 'TRANSIENT_ERROR', error };
}

export function permanentError(error: string): SendResult {
  return { kind: 'PERMANENT_ERROR', error };
}

/** 오류 객체에서 숫자 status / code 필드를 안전하게 읽는다 */
export function readErrorField(err: unknown, field: string): unknown {
  if (err === null || typeof err !== 'object') return undefined;
  const value: unknown = Reflect.get(err, field);
  return value;
}
