import { classifySmsError, SmsAdapter, type SmsClient } from './sms.adapter.js';
import type { FailureClass } from './types/channel.types.js';
import type { TwilioConfig } from '../settings/types/dispatch-config.types.js';

const twilioConfig: TwilioConfig = {
  accountSid: 'AC-test',
  authToken: 'test-secret',
  fromNumber: '+61400000000',
};

const message = { subject: 'unused', text: 'EMERGENCY WARNING: Bushfire in NSW-BLUE-MOUNTAINS' };

function fakeClient(
  behaviour: (params: { to: string; from: string; body: string }) => Promise<{ sid: string }>,
) {
  const calls: { to: string; from: string; body: string }[] = [];
  const client: SmsClient = {
    messages: {
      create: (params) => {
        calls.push(params);
        return behaviour(params);
      },
    },
  };
  return { client, calls };
}

function twilioError(fields: Record<string, unknown>): Error {
  return Object.assign(new Error('twilio error'), fields);
}

describe('SmsAdapter', () => {
  it('전송 성공 → OK + sid', async () => {
    const { client, calls } = fakeClient(async () => ({ sid: 'SM-1' }));
    const adapter = new SmsAdapter(twilioConfig, client);

    expect(await adapter.send('+61412345678', message)).toEqual({
      kind: 'OK',
      providerMessageId: 'SM-1',
    });
    expect(calls).toEqual([
      { to: '+61412345678', from: '+61400000000', body: message.text },
    ]);
  });

  it('E.164 가 아니면 영구 오류', async () => {
    const { client, calls } = fakeClient(async () => ({ sid: 'SM-1' }));
    const adapter = new SmsAdapter(twilioConfig, client);

    expect((await adapter.send('0412 345 678', message)).kind).toBe('PERMANENT_ERROR');
    expect(calls).toHaveLength(0);
  });

  it('자격 증명이 없으면 일시 오류', async () => {
    const adapter = new SmsAdapter({ ...twilioConfig, accountSid: '', authToken: '' });
    expect(await adapter.send('+61412345678', message)).toEqual({
      kind: 'TRANSIENT_ERROR',
      error: 'Twilio credentials not configured',
    });
    expect(adapter.isAvailable()).toBe(false);
  });

  it('긴 본문은 480자로 자른다', async () => {
    const { client, calls } = fakeClient(async () => ({ sid: 'SM-2' }));
    const adapter = new SmsAdapter(twilioConfig, client);

    await adapter.send('+61412345678', { subject: 's', text: 'x'.repeat(1000) });

    expect(calls[0].body).toHaveLength(480);
    expect(calls[0].body.endsWith('…')).toBe(true);
  });

  it('수신 불가 번호 → 영구, 서버 오류 → 일시', async () => {
    const invalid = new SmsAdapter(
      twilioConfig,
      fakeClient(async () => {
        throw twilioError({ code: 21211, status: 400 });
      }).client,
    );
    const outage = new SmsAdapter(
      twilioConfig,
      fakeClient(async () => {
        throw twilioError({ status: 503 });
      }).client,
    );

    expect((await invalid.send('+61412345678', message)).kind).toBe('PERMANENT_ERROR');
    expect((await outage.send('+61412345678', message)).kind).toBe('TRANSIENT_ERROR');
  });
});

describe('classifySmsError', () => {
  const cases: [Record<string, unknown>, FailureClass][] = [
    [{ code: 21610, status: 400 }, 'PERMANENT'],
    [{ status: 429 }, 'TRANSIENT'],
    [{ status: 408 }, 'TRANSIENT'],
    [{ status: 500 }, 'TRANSIENT'],
    [{ status: 401 }, 'PERMANENT'],
    [{ code: 'ECONNRESET' }, 'TRANSIENT'],
  ];

  it.each(cases)('%o → %s', (fields, expected) => {
    expect(classifySmsError(twilioError(fields))).toBe(expected);
  });
});
