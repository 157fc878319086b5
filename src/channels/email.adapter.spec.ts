import type { SendMailOptions } from 'nodemailer';
import {
  classifyEmailError,
  EmailAdapter,
  type MailTransport,
} from './email.adapter.js';
import type { FailureClass } from './types/channel.types.js';
import type { SmtpConfig } from '../settings/types/dispatch-config.types.js';

const smtp: SmtpConfig = {
  host: 'smtp.test.local',
  port: 587,
  secure: false,
  user: 'beacon',
  pass: 'test-secret',
  from: 'Beacon <alerts@test.local>',
};

const message = { subject: '[Warning] Bushfire', text: 'Leave now', html: '<p>Leave now</p>' };

class FakeTransport implements MailTransport {
  readonly calls: SendMailOptions[] = [];
  constructor(
    private readonly behaviour: () => Promise<{ messageId?: string; rejected?: unknown[] }>,
  ) {}

  sendMail(options: SendMailOptions) {
    this.calls.push(options);
    return this.behaviour();
  }
}

function smtpError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('EmailAdapter', () => {
  it('전송 성공 → OK + messageId', async () => {
    const transport = new FakeTransport(async () => ({ messageId: '<m-1@test>', rejected: [] }));
    const adapter = new EmailAdapter(smtp, transport);

    const result = await adapter.send('resident@example.com', message);

    expect(result).toEqual({ kind: 'OK', providerMessageId: '<m-1@test>' });
    expect(transport.calls[0]).toMatchObject({
      from: smtp.from,
      to: 'resident@example.com',
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
  });

  it('형식이 잘못된 주소는 보내지 않고 영구 오류', async () => {
    const transport = new FakeTransport(async () => ({}));
    const adapter = new EmailAdapter(smtp, transport);

    expect(await adapter.send('not-an-email', message)).toEqual({
      kind: 'PERMANENT_ERROR',
      error: 'Invalid email address',
    });
    expect(transport.calls).toHaveLength(0);
  });

  it('수신자 거부 → 영구 오류', async () => {
    const adapter = new EmailAdapter(
      smtp,
      new FakeTransport(async () => ({ rejected: ['resident@example.com'] })),
    );
    expect(await adapter.send('resident@example.com', message)).toEqual({
      kind: 'PERMANENT_ERROR',
      error: 'Recipient rejected by SMTP server',
    });
  });

  it('연결 오류 → 일시 오류', async () => {
    const adapter = new EmailAdapter(
      smtp,
      new FakeTransport(async () => {
        throw smtpError('connect ECONNREFUSED', { code: 'ECONNECTION' });
      }),
    );
    expect(await adapter.send('resident@example.com', message)).toEqual({
      kind: 'TRANSIENT_ERROR',
      error: 'Error: connect ECONNREFUSED',
    });
  });

  it('SMTP 5xx → 영구 오류', async () => {
    const adapter = new EmailAdapter(
      smtp,
      new FakeTransport(async () => {
        throw smtpError('550 mailbox unavailable', { responseCode: 550 });
      }),
    );
    const result = await adapter.send('resident@example.com', message);
    expect(result.kind).toBe('PERMANENT_ERROR');
  });

  it('isAvailable 은 host 설정 여부', () => {
    const transport = new FakeTransport(async () => ({}));
    expect(new EmailAdapter(smtp, transport).isAvailable()).toBe(true);
    expect(new EmailAdapter({ ...smtp, host: '' }, transport).isAvailable()).toBe(false);
  });
});

describe('classifyEmailError', () => {
  const cases: [Record<string, unknown>, FailureClass][] = [
    [{ code: 'EENVELOPE' }, 'PERMANENT'],
    [{ code: 'EAUTH' }, 'PERMANENT'],
    [{ code: 'ETIMEDOUT' }, 'TRANSIENT'],
    [{ responseCode: 554 }, 'PERMANENT'],
    [{ responseCode: 421 }, 'TRANSIENT'],
    [{ responseCode: 451 }, 'TRANSIENT'],
  ];

  it.each(cases)('%o → %s', (fields, expected) => {
    expect(classifyEmailError(smtpError('smtp', fields))).toBe(expected);
  });

  it('객체가 아닌 오류는 일시 오류', () => {
    expect(classifyEmailError('boom')).toBe('TRANSIENT');
    expect(classifyEmailError(null)).toBe('TRANSIENT');
  });
});
