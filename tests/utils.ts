import { EventEmitter } from 'events';
import { vi } from 'vitest';
import { Config } from '../src/configurations';
import type { Logger } from '../src/logging/Logger';
import { SipMessage } from '../src/sip/SipMessage';
import type { UserAgentSettings } from '../src/sip/RequestFactory';
import type { SignalingSocket } from '../src/transport/TransportSession';

export const createTestConfig = (overrides: Partial<Config> = {}): Config =>
  Object.assign(new Config(), {
    SIP_DEFAULT_DOMAIN: 'example.com',
    SIP_WS_URL: 'wss://sip.example.com/ws',
    SIP_USER_AGENT: 'test-agent/1.0',
    SIP_REGISTER_EXPIRES: 3600,
    SIP_RETRANSMIT: false,
    SIP_TRANSACTION_TIMEOUT_MS: 32000,
    SIP_INVITE_PROCEEDING_TIMEOUT_MS: 180000,
    SIP_CALL_GRACE_MS: 30000,
    SIP_DTMF_GAP_MS: 150,
    SIP_DTMF_DEFAULT_DURATION_MS: 160,
    SIP_KEEPALIVE_INTERVAL_MS: 30000,
    SIP_KEEPALIVE_GRACE_MS: 10000,
    SIP_RECONNECT_INITIAL_MS: 2000,
    SIP_RECONNECT_MAX_MS: 30000,
    SIP_RECONNECT_FACTOR: 2,
    SIP_RECONNECT_MAX_ATTEMPTS: 0,
    SIP_ACCOUNTS: [],
    HTTP_PORT: 18080,
    HTTP_CORS_ORIGINS: [],
    ...overrides,
  });

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const testSettings: UserAgentSettings = {
  userAgent: 'test-agent/1.0',
  viaHost: 'client.invalid',
  transport: 'WSS',
};

/** Collects everything a component hands to the wire. */
export class WireRecorder {
  public readonly sent: SipMessage[] = [];

  public readonly send = (message: SipMessage): void => {
    this.sent.push(message);
  };

  public last(): SipMessage {
    const message = this.sent[this.sent.length - 1];
    if (!message) throw new Error('nothing was sent');
    return message;
  }

  public requests(method: string): SipMessage[] {
    return this.sent.filter(message => message.getMethod() === method);
  }

  public responses(status: number): SipMessage[] {
    return this.sent.filter(message => message.getStatusCode() === status);
  }
}

export interface ReplyOptions {
  toTag?: string;
  headers?: Array<[string, string]>;
  body?: string;
}

/** Builds the response a server would send for `request`. */
export const replyTo = (request: SipMessage, status: number, reason: string, options: ReplyOptions = {}): SipMessage => {
  let to = request.getFirstHeader('To') ?? '';
  if (options.toTag && !request.getToTag()) to = `${to};tag=${options.toTag}`;
  return SipMessage.parse(
    SipMessage.response({
      status,
      reason,
      headers: [
        ['Via', request.getHeader('Via')],
        ['From', request.getFirstHeader('From') ?? ''],
        ['To', to],
        ['Call-ID', request.getCallId() ?? ''],
        ['CSeq', request.getFirstHeader('CSeq') ?? ''],
        ...(options.headers ?? []),
      ],
      body: options.body ?? '',
    }).build()
  );
};

export class FakeSocket extends EventEmitter implements SignalingSocket {
  public readyState = 0;
  public readonly sent: string[] = [];
  public pings = 0;
  public closed = false;
  public terminated = false;

  constructor(
    public readonly url: string,
    public readonly protocol: string
  ) {
    super();
  }

  public send(data: string, callback?: (error?: Error) => void): void {
    this.sent.push(data);
    callback?.();
  }

  public ping(): void {
    this.pings += 1;
  }

  public close(): void {
    this.closed = true;
    this.readyState = 3;
  }

  public terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }

  public open(): void {
    this.readyState = 1;
    this.emit('open');
  }

  public receive(text: string): void {
    this.emit('message', Buffer.from(text, 'utf8'), false);
  }

  public drop(code = 1006): void {
    this.readyState = 3;
    this.emit('close', code, Buffer.alloc(0));
  }
}

export const SAMPLE_SDP = [
  'v=0',
  'o=- 1000 1 IN IP4 192.0.2.10',
  's=-',
  'c=IN IP4 192.0.2.10',
  't=0 0',
  'm=audio 40000 RTP/AVP 0 101',
  'a=rtpmap:0 PCMU/8000',
  'a=rtpmap:101 telephone-event/8000',
  'a=sendrecv',
  '',
].join('\r\n');
