import crypto from 'crypto';
import { ALLOWED_METHODS, MAX_FORWARDS, Protocol, SipMethod, type ProtocolType, reasonPhrase } from '../constants';
import { SipMessage, generateBranch, type HeaderEntries } from './SipMessage';

export interface UserAgentSettings {
  userAgent: string;
  /** Via / Contact host; WebSocket clients have no reachable address of their own. */
  viaHost: string;
  transport: ProtocolType;
}

export const createUserAgentSettings = (wsUrl: string, userAgent: string): UserAgentSettings => ({
  userAgent,
  viaHost: `${crypto.randomBytes(6).toString('hex')}.invalid`,
  transport: wsUrl.toLowerCase().startsWith('wss:') ? Protocol.WSS : Protocol.WS,
});

export const buildVia = (settings: UserAgentSettings, branch = generateBranch()): string =>
  `SIP/2.0/${settings.transport} ${settings.viaHost};branch=${branch}`;

export const buildContactUri = (user: string, settings: UserAgentSettings): string =>
  `sip:${user}@${settings.viaHost};transport=ws`;

export interface RequestParts {
  method: string;
  uri: string;
  from: string;
  to: string;
  callId: string;
  cseq: number;
  routes?: string[];
  contact?: string;
  extraHeaders?: HeaderEntries;
  body?: string;
  contentType?: string;
}

/** Builds a request with a fresh Via branch. */
export const buildRequest = (settings: UserAgentSettings, parts: RequestParts): SipMessage => {
  const headers: HeaderEntries = [
    ['Via', buildVia(settings)],
    ['Route', parts.routes ?? []],
    ['Max-Forwards', MAX_FORWARDS],
    ['From', parts.from],
    ['To', parts.to],
    ['Call-ID', parts.callId],
    ['CSeq', `${parts.cseq} ${parts.method}`],
  ];
  if (parts.contact) headers.push(['Contact', parts.contact]);
  headers.push(['User-Agent', settings.userAgent]);
  if (parts.method !== SipMethod.ACK && parts.method !== SipMethod.CANCEL) headers.push(['Allow', ALLOWED_METHODS]);
  headers.push(...(parts.extraHeaders ?? []));
  if (parts.body && parts.contentType) headers.push(['Content-Type', parts.contentType]);

  return SipMessage.request({ method: parts.method, uri: parts.uri, headers, body: parts.body ?? '' });
};

export interface ResponseOptions {
  toTag?: string;
  contact?: string;
  extraHeaders?: HeaderEntries;
  body?: string;
  contentType?: string;
  reason?: string;
}

/** Mirrors Via, From, To, Call-ID and CSeq of `request`, adding a To tag when given. */
export const buildResponse = (
  settings: UserAgentSettings,
  request: SipMessage,
  status: number,
  options: ResponseOptions = {}
): SipMessage => {
  let to = request.getFirstHeader('To') ?? '';
  if (options.toTag && !request.getToTag()) to = `${to};tag=${options.toTag}`;

  const headers: HeaderEntries = [
    ['Via', request.getHeader('Via')],
    ['Record-Route', request.getHeader('Record-Route')],
    ['From', request.getFirstHeader('From') ?? ''],
    ['To', to],
    ['Call-ID', request.getCallId() ?? ''],
    ['CSeq', request.getFirstHeader('CSeq') ?? ''],
  ];
  if (options.contact) headers.push(['Contact', options.contact]);
  headers.push(['User-Agent', settings.userAgent]);
  headers.push(...(options.extraHeaders ?? []));
  if (options.body && options.contentType) headers.push(['Content-Type', options.contentType]);

  return SipMessage.response({
    status,
    reason: options.reason ?? reasonPhrase(status),
    headers,
    body: options.body ?? '',
  });
};
