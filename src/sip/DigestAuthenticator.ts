import crypto from 'crypto';
import { StatusCode } from '../constants';
import { splitHeaderList, unquote } from './headers';
import { SipError, SipErrorCode } from './SipError';
import type { SipMessage } from './SipMessage';

export interface DigestChallenge {
  realm: string;
  nonce: string;
  algorithm: string;
  qop?: string[];
  opaque?: string;
  stale?: boolean;
}

export interface DigestCredentialsInput {
  method: string;
  uri: string;
  username: string;
  password: string;
  nonceCount: number;
  cnonce?: string;
}

export interface AuthorizationHeader {
  name: 'Authorization' | 'Proxy-Authorization';
  value: string;
}

const HASHES: Record<string, 'md5' | 'sha256'> = {
  MD5: 'md5',
  'MD5-SESS': 'md5',
  'SHA-256': 'sha256',
  'SHA-256-SESS': 'sha256',
};

const hash = (algorithm: 'md5' | 'sha256', input: string): string =>
  crypto.createHash(algorithm).update(input).digest('hex');

export const formatNonceCount = (nonceCount: number): string => nonceCount.toString(16).padStart(8, '0');

export const parseChallenge = (headerValue: string): DigestChallenge => {
  const trimmed = headerValue.trim();
  const space = trimmed.indexOf(' ');
  const scheme = space === -1 ? trimmed : trimmed.slice(0, space);
  if (scheme.toLowerCase() !== 'digest') {
    throw new SipError(SipErrorCode.UNSUPPORTED_CHALLENGE, `Unsupported authentication scheme ${scheme}`);
  }

  const fields: Record<string, string> = {};
  for (const part of splitHeaderList(trimmed.slice(space + 1))) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    fields[part.slice(0, eq).trim().toLowerCase()] = unquote(part.slice(eq + 1));
  }

  if (fields.realm === undefined || !fields.nonce) {
    throw new SipError(SipErrorCode.UNSUPPORTED_CHALLENGE, 'Digest challenge without realm or nonce');
  }

  return {
    realm: fields.realm,
    nonce: fields.nonce,
    algorithm: fields.algorithm ?? 'MD5',
    qop: fields.qop ? fields.qop.split(',').map(q => q.trim().toLowerCase()).filter(Boolean) : undefined,
    opaque: fields.opaque,
    stale: fields.stale ? fields.stale.toLowerCase() === 'true' : undefined,
  };
};

/**
 * Builds the value of an Authorization / Proxy-Authorization header for the
 * given challenge. Supports MD5 and SHA-256 (plain and -sess) with qop
 * absent or "auth".
 */
export const computeCredentials = (challenge: DigestChallenge, input: DigestCredentialsInput): string => {
  const algorithmName = challenge.algorithm.toUpperCase();
  const algorithm = HASHES[algorithmName];
  if (!algorithm) {
    throw new SipError(SipErrorCode.UNSUPPORTED_CHALLENGE, `Unsupported digest algorithm ${challenge.algorithm}`);
  }

  let qop: 'auth' | undefined;
  if (challenge.qop?.length) {
    if (!challenge.qop.includes('auth')) {
      throw new SipError(SipErrorCode.UNSUPPORTED_CHALLENGE, `Unsupported qop ${challenge.qop.join(',')}`);
    }
    qop = 'auth';
  }

  const cnonce = input.cnonce ?? crypto.randomBytes(8).toString('hex');
  const nc = formatNonceCount(input.nonceCount);

  let ha1 = hash(algorithm, `${input.username}:${challenge.realm}:${input.password}`);
  if (algorithmName.endsWith('-SESS')) {
    ha1 = hash(algorithm, `${ha1}:${challenge.nonce}:${cnonce}`);
  }
  const ha2 = hash(algorithm, `${input.method}:${input.uri}`);
  const response = qop
    ? hash(algorithm, `${ha1}:${challenge.nonce}:${nc}:${cnonce}:${qop}:${ha2}`)
    : hash(algorithm, `${ha1}:${challenge.nonce}:${ha2}`);

  const parts = [
    `username="${input.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${input.uri}"`,
    `response="${response}"`,
    `algorithm=${challenge.algorithm}`,
  ];
  if (challenge.opaque !== undefined) parts.push(`opaque="${challenge.opaque}"`);
  if (qop) parts.push(`qop=${qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);

  return `Digest ${parts.join(', ')}`;
};

/**
 * Holds the last challenge and nonce-count for one account or dialog. The
 * nonce-count restarts at 1 for every new nonce and increments on reuse.
 */
export class DigestAuthenticator {
  private challenge?: DigestChallenge;
  private proxy = false;
  private nonceCount = 0;

  constructor(
    private readonly username: string,
    private readonly password: string,
    private readonly cnonceFactory?: () => string
  ) {}

  public get lastNonceCount(): number {
    return this.nonceCount;
  }

  public get currentNonce(): string | undefined {
    return this.challenge?.nonce;
  }

  public hasChallenge(): boolean {
    return this.challenge !== undefined;
  }

  /** Records the challenge carried by a 401/407 response. */
  public acceptChallenge(response: SipMessage): void {
    const status = response.getStatusCode();
    const proxy = status === StatusCode.PROXY_AUTH_REQUIRED;
    const header = response.getFirstHeader(proxy ? 'Proxy-Authenticate' : 'WWW-Authenticate');
    if (!header) {
      throw new SipError(SipErrorCode.UNSUPPORTED_CHALLENGE, `${status} response without a challenge header`);
    }
    const challenge = parseChallenge(header);
    if (challenge.nonce !== this.challenge?.nonce) {
      this.nonceCount = 0;
    }
    this.challenge = challenge;
    this.proxy = proxy;
  }

  public authorize(method: string, uri: string): AuthorizationHeader {
    if (!this.challenge) {
      throw new SipError(SipErrorCode.AUTHENTICATION_FAILED, 'No challenge to answer');
    }
    this.nonceCount += 1;
    const value = computeCredentials(this.challenge, {
      method,
      uri,
      username: this.username,
      password: this.password,
      nonceCount: this.nonceCount,
      cnonce: this.cnonceFactory?.(),
    });
    return { name: this.proxy ? 'Proxy-Authorization' : 'Authorization', value };
  }

  public reset(): void {
    this.challenge = undefined;
    this.nonceCount = 0;
  }
}
