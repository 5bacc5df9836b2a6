import dotenv from 'dotenv';
import type { LogLevel } from '../logging/Logger';

dotenv.config();

export interface AccountCredentials {
  username: string;
  password: string;
  domain: string;
  displayName?: string;
  authUsername?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find(level => level === value?.toLowerCase()) ?? 'info';

const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);

// user:password@domain, the domain part is optional
export const parseAccounts = (value: string | undefined, defaultDomain: string): AccountCredentials[] =>
  parseList(value).flatMap(entry => {
    const at = entry.lastIndexOf('@');
    const credentials = at === -1 ? entry : entry.slice(0, at);
    const domain = at === -1 ? defaultDomain : entry.slice(at + 1);
    const colon = credentials.indexOf(':');
    if (colon <= 0 || !domain) return [];
    return [{ username: credentials.slice(0, colon), password: credentials.slice(colon + 1), domain }];
  });

export class Config {
  public readonly SIP_DEFAULT_DOMAIN: string = process.env.SIP_DEFAULT_DOMAIN || '';
  public readonly SIP_WS_URL: string = process.env.SIP_WS_URL || 'wss://127.0.0.1:8089/ws';
  public readonly SIP_USER_AGENT: string = process.env.SIP_USER_AGENT || 'sip-ws-engine/1.0';
  public readonly SIP_REGISTER_EXPIRES: number = Number(process.env.SIP_REGISTER_EXPIRES) || 3600;

  public readonly SIP_KEEPALIVE_INTERVAL_MS: number = Number(process.env.SIP_KEEPALIVE_INTERVAL_MS) || 30000;
  public readonly SIP_KEEPALIVE_GRACE_MS: number = Number(process.env.SIP_KEEPALIVE_GRACE_MS) || 10000;
  public readonly SIP_RECONNECT_INITIAL_MS: number = Number(process.env.SIP_RECONNECT_INITIAL_MS) || 2000;
  public readonly SIP_RECONNECT_MAX_MS: number = Number(process.env.SIP_RECONNECT_MAX_MS) || 30000;
  public readonly SIP_RECONNECT_FACTOR: number = Number(process.env.SIP_RECONNECT_FACTOR) || 2;
  public readonly SIP_RECONNECT_MAX_ATTEMPTS: number = Number(process.env.SIP_RECONNECT_MAX_ATTEMPTS) || 0;

  public readonly SIP_TRANSACTION_TIMEOUT_MS: number = Number(process.env.SIP_TRANSACTION_TIMEOUT_MS) || 32000;
  public readonly SIP_INVITE_PROCEEDING_TIMEOUT_MS: number =
    Number(process.env.SIP_INVITE_PROCEEDING_TIMEOUT_MS) || 180000;
  public readonly SIP_RETRANSMIT: boolean = process.env.SIP_RETRANSMIT === 'true';
  public readonly SIP_T1_MS: number = Number(process.env.SIP_T1_MS) || 500;
  public readonly SIP_T2_MS: number = Number(process.env.SIP_T2_MS) || 4000;

  public readonly SIP_CALL_GRACE_MS: number = Number(process.env.SIP_CALL_GRACE_MS) || 30000;
  public readonly SIP_DTMF_GAP_MS: number = Number(process.env.SIP_DTMF_GAP_MS) || 150;
  public readonly SIP_DTMF_DEFAULT_DURATION_MS: number = Number(process.env.SIP_DTMF_DEFAULT_DURATION_MS) || 160;

  public readonly SIP_ACCOUNTS: AccountCredentials[] = parseAccounts(
    process.env.SIP_ACCOUNTS,
    this.SIP_DEFAULT_DOMAIN
  );

  public readonly HTTP_PORT: number = Number(process.env.HTTP_PORT) || 8080;
  public readonly HTTP_CORS_ORIGINS: string[] = parseList(process.env.HTTP_CORS_ORIGINS);
  public readonly LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
}
