import type { AccountCredentials } from '../configurations';
import { SipMethod, isChallenge, isSuccess } from '../constants';
import { StateMachine, type TransitionTable } from '../engine/StateMachine';
import { RegistrationState } from '../engine/events';
import type { Logger } from '../logging/Logger';
import { DigestAuthenticator } from '../sip/DigestAuthenticator';
import { SipError, SipErrorCode, isSipError } from '../sip/SipError';
import { SipMessage, generateCallId, generateTag } from '../sip/SipMessage';
import { buildContactUri, buildRequest, type UserAgentSettings } from '../sip/RequestFactory';
import type { Dispatcher, TransactionHandle, TransactionManager } from '../sip/TransactionManager';

const TRANSITIONS: TransitionTable<RegistrationState> = {
  None: [RegistrationState.Registering],
  Registering: [RegistrationState.Registering, RegistrationState.Registered, RegistrationState.Failed],
  Registered: [RegistrationState.Refreshing, RegistrationState.Unregistering, RegistrationState.Failed],
  Refreshing: [
    RegistrationState.Refreshing,
    RegistrationState.Registered,
    RegistrationState.Unregistering,
    RegistrationState.Failed,
  ],
  Unregistering: [RegistrationState.Unregistering, RegistrationState.Unregistered, RegistrationState.Failed],
  Unregistered: [RegistrationState.Registering],
  Failed: [RegistrationState.Registering],
};

const REFRESH_RATIO = 0.9;

export interface RegistrationRecord {
  account: string;
  username: string;
  domain: string;
  state: RegistrationState;
  expiresSeconds?: number;
  refreshInSeconds?: number;
  lastRegistrationTime?: Date;
  nextRegistrationTime?: Date;
  nonce?: string;
  nonceCount: number;
  failureCount: number;
  lastError?: string;
}

export interface RegistrationContext {
  transactions: TransactionManager;
  settings: UserAgentSettings;
  logger: Logger;
  requestedExpires: number;
  dispatch: Dispatcher;
  onStateChange(
    machine: RegistrationStateMachine,
    previous: RegistrationState,
    state: RegistrationState,
    reason?: string
  ): void;
  cnonceFactory?: () => string;
}

export const accountKey = (username: string, domain: string): string =>
  `${username.toLowerCase()}@${domain.toLowerCase()}`;

/**
 * REGISTER lifecycle for one account: registration, refresh at 90% of the
 * granted expiry, unregistration and a single authenticated retry per
 * request.
 */
export class RegistrationStateMachine extends StateMachine<RegistrationState> {
  public readonly key: string;
  private readonly authenticator: DigestAuthenticator;
  private readonly callId = generateCallId();
  private readonly fromTag = generateTag();
  private cseq = 0;
  private pending?: TransactionHandle;
  private authRetried = false;
  private refreshTimer?: NodeJS.Timeout;
  private expiresSeconds?: number;
  private lastRegistrationTime?: Date;
  private nextRegistrationTime?: Date;
  private failureCount = 0;
  private lastError?: string;

  constructor(
    public readonly account: AccountCredentials,
    private readonly context: RegistrationContext
  ) {
    super(RegistrationState.None, TRANSITIONS, context.logger);
    this.key = accountKey(account.username, account.domain);
    this.authenticator = new DigestAuthenticator(
      account.authUsername ?? account.username,
      account.password,
      context.cnonceFactory
    );
  }

  public register(): void {
    this.assertTransition(RegistrationState.Registering, 'register()');
    this.clearRefreshTimer();
    this.authenticator.reset();
    this.transition(RegistrationState.Registering, 'register()');
    this.sendRegister(this.context.requestedExpires);
  }

  public unregister(): void {
    this.assertTransition(RegistrationState.Unregistering, 'unregister()');
    this.clearRefreshTimer();
    this.pending?.cancel();
    this.transition(RegistrationState.Unregistering, 'unregister()');
    this.sendRegister(0);
  }

  /** Transport loss: pending and granted bindings can no longer be trusted. */
  public transportDown(reason: string): void {
    if (
      this.state === RegistrationState.None ||
      this.state === RegistrationState.Unregistered ||
      this.state === RegistrationState.Failed
    ) {
      return;
    }
    this.clearRefreshTimer();
    this.pending?.cancel();
    this.pending = undefined;
    this.fail(reason, SipErrorCode.TRANSPORT_DOWN);
  }

  public snapshot(): RegistrationRecord {
    return {
      account: this.key,
      username: this.account.username,
      domain: this.account.domain,
      state: this.state,
      expiresSeconds: this.expiresSeconds,
      refreshInSeconds: this.expiresSeconds === undefined ? undefined : this.expiresSeconds * REFRESH_RATIO,
      lastRegistrationTime: this.lastRegistrationTime,
      nextRegistrationTime: this.nextRegistrationTime,
      nonce: this.authenticator.currentNonce,
      nonceCount: this.authenticator.lastNonceCount,
      failureCount: this.failureCount,
      lastError: this.lastError,
    };
  }

  public dispose(): void {
    this.clearRefreshTimer();
    this.pending?.cancel();
    this.pending = undefined;
  }

  protected describe(): string {
    return `Registration ${this.key}`;
  }

  protected onTransition(previous: RegistrationState, next: RegistrationState, reason?: string): void {
    this.context.onStateChange(this, previous, next, reason);
  }

  private refresh(): void {
    this.guard('registration refresh', () => {
      this.transition(RegistrationState.Refreshing, 'refresh timer');
      this.sendRegister(this.context.requestedExpires);
    });
  }

  private sendRegister(expires: number, retry = false): void {
    if (!retry) this.authRetried = false;
    const { username, domain, displayName } = this.account;
    const aor = `sip:${username}@${domain}`;
    const uri = `sip:${domain}`;
    const display = displayName ? `"${displayName}" ` : '';

    const extraHeaders: Array<[string, string]> = [['Expires', `${expires}`]];
    if (this.authenticator.hasChallenge()) {
      const auth = this.authenticator.authorize(SipMethod.REGISTER, uri);
      extraHeaders.push([auth.name, auth.value]);
    }

    const request = buildRequest(this.context.settings, {
      method: SipMethod.REGISTER,
      uri,
      from: `${display}<${aor}>;tag=${this.fromTag}`,
      to: `${display}<${aor}>`,
      callId: this.callId,
      cseq: ++this.cseq,
      contact: `<${buildContactUri(username, this.context.settings)}>;expires=${expires}`,
      extraHeaders,
    });

    this.pending = this.context.transactions.sendRequest(request, {
      onFinal: (response, handle) => this.onFinal(response, handle, expires),
      onTimeout: (error, handle) => this.onTimeout(error, handle),
    });
  }

  private onFinal(response: SipMessage, handle: TransactionHandle, requestedExpires: number): void {
    if (handle !== this.pending) {
      this.logger.warn(
        `Registration ${this.key}: ignoring ${response.getStatusCode()} for a stale transaction (state ${this.state})`
      );
      return;
    }
    this.pending = undefined;
    const status = response.getStatusCode() ?? 0;

    this.guard(`REGISTER ${status}`, () => {
      if (isChallenge(status)) {
        this.handleChallenge(response, requestedExpires);
        return;
      }

      if (!isSuccess(status)) {
        this.fail(`${status} ${response.getReasonPhrase() ?? ''}`.trim());
        return;
      }

      if (this.state === RegistrationState.Unregistering) {
        this.expiresSeconds = undefined;
        this.nextRegistrationTime = undefined;
        this.transition(RegistrationState.Unregistered, `${status}`);
        return;
      }

      const granted = this.getRegistrationExpiry(response) ?? requestedExpires;
      if (granted <= 0) {
        this.fail('Registrar granted no expiry');
        return;
      }
      this.onRegistered(granted, status);
    });
  }

  private handleChallenge(response: SipMessage, requestedExpires: number): void {
    const status = response.getStatusCode();
    if (this.authRetried) {
      this.fail(`Authentication failed (${status} after credentials were sent)`, SipErrorCode.AUTHENTICATION_FAILED);
      return;
    }
    try {
      this.authenticator.acceptChallenge(response);
    } catch (error) {
      if (!isSipError(error)) throw error;
      this.fail(error.message, error.code);
      return;
    }
    this.authRetried = true;
    this.transition(this.state, `${status} challenge`);
    try {
      this.sendRegister(requestedExpires, true);
    } catch (error) {
      if (!isSipError(error, SipErrorCode.UNSUPPORTED_CHALLENGE)) throw error;
      this.fail(error.message, error.code);
    }
  }

  private onRegistered(expires: number, status: number): void {
    const now = new Date();
    this.expiresSeconds = expires;
    this.lastRegistrationTime = now;
    this.failureCount = 0;
    this.lastError = undefined;

    const refreshMs = expires * REFRESH_RATIO * 1000;
    this.nextRegistrationTime = new Date(now.getTime() + refreshMs);
    this.transition(RegistrationState.Registered, `${status}`);

    this.clearRefreshTimer();
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = undefined;
      this.context.dispatch(() => this.refresh());
    }, refreshMs);
  }

  private onTimeout(error: SipError, handle: TransactionHandle): void {
    if (handle !== this.pending) return;
    this.pending = undefined;
    this.guard('REGISTER timeout', () => this.fail(error.message, error.code));
  }

  private fail(reason: string, code?: SipErrorCode): void {
    this.failureCount += 1;
    this.lastError = reason;
    this.clearRefreshTimer();
    this.logger.warn(`Registration ${this.key} failed${code ? ` [${code}]` : ''}: ${reason}`);
    this.transition(RegistrationState.Failed, 'failure', reason);
  }

  private clearRefreshTimer(): void {
    if (this.refreshTimer) clearTimeout(this.refreshTimer);
    this.refreshTimer = undefined;
  }

  private getRegistrationExpiry(response: SipMessage): number | null {
    const ownContact = buildContactUri(this.account.username, this.context.settings).toLowerCase();
    const contacts = response.getContactHeaders();
    const ordered = [
      ...contacts.filter(header => header.toLowerCase().includes(ownContact)),
      ...contacts.filter(header => !header.toLowerCase().includes(ownContact)),
    ];
    for (const header of ordered) {
      const match = header.match(/;expires=(\d+)/i);
      if (match) {
        const value = Number.parseInt(match[1], 10);
        if (!Number.isNaN(value)) return value;
      }
    }

    const expiresHeader = response.getFirstHeader('Expires');
    if (!expiresHeader) return null;
    const value = Number.parseInt(expiresHeader, 10);
    return Number.isNaN(value) ? null : value;
  }
}
