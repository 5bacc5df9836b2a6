import type { AccountCredentials } from '../configurations';
import { SipMethod, StatusCode, isChallenge, isSuccess } from '../constants';
import { StateMachine, type TransitionTable } from '../engine/StateMachine';
import { CallState, type CallDirection } from '../engine/events';
import type { Logger } from '../logging/Logger';
import { DigestAuthenticator } from '../sip/DigestAuthenticator';
import { SipError, SipErrorCode, isSipError } from '../sip/SipError';
import { SipMessage, generateCallId, generateTag, type HeaderEntries } from '../sip/SipMessage';
import { parseNameAddr } from '../sip/SipUri';
import {
  buildContactUri,
  buildRequest,
  buildResponse,
  type ResponseOptions,
  type UserAgentSettings,
} from '../sip/RequestFactory';
import type { Dispatcher, TransactionHandle, TransactionManager } from '../sip/TransactionManager';
import { SDP_CONTENT_TYPE, isRemoteHold, setMediaDirection } from './sdp';

const TRANSITIONS: TransitionTable<CallState> = {
  Idle: [CallState.Calling, CallState.Ringing],
  Calling: [CallState.Ringing, CallState.Connected, CallState.Terminating, CallState.Failed],
  Ringing: [CallState.Connected, CallState.Terminating, CallState.Ended, CallState.Failed],
  Connected: [CallState.OnHold, CallState.Terminating, CallState.Failed],
  OnHold: [CallState.Connected, CallState.Terminating, CallState.Failed],
  Terminating: [CallState.Ended, CallState.Failed],
  Ended: [],
  Failed: [],
};

const DTMF_DIGIT = /^[0-9*#A-D]$/;
const DTMF_CONTENT_TYPE = 'application/dtmf-relay';

export interface CallContext {
  account: AccountCredentials;
  accountKey: string;
  transactions: TransactionManager;
  settings: UserAgentSettings;
  logger: Logger;
  dispatch: Dispatcher;
  ackTimeoutMs: number;
  dtmfGapMs: number;
  dtmfDefaultDurationMs: number;
  onStateChange(call: CallStateMachine, previous: CallState, state: CallState, reason?: string): void;
  onDtmfResult(call: CallStateMachine, digit: string, success: boolean): void;
  cnonceFactory?: () => string;
}

export interface CallRecord {
  callId: string;
  account: string;
  direction: CallDirection;
  state: CallState;
  localUri: string;
  remoteUri: string;
  localTag: string;
  remoteTag?: string;
  localSeq: number;
  remoteSeq?: number;
  remoteHold: boolean;
  startedAt: Date;
  connectedAt?: Date;
  endedAt?: Date;
  endReason?: string;
}

type InviteAttempt = { handle: TransactionHandle; request: SipMessage };
type TargetRefresh = { intent: 'hold' | 'resume'; sdp?: string };
type DtmfRequest = { digit: string; durationMs: number };
type InDialogOptions = {
  body?: string;
  contentType?: string;
  onFinal(response: SipMessage): void;
  onTimeout(error: SipError): void;
};

const statusText = (response: SipMessage): string =>
  `${response.getStatusCode()} ${response.getReasonPhrase() ?? ''}`.trim();

/**
 * One dialog: INVITE / ACK / BYE / CANCEL handling, hold and resume through
 * re-INVITE, and in-dialog DTMF. The local CSeq, tags and nonce state are
 * owned here and only mutated by this instance.
 */
export class CallStateMachine extends StateMachine<CallState> {
  public readonly callId: string;
  public readonly direction: CallDirection;
  private readonly authenticator: DigestAuthenticator;
  private readonly localTag: string;
  private readonly localUri: string;
  private readonly remoteUri: string;
  private readonly startedAt = new Date();
  private remoteTag?: string;
  private remoteTarget: string;
  private routeSet: string[] = [];
  private localSeq = 0;
  private remoteSeq?: number;
  private localSdp?: string;
  private remoteSdp?: string;
  private invite?: InviteAttempt;
  private inboundInvite?: SipMessage;
  private inviteAuthRetried = false;
  private cancelSent = false;
  private targetRefresh?: TargetRefresh;
  private awaitingAck = false;
  private ackTimer?: NodeJS.Timeout;
  private dtmfQueue: DtmfRequest[] = [];
  private dtmfInFlight = false;
  private dtmfGapTimer?: NodeJS.Timeout;
  private connectedAt?: Date;
  private endedAt?: Date;
  private endReason?: string;

  private constructor(
    private readonly context: CallContext,
    init: {
      callId: string;
      direction: CallDirection;
      localTag: string;
      localUri: string;
      remoteUri: string;
      remoteTarget: string;
    }
  ) {
    super(CallState.Idle, TRANSITIONS, context.logger);
    this.callId = init.callId;
    this.direction = init.direction;
    this.localTag = init.localTag;
    this.localUri = init.localUri;
    this.remoteUri = init.remoteUri;
    this.remoteTarget = init.remoteTarget;
    this.authenticator = new DigestAuthenticator(
      context.account.authUsername ?? context.account.username,
      context.account.password,
      context.cnonceFactory
    );
  }

  static outbound(context: CallContext, targetUri: string, callId = generateCallId()): CallStateMachine {
    const { username, domain } = context.account;
    return new CallStateMachine(context, {
      callId,
      direction: 'outbound',
      localTag: generateTag(),
      localUri: `sip:${username}@${domain}`,
      remoteUri: targetUri,
      remoteTarget: targetUri,
    });
  }

  static inbound(context: CallContext, invite: SipMessage): CallStateMachine {
    const from = parseNameAddr(invite.getFirstHeader('From') ?? '');
    const to = parseNameAddr(invite.getFirstHeader('To') ?? '');
    const contact = invite.getContactHeaders()[0];
    const call = new CallStateMachine(context, {
      callId: invite.getCallId() ?? generateCallId(),
      direction: 'inbound',
      localTag: generateTag(),
      localUri: to.uri,
      remoteUri: from.uri,
      remoteTarget: contact ? parseNameAddr(contact).uri : from.uri,
    });
    call.remoteTag = invite.getFromTag();
    call.remoteSeq = invite.getCSeq()?.seq;
    call.routeSet = invite.getHeader('Record-Route');
    call.remoteSdp = invite.body || undefined;
    call.inboundInvite = invite;
    return call;
  }

  // ---- local commands -------------------------------------------------

  public makeCall(localSdp?: string): void {
    this.assertTransition(CallState.Calling, 'makeCall()');
    this.localSdp = localSdp;
    this.transition(CallState.Calling, 'makeCall()');
    this.sendInvite();
  }

  public accept(localSdp?: string): void {
    const invite = this.inboundInvite;
    if (this.direction !== 'inbound' || !invite) {
      throw new SipError(SipErrorCode.ILLEGAL_TRANSITION, `Call ${this.callId}: accept() on an outbound call`);
    }
    this.assertTransition(CallState.Connected, 'accept()');
    if (localSdp !== undefined) this.localSdp = localSdp;
    this.respond(invite, StatusCode.OK, this.withSdp({ contact: this.contactHeader() }));
    this.inboundInvite = undefined;
    this.awaitAck();
    this.connectedAt = new Date();
    this.transition(CallState.Connected, 'accept()');
  }

  public decline(status: number = StatusCode.DECLINE): void {
    const invite = this.inboundInvite;
    if (this.direction !== 'inbound' || !invite) {
      throw new SipError(SipErrorCode.ILLEGAL_TRANSITION, `Call ${this.callId}: decline() on an outbound call`);
    }
    this.assertTransition(CallState.Ended, 'decline()');
    this.respond(invite, status);
    this.inboundInvite = undefined;
    this.end(`Declined (${status})`, 'decline()');
  }

  /** CANCEL the pending outbound INVITE; completion arrives as its final response. */
  public cancel(): void {
    const invite = this.invite;
    if (this.direction !== 'outbound' || !invite || this.cancelSent) {
      throw new SipError(SipErrorCode.ILLEGAL_TRANSITION, `Call ${this.callId}: nothing to cancel in ${this.state}`);
    }
    this.assertTransition(CallState.Terminating, 'cancel()');
    this.cancelSent = true;
    this.endReason = 'Cancelled';
    invite.handle.cancel();
    this.transition(CallState.Terminating, 'cancel()');
    this.context.transactions.sendRequest(this.buildCancel(invite.request), {
      onFinal: response => this.logger.debug(`Call ${this.callId}: CANCEL answered ${statusText(response)}`),
      onTimeout: () => this.logger.warn(`Call ${this.callId}: CANCEL timed out`),
    });
  }

  /**
   * Ends the call the way its state requires: CANCEL while an outbound
   * INVITE is pending (no dialog yet), decline while an inbound call rings,
   * BYE once the dialog exists.
   */
  public hangup(): void {
    if (this.state === CallState.Calling || (this.state === CallState.Ringing && this.direction === 'outbound')) {
      this.cancel();
      return;
    }
    if (this.state === CallState.Ringing) {
      this.decline();
      return;
    }
    this.assertTransition(CallState.Terminating, 'hangup()');
    this.endReason = 'Local hangup';
    this.sendBye('hangup()');
  }

  public hold(): void {
    this.startTargetRefresh('hold', CallState.OnHold);
  }

  public resume(): void {
    this.startTargetRefresh('resume', CallState.Connected);
  }

  public sendDtmf(digit: string, durationMs = this.context.dtmfDefaultDurationMs): void {
    const normalized = digit.toUpperCase();
    if (!DTMF_DIGIT.test(normalized)) {
      throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Invalid DTMF digit "${digit}"`);
    }
    if (this.state !== CallState.Connected && this.state !== CallState.OnHold) {
      throw new SipError(SipErrorCode.ILLEGAL_TRANSITION, `Call ${this.callId}: DTMF needs an established call`);
    }
    this.dtmfQueue.push({ digit: normalized, durationMs });
    this.pumpDtmf();
  }

  /** Queues every digit of `digits` in order; nothing is queued if one is invalid. */
  public sendDtmfSequence(digits: string, durationMs = this.context.dtmfDefaultDurationMs): void {
    const normalized = digits.toUpperCase();
    const invalid = [...normalized].find(digit => !DTMF_DIGIT.test(digit));
    if (!normalized || invalid !== undefined) {
      throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Invalid DTMF sequence "${digits}"`);
    }
    for (const digit of normalized) {
      this.sendDtmf(digit, durationMs);
    }
  }

  /** Coordinator policy (transport lost beyond the grace period). */
  public fail(reason: string): void {
    if (this.state === CallState.Ended || this.state === CallState.Failed) return;
    this.invite?.handle.cancel();
    this.endReason = reason;
    this.transition(CallState.Failed, 'failure', reason);
  }

  // ---- network events -------------------------------------------------

  /** First INVITE of an inbound call: answer 100 and 180, start ringing. */
  public onInviteReceived(): void {
    const invite = this.inboundInvite;
    if (!invite) return;
    this.guard('INVITE', () => {
      this.assertTransition(CallState.Ringing, 'INVITE received');
      this.respond(invite, StatusCode.TRYING);
      this.respond(invite, StatusCode.RINGING, { contact: this.contactHeader() });
      this.transition(CallState.Ringing, 'INVITE received');
    });
  }

  /** Requests matched to this dialog by Call-ID. */
  public handleRequest(request: SipMessage): void {
    const method = request.getMethod();
    const cseq = request.getCSeq();

    if (method === SipMethod.CANCEL) {
      this.onCancel(request);
      return;
    }
    if (!this.matchesDialog(request)) {
      this.logger.warn(
        `Call ${this.callId}: ${method} with tags ${request.getFromTag() ?? '-'}/${request.getToTag() ?? '-'} matches no dialog`
      );
      if (method !== SipMethod.ACK) this.respond(request, StatusCode.CALL_DOES_NOT_EXIST);
      return;
    }
    if (method === SipMethod.ACK) {
      this.onAck();
      return;
    }

    if (cseq && this.remoteSeq !== undefined && cseq.seq < this.remoteSeq) {
      this.logger.warn(`Call ${this.callId}: out-of-order ${method} CSeq ${cseq.seq} < ${this.remoteSeq}`);
      this.respond(request, StatusCode.SERVER_ERROR, { reason: 'CSeq Out Of Order' });
      return;
    }
    if (cseq) this.remoteSeq = cseq.seq;

    switch (method) {
      case SipMethod.BYE:
        this.onBye(request);
        return;
      case SipMethod.INVITE:
        this.onReinvite(request);
        return;
      case SipMethod.INFO:
      case SipMethod.OPTIONS:
        this.respond(request, StatusCode.OK);
        return;
      default:
        this.respond(request, StatusCode.NOT_IMPLEMENTED);
    }
  }

  public snapshot(): CallRecord {
    return {
      callId: this.callId,
      account: this.context.accountKey,
      direction: this.direction,
      state: this.state,
      localUri: this.localUri,
      remoteUri: this.remoteUri,
      localTag: this.localTag,
      remoteTag: this.remoteTag,
      localSeq: this.localSeq,
      remoteSeq: this.remoteSeq,
      remoteHold: this.remoteSdp ? isRemoteHold(this.remoteSdp) : false,
      startedAt: this.startedAt,
      connectedAt: this.connectedAt,
      endedAt: this.endedAt,
      endReason: this.endReason,
    };
  }

  public isTerminal(): boolean {
    return this.state === CallState.Ended || this.state === CallState.Failed;
  }

  public dispose(): void {
    this.clearTimers();
    this.invite?.handle.cancel();
  }

  protected describe(): string {
    return `Call ${this.callId}`;
  }

  protected onTransition(previous: CallState, next: CallState, reason?: string): void {
    if (next === CallState.Ended || next === CallState.Failed) {
      this.endedAt = new Date();
      this.clearTimers();
      this.targetRefresh = undefined;
      this.failQueuedDtmf();
    }
    this.context.onStateChange(this, previous, next, reason ?? this.endReason);
  }

  // ---- outbound INVITE --------------------------------------------------

  private sendInvite(): void {
    const extraHeaders: HeaderEntries = [];
    if (this.authenticator.hasChallenge()) {
      const auth = this.authenticator.authorize(SipMethod.INVITE, this.remoteTarget);
      extraHeaders.push([auth.name, auth.value]);
    }

    const request = buildRequest(this.context.settings, {
      method: SipMethod.INVITE,
      uri: this.remoteTarget,
      from: this.localParty(),
      to: `<${this.remoteUri}>`,
      callId: this.callId,
      cseq: ++this.localSeq,
      contact: this.contactHeader(),
      extraHeaders,
      body: this.localSdp,
      contentType: SDP_CONTENT_TYPE,
    });

    const handle = this.context.transactions.sendRequest(request, {
      onProvisional: (response, current) => this.onInviteProvisional(response, current),
      onFinal: (response, current) => this.onInviteFinal(response, current),
      onTimeout: (error, current) => this.onInviteTimeout(error, current),
    });
    this.invite = { handle, request };
  }

  private onInviteProvisional(response: SipMessage, handle: TransactionHandle): void {
    if (handle !== this.invite?.handle) return;
    const status = response.getStatusCode() ?? 0;
    if (status === StatusCode.TRYING || this.state !== CallState.Calling) return;
    this.guard(`INVITE ${status}`, () => this.transition(CallState.Ringing, `${status}`));
  }

  private onInviteFinal(response: SipMessage, handle: TransactionHandle): void {
    const status = response.getStatusCode() ?? 0;
    if (handle !== this.invite?.handle) {
      this.logger.warn(`Call ${this.callId}: ignoring ${status} for a stale INVITE`);
      return;
    }
    this.invite = undefined;

    if (isSuccess(status)) {
      this.establishDialog(response);
      this.sendAck(response);
      if (this.isTerminal()) {
        this.logger.info(`Call ${this.callId}: ${status} after the call ended in ${this.state}, sending BYE`);
        this.sendInDialog(SipMethod.BYE, {
          onFinal: bye => this.logger.debug(`Call ${this.callId}: BYE answered ${statusText(bye)}`),
          onTimeout: () => this.logger.warn(`Call ${this.callId}: BYE timed out`),
        });
        return;
      }
      if (this.cancelSent || handle.cancelled) {
        // the callee answered before our CANCEL took effect
        this.logger.info(`Call ${this.callId}: 200 after CANCEL, sending BYE`);
        this.sendBye('200 after CANCEL');
        return;
      }
      this.connectedAt = new Date();
      this.guard(`INVITE ${status}`, () => this.transition(CallState.Connected, `${status}`));
      return;
    }

    if (this.isTerminal()) {
      this.logger.debug(`Call ${this.callId}: ${status} after the call ended in ${this.state}`);
      return;
    }
    if (this.state === CallState.Terminating) {
      this.end(status === StatusCode.REQUEST_TERMINATED ? 'Cancelled' : statusText(response), `${status}`);
      return;
    }

    if (isChallenge(status) && !this.inviteAuthRetried) {
      this.inviteAuthRetried = true;
      try {
        this.authenticator.acceptChallenge(response);
        this.sendInvite();
        return;
      } catch (error) {
        if (!isSipError(error)) throw error;
        this.failWith(error.message);
        return;
      }
    }

    this.failWith(isChallenge(status) ? `Authentication failed (${statusText(response)})` : statusText(response));
  }

  private onInviteTimeout(error: SipError, handle: TransactionHandle): void {
    if (handle !== this.invite?.handle) return;
    this.invite = undefined;
    if (this.state === CallState.Terminating) {
      this.end('Cancelled', 'INVITE timeout');
      return;
    }
    this.failWith(error.message);
  }

  private establishDialog(response: SipMessage): void {
    this.remoteTag = response.getToTag();
    const contact = response.getContactHeaders()[0];
    if (contact) this.remoteTarget = parseNameAddr(contact).uri;
    this.routeSet = [...response.getHeader('Record-Route')].reverse();
    if (response.body) this.remoteSdp = response.body;
  }

  private buildCancel(invite: SipMessage): SipMessage {
    return SipMessage.request({
      method: SipMethod.CANCEL,
      uri: invite.getRequestUri() ?? this.remoteTarget,
      headers: [
        ['Via', invite.getTopVia() ?? ''],
        ['Route', invite.getHeader('Route')],
        ['Max-Forwards', invite.getFirstHeader('Max-Forwards') ?? '70'],
        ['From', invite.getFirstHeader('From') ?? ''],
        ['To', invite.getFirstHeader('To') ?? ''],
        ['Call-ID', this.callId],
        ['CSeq', `${invite.getCSeq()?.seq ?? this.localSeq} ${SipMethod.CANCEL}`],
        ['User-Agent', this.context.settings.userAgent],
      ],
    });
  }

  // ---- in-dialog requests --------------------------------------------

  private sendAck(response: SipMessage): void {
    const seq = response.getCSeq()?.seq ?? this.localSeq;
    const ack = buildRequest(this.context.settings, {
      method: SipMethod.ACK,
      uri: this.remoteTarget,
      from: this.localParty(),
      to: this.remoteParty(),
      callId: this.callId,
      cseq: seq,
      routes: this.routeSet,
    });
    this.context.transactions.sendStateless(ack);
  }

  private sendBye(event: string): void {
    this.targetRefresh = undefined;
    this.awaitingAck = false;
    if (this.state !== CallState.Terminating) this.transition(CallState.Terminating, event);
    const done = (reason: string) => this.guard('BYE completion', () => this.end(this.endReason ?? reason, reason));
    this.sendInDialog(SipMethod.BYE, {
      onFinal: response => done(`BYE ${response.getStatusCode()}`),
      onTimeout: () => done('BYE timeout'),
    });
  }

  private startTargetRefresh(intent: TargetRefresh['intent'], next: CallState): void {
    const expected = intent === 'hold' ? CallState.Connected : CallState.OnHold;
    if (this.state !== expected || this.targetRefresh) {
      throw new SipError(
        SipErrorCode.ILLEGAL_TRANSITION,
        `Call ${this.callId}: ${intent}() is not allowed in state ${this.state}${this.targetRefresh ? ' (re-INVITE pending)' : ''}`
      );
    }
    this.assertTransition(next, `${intent}()`);

    const sdp = this.localSdp ? setMediaDirection(this.localSdp, intent === 'hold' ? 'sendonly' : 'sendrecv') : undefined;
    const refresh: TargetRefresh = { intent, sdp };
    this.targetRefresh = refresh;

    this.sendInDialog(SipMethod.INVITE, {
      body: sdp,
      contentType: SDP_CONTENT_TYPE,
      onFinal: response => this.onTargetRefreshFinal(refresh, response, next),
      onTimeout: error => this.onTargetRefreshFailed(refresh, error.message, true),
    });
  }

  private onTargetRefreshFinal(refresh: TargetRefresh, response: SipMessage, next: CallState): void {
    const status = response.getStatusCode() ?? 0;
    if (isSuccess(status)) this.sendAck(response);
    if (this.targetRefresh !== refresh) {
      this.logger.warn(`Call ${this.callId}: ignoring ${status} for a superseded re-INVITE`);
      return;
    }

    if (!isSuccess(status)) {
      const fatal = status === StatusCode.CALL_DOES_NOT_EXIST || status === StatusCode.REQUEST_TIMEOUT;
      this.onTargetRefreshFailed(refresh, statusText(response), fatal);
      return;
    }

    this.targetRefresh = undefined;
    if (refresh.sdp) this.localSdp = refresh.sdp;
    if (response.body) this.remoteSdp = response.body;
    this.guard(`re-INVITE ${status}`, () => this.transition(next, `${refresh.intent} ${status}`));
  }

  private onTargetRefreshFailed(refresh: TargetRefresh, reason: string, fatal: boolean): void {
    if (this.targetRefresh !== refresh) return;
    this.targetRefresh = undefined;
    this.logger.warn(`Call ${this.callId}: ${refresh.intent} failed: ${reason}`);
    if (fatal) {
      this.endReason = `Dialog lost during ${refresh.intent}: ${reason}`;
      this.guard('re-INVITE failure', () => this.sendBye(`${refresh.intent} failure`));
    }
  }

  private pumpDtmf(): void {
    if (this.dtmfInFlight || this.dtmfGapTimer || this.isTerminal()) return;
    const next = this.dtmfQueue.shift();
    if (!next) return;

    this.dtmfInFlight = true;
    const finish = (success: boolean) => {
      this.dtmfInFlight = false;
      this.context.onDtmfResult(this, next.digit, success);
      if (this.isTerminal()) return;
      this.dtmfGapTimer = setTimeout(() => {
        this.dtmfGapTimer = undefined;
        this.context.dispatch(() => this.pumpDtmf());
      }, this.context.dtmfGapMs);
    };

    this.sendInDialog(SipMethod.INFO, {
      body: `Signal=${next.digit}\r\nDuration=${next.durationMs}\r\n`,
      contentType: DTMF_CONTENT_TYPE,
      onFinal: response => finish(isSuccess(response.getStatusCode() ?? 0)),
      onTimeout: () => finish(false),
    });
  }

  private failQueuedDtmf(): void {
    const pending = this.dtmfQueue;
    this.dtmfQueue = [];
    for (const request of pending) {
      this.context.onDtmfResult(this, request.digit, false);
    }
  }

  /** In-dialog request with one authenticated retry on 401/407. */
  private sendInDialog(method: string, options: InDialogOptions): void {
    let retried = false;
    const attempt = (): void => {
      this.context.transactions.sendRequest(this.buildInDialogRequest(method, options), {
        onFinal: response => {
          const status = response.getStatusCode() ?? 0;
          if (isChallenge(status) && !retried) {
            retried = true;
            try {
              this.authenticator.acceptChallenge(response);
              attempt();
              return;
            } catch (error) {
              if (!isSipError(error)) throw error;
              this.logger.warn(`Call ${this.callId}: ${method} challenge not answerable: ${error.message}`);
            }
          }
          options.onFinal(response);
        },
        onTimeout: error => options.onTimeout(error),
      });
    };
    attempt();
  }

  private buildInDialogRequest(method: string, options: Pick<InDialogOptions, 'body' | 'contentType'>): SipMessage {
    const extraHeaders: HeaderEntries = [];
    if (this.authenticator.hasChallenge()) {
      const auth = this.authenticator.authorize(method, this.remoteTarget);
      extraHeaders.push([auth.name, auth.value]);
    }
    return buildRequest(this.context.settings, {
      method,
      uri: this.remoteTarget,
      from: this.localParty(),
      to: this.remoteParty(),
      callId: this.callId,
      cseq: ++this.localSeq,
      routes: this.routeSet,
      contact: method === SipMethod.INVITE ? this.contactHeader() : undefined,
      extraHeaders,
      body: options.body,
      contentType: options.contentType,
    });
  }

  // ---- inbound in-dialog handling ----------------------------------------

  private onAck(): void {
    if (!this.awaitingAck) {
      this.logger.debug(`Call ${this.callId}: unexpected ACK`);
      return;
    }
    this.awaitingAck = false;
    if (this.ackTimer) clearTimeout(this.ackTimer);
    this.ackTimer = undefined;
  }

  private onCancel(request: SipMessage): void {
    const invite = this.inboundInvite;
    if (!invite || this.state !== CallState.Ringing) {
      this.respond(request, StatusCode.OK);
      return;
    }
    this.respond(request, StatusCode.OK);
    this.respond(invite, StatusCode.REQUEST_TERMINATED);
    this.inboundInvite = undefined;
    this.guard('CANCEL', () => this.end('Cancelled by caller', 'CANCEL received'));
  }

  private onBye(request: SipMessage): void {
    this.respond(request, StatusCode.OK);
    if (this.inboundInvite) {
      this.respond(this.inboundInvite, StatusCode.REQUEST_TERMINATED);
      this.inboundInvite = undefined;
    }
    this.guard('BYE', () => {
      if (this.state !== CallState.Terminating) {
        this.endReason = 'Remote hangup';
        this.transition(CallState.Terminating, 'BYE received');
      }
      this.end(this.endReason ?? 'Remote hangup', 'BYE received');
    });
  }

  private onReinvite(request: SipMessage): void {
    if (this.state !== CallState.Connected && this.state !== CallState.OnHold) {
      this.respond(request, StatusCode.CALL_DOES_NOT_EXIST);
      return;
    }
    if (this.targetRefresh) {
      this.respond(request, StatusCode.REQUEST_PENDING);
      return;
    }
    if (request.body) this.remoteSdp = request.body;
    const contact = request.getContactHeaders()[0];
    if (contact) this.remoteTarget = parseNameAddr(contact).uri;
    this.respond(request, StatusCode.OK, this.withSdp({ contact: this.contactHeader() }));
    this.awaitAck();
  }

  // ---- helpers --------------------------------------------------------

  private respond(request: SipMessage, status: number, options: ResponseOptions = {}): void {
    const toTag = status === StatusCode.TRYING ? undefined : this.localTag;
    const response = buildResponse(this.context.settings, request, status, { toTag, ...options });
    this.context.transactions.sendResponse(request, response);
  }

  /** To must carry our tag and, once it is known, From the remote one. */
  private matchesDialog(request: SipMessage): boolean {
    if (request.getToTag() !== this.localTag) return false;
    return this.remoteTag === undefined || request.getFromTag() === this.remoteTag;
  }

  private withSdp(options: ResponseOptions): ResponseOptions {
    return this.localSdp ? { ...options, body: this.localSdp, contentType: SDP_CONTENT_TYPE } : options;
  }

  private awaitAck(): void {
    this.awaitingAck = true;
    if (this.ackTimer) clearTimeout(this.ackTimer);
    this.ackTimer = setTimeout(() => {
      this.ackTimer = undefined;
      this.context.dispatch(() => {
        if (!this.awaitingAck) return;
        this.awaitingAck = false;
        this.logger.warn(`Call ${this.callId}: no ACK for 200 OK, ending call`);
        this.endReason = 'No ACK received';
        this.guard('ACK timeout', () => this.sendBye('ACK timeout'));
      });
    }, this.context.ackTimeoutMs);
  }

  private end(reason: string, event: string): void {
    this.endReason = this.endReason ?? reason;
    this.transition(CallState.Ended, event, reason);
  }

  private failWith(reason: string): void {
    this.endReason = reason;
    this.guard('call failure', () => this.transition(CallState.Failed, 'failure', reason));
  }

  private clearTimers(): void {
    if (this.ackTimer) clearTimeout(this.ackTimer);
    if (this.dtmfGapTimer) clearTimeout(this.dtmfGapTimer);
    this.ackTimer = undefined;
    this.dtmfGapTimer = undefined;
  }

  private contactHeader(): string {
    return `<${buildContactUri(this.context.account.username, this.context.settings)}>`;
  }

  private localParty(): string {
    const display = this.context.account.displayName ? `"${this.context.account.displayName}" ` : '';
    return `${display}<${this.localUri}>;tag=${this.localTag}`;
  }

  private remoteParty(): string {
    return this.remoteTag ? `<${this.remoteUri}>;tag=${this.remoteTag}` : `<${this.remoteUri}>`;
  }
}
