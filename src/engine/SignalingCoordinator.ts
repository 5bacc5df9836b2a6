import { CallStateMachine, type CallContext, type CallRecord } from '../calls/CallStateMachine';
import type { AccountCredentials, Config } from '../configurations';
import { SipMethod, StatusCode } from '../constants';
import type { Logger } from '../logging/Logger';
import {
  RegistrationStateMachine,
  accountKey,
  type RegistrationContext,
  type RegistrationRecord,
} from '../registration/RegistrationStateMachine';
import { createUserAgentSettings, buildResponse, type UserAgentSettings } from '../sip/RequestFactory';
import { SipError, SipErrorCode, isSipError } from '../sip/SipError';
import { SipMessage, generateTag } from '../sip/SipMessage';
import { normalizeTarget, parseNameAddr, parseUri } from '../sip/SipUri';
import { TransactionManager } from '../sip/TransactionManager';
import { DialogStore, RegistrationStore } from '../store';
import type { TransportListener, TransportSession } from '../transport/TransportSession';
import { SerialExecutor } from './SerialExecutor';
import {
  RegistrationState,
  TransportState,
  type CallState,
  type NotificationSink,
  type SignalingEvent,
} from './events';

/** Answers whether a call's media still flows while signaling is down. */
export interface MediaMonitor {
  isMediaAlive(callId: string): boolean;
}

export interface CoordinatorDependencies {
  config: Config;
  logger: Logger;
  transport: TransportSession;
  registrationStore: RegistrationStore;
  dialogStore: DialogStore;
  mediaMonitor?: MediaMonitor;
  cnonceFactory?: () => string;
}

/**
 * Owns the transport, the transaction layer and every registration and call
 * machine of one engine. Inbound frames, timer callbacks and user commands
 * all run on one serial executor.
 */
export class SignalingCoordinator implements TransportListener {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly transport: TransportSession;
  private readonly registrations: RegistrationStore;
  private readonly dialogs: DialogStore;
  private readonly mediaMonitor?: MediaMonitor;
  private readonly cnonceFactory?: () => string;
  private readonly executor: SerialExecutor;
  private readonly settings: UserAgentSettings;
  private readonly transactions: TransactionManager;
  private readonly unregistered = new Set<string>();
  private sink?: NotificationSink;
  private transportLost = false;
  private graceTimer?: NodeJS.Timeout;

  constructor({
    config,
    logger,
    transport,
    registrationStore,
    dialogStore,
    mediaMonitor,
    cnonceFactory,
  }: CoordinatorDependencies) {
    this.config = config;
    this.logger = logger;
    this.transport = transport;
    this.registrations = registrationStore;
    this.dialogs = dialogStore;
    this.mediaMonitor = mediaMonitor;
    this.cnonceFactory = cnonceFactory;
    this.executor = new SerialExecutor(logger);
    this.settings = createUserAgentSettings(config.SIP_WS_URL, config.SIP_USER_AGENT);
    this.transactions = new TransactionManager(
      message => this.sendMessage(message),
      logger,
      {
        reliable: !config.SIP_RETRANSMIT,
        t1Ms: config.SIP_T1_MS,
        t2Ms: config.SIP_T2_MS,
        timeoutMs: config.SIP_TRANSACTION_TIMEOUT_MS,
        inviteProceedingTimeoutMs: config.SIP_INVITE_PROCEEDING_TIMEOUT_MS,
      },
      task => this.executor.post(task)
    );
    transport.attach(this);
  }

  /** The single outward event channel; a later call replaces the sink. */
  public setNotificationSink(sink: NotificationSink): void {
    this.sink = sink;
  }

  /** Connects the transport and registers the configured accounts. */
  public async start(): Promise<void> {
    this.transport.connect();
    for (const account of this.config.SIP_ACCOUNTS) {
      await this.register(account);
    }
  }

  public async stop(): Promise<void> {
    await this.executor.run(() => {
      if (this.graceTimer) clearTimeout(this.graceTimer);
      this.graceTimer = undefined;
      for (const call of this.dialogs.all()) call.dispose();
      for (const machine of this.registrations.all()) machine.dispose();
      this.transactions.dispose();
      this.transport.close();
    });
  }

  /** Resolves once every queued step has run. */
  public idle(): Promise<void> {
    return this.executor.idle();
  }

  // ---- user commands -------------------------------------------------

  public register(account: AccountCredentials): Promise<string> {
    return this.executor.run(() => {
      const key = accountKey(account.username, account.domain);
      this.unregistered.delete(key);
      const existing = this.registrations.get(key);
      if (existing) {
        existing.register();
        return key;
      }
      const machine = new RegistrationStateMachine(account, this.registrationContext());
      this.registrations.upsert(machine);
      machine.register();
      return key;
    });
  }

  public unregister(key: string): Promise<void> {
    return this.executor.run(() => {
      const machine = this.requireRegistration(key);
      machine.unregister();
      this.unregistered.add(machine.key);
    });
  }

  public makeCall(key: string, target: string, sdpOffer?: string): Promise<string> {
    return this.executor.run(() => {
      const registration = this.requireRegistration(key);
      const targetUri = normalizeTarget(target, registration.account.domain);
      if (!parseUri(targetUri)) {
        throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Invalid call target "${target}"`);
      }
      const call = CallStateMachine.outbound(this.callContext(registration), targetUri);
      this.dialogs.add(call);
      call.makeCall(sdpOffer);
      return call.callId;
    });
  }

  public acceptCall(callId: string, sdpAnswer?: string): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).accept(sdpAnswer));
  }

  public declineCall(callId: string, status?: number): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).decline(status));
  }

  public hangup(callId: string): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).hangup());
  }

  public hold(callId: string): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).hold());
  }

  public resume(callId: string): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).resume());
  }

  public sendDtmf(callId: string, digit: string, durationMs?: number): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).sendDtmf(digit, durationMs));
  }

  public sendDtmfSequence(callId: string, digits: string, durationMs?: number): Promise<void> {
    return this.executor.run(() => this.requireCall(callId).sendDtmfSequence(digits, durationMs));
  }

  public getRegistrations(): RegistrationRecord[] {
    return this.registrations.snapshots();
  }

  public getCalls(): CallRecord[] {
    return this.dialogs.snapshots();
  }

  public get transportState(): TransportState {
    return this.transport.state;
  }

  // ---- transport events ---------------------------------------------

  public onMessage(text: string): void {
    this.executor.post(() => this.receive(text));
  }

  public onStateChange(previous: TransportState, state: TransportState, code?: SipErrorCode, reason?: string): void {
    this.executor.post(() => this.onTransportState(previous, state, code, reason));
  }

  private receive(raw: string): void {
    let message: SipMessage;
    try {
      message = SipMessage.parse(raw);
    } catch (error) {
      if (!isSipError(error, SipErrorCode.MALFORMED_MESSAGE)) throw error;
      this.logger.warn(`Dropping malformed frame: ${error.message}`);
      this.rejectMalformed(raw);
      return;
    }

    this.logger.debug(`<<< ${message.startLine}`);
    if (message.isResponse()) {
      this.transactions.onResponseReceived(message);
      return;
    }
    if (!this.transactions.onRequestReceived(message)) return;

    const callId = message.getCallId() ?? '';
    const call = this.dialogs.get(callId);
    if (call) {
      call.handleRequest(message);
      return;
    }
    this.onOutOfDialogRequest(message);
  }

  private onOutOfDialogRequest(request: SipMessage): void {
    const method = request.getMethod();
    switch (method) {
      case SipMethod.INVITE:
        if (request.getToTag()) {
          this.respondStateless(request, StatusCode.CALL_DOES_NOT_EXIST);
          return;
        }
        this.onIncomingInvite(request);
        return;
      case SipMethod.OPTIONS:
        this.respondStateless(request, StatusCode.OK);
        return;
      case SipMethod.ACK:
        this.logger.debug(`Ignoring ACK for unknown dialog ${request.getCallId()}`);
        return;
      case SipMethod.BYE:
      case SipMethod.CANCEL:
      case SipMethod.INFO:
        this.respondStateless(request, StatusCode.CALL_DOES_NOT_EXIST);
        return;
      default:
        this.respondStateless(request, StatusCode.METHOD_NOT_ALLOWED);
    }
  }

  private onIncomingInvite(invite: SipMessage): void {
    const requestUser = parseUri(invite.getRequestUri() ?? '')?.user;
    const toUser = parseUri(parseNameAddr(invite.getFirstHeader('To') ?? '').uri)?.user;
    const registration =
      (requestUser ? this.registrations.findByUser(requestUser) : undefined) ??
      (toUser ? this.registrations.findByUser(toUser) : undefined);

    if (!registration) {
      this.logger.warn(`Incoming INVITE for unknown user ${requestUser ?? toUser ?? '?'}`);
      this.respondStateless(invite, StatusCode.NOT_FOUND);
      return;
    }

    const call = CallStateMachine.inbound(this.callContext(registration), invite);
    this.dialogs.add(call);
    call.onInviteReceived();

    const caller = parseNameAddr(invite.getFirstHeader('From') ?? '');
    const callerUri = parseUri(caller.uri);
    this.emit({
      type: 'IncomingCall',
      callId: call.callId,
      account: registration.key,
      callerNumber: callerUri?.user ?? caller.uri,
      callerName: caller.displayName,
    });
  }

  private rejectMalformed(raw: string): void {
    const request = SipMessage.salvageRequest(raw);
    if (!request || request.getMethod() === SipMethod.ACK) return;
    this.respondStateless(request, StatusCode.BAD_REQUEST);
  }

  private respondStateless(request: SipMessage, status: number): void {
    const extraHeaders: Array<[string, string]> =
      request.getMethod() === SipMethod.OPTIONS ? [['Accept', 'application/sdp']] : [];
    const response = buildResponse(this.settings, request, status, { toTag: generateTag(), extraHeaders });
    this.transactions.sendResponse(request, response);
  }

  private onTransportState(
    previous: TransportState,
    state: TransportState,
    code?: SipErrorCode,
    reason?: string
  ): void {
    this.emit({ type: 'TransportStateChanged', previous, state, code, reason });

    if (code === SipErrorCode.TRANSPORT_DOWN && !this.transportLost) {
      this.transportLost = true;
      this.onTransportDown(reason ?? 'Transport down');
      return;
    }

    if (state === TransportState.Connected && this.transportLost) {
      this.transportLost = false;
      if (this.graceTimer) clearTimeout(this.graceTimer);
      this.graceTimer = undefined;
      this.reregisterAll();
    }
  }

  private onTransportDown(reason: string): void {
    this.logger.warn(`Transport down: ${reason}`);
    for (const machine of this.registrations.all()) {
      machine.transportDown(reason);
    }

    if (this.dialogs.active().length === 0 || this.graceTimer) return;
    this.graceTimer = setTimeout(() => {
      this.graceTimer = undefined;
      this.executor.post(() => this.expireCallsAfterGrace(reason));
    }, this.config.SIP_CALL_GRACE_MS);
  }

  private expireCallsAfterGrace(reason: string): void {
    if (!this.transportLost) return;
    for (const call of this.dialogs.active()) {
      if (this.mediaMonitor?.isMediaAlive(call.callId)) {
        this.logger.info(`Call ${call.callId}: signaling lost but media alive, keeping call`);
        continue;
      }
      call.fail(`Transport lost: ${reason}`);
    }
  }

  private reregisterAll(): void {
    for (const machine of this.registrations.all()) {
      if (!machine.canTransition(RegistrationState.Registering)) continue;
      if (this.unregistered.has(machine.key)) continue;
      this.logger.info(`Re-registering ${machine.key} after reconnect`);
      machine.register();
    }
  }

  // ---- machine wiring -----------------------------------------------

  private registrationContext(): RegistrationContext {
    return {
      transactions: this.transactions,
      settings: this.settings,
      logger: this.logger,
      requestedExpires: this.config.SIP_REGISTER_EXPIRES,
      dispatch: task => this.executor.post(task),
      cnonceFactory: this.cnonceFactory,
      onStateChange: (machine, previous, state, reason) => {
        this.emit({ type: 'RegistrationStateChanged', account: machine.key, previous, state, reason });
        if (state === RegistrationState.Unregistered) {
          machine.dispose();
          this.registrations.remove(machine.key);
        }
      },
    };
  }

  private callContext(registration: RegistrationStateMachine): CallContext {
    return {
      account: registration.account,
      accountKey: registration.key,
      transactions: this.transactions,
      settings: this.settings,
      logger: this.logger,
      dispatch: task => this.executor.post(task),
      ackTimeoutMs: this.config.SIP_TRANSACTION_TIMEOUT_MS,
      dtmfGapMs: this.config.SIP_DTMF_GAP_MS,
      dtmfDefaultDurationMs: this.config.SIP_DTMF_DEFAULT_DURATION_MS,
      cnonceFactory: this.cnonceFactory,
      onStateChange: (call, previous, state, reason) => this.onCallStateChange(call, previous, state, reason),
      onDtmfResult: (call, digit, success) => this.emit({ type: 'DtmfResult', callId: call.callId, digit, success }),
    };
  }

  private onCallStateChange(call: CallStateMachine, previous: CallState, state: CallState, reason?: string): void {
    this.emit({
      type: 'CallStateChanged',
      callId: call.callId,
      account: call.snapshot().account,
      direction: call.direction,
      previous,
      state,
      reason,
    });
    if (call.isTerminal()) {
      call.dispose();
      this.dialogs.remove(call.callId);
    }
  }

  private requireRegistration(key: string): RegistrationStateMachine {
    const machine = this.registrations.get(key);
    if (!machine) throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Unknown account ${key}`);
    return machine;
  }

  private requireCall(callId: string): CallStateMachine {
    const call = this.dialogs.get(callId);
    if (!call) throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Unknown call ${callId}`);
    return call;
  }

  private sendMessage(message: SipMessage): void {
    this.logger.debug(`>>> ${message.startLine}`);
    try {
      this.transport.send(message.build());
    } catch (error) {
      if (!isSipError(error, SipErrorCode.MESSAGE_TOO_LARGE)) throw error;
      this.logger.error(`Not sending ${message.startLine}: ${error.message}`);
    }
  }

  private emit(event: SignalingEvent): void {
    if (!this.sink) return;
    try {
      this.sink(event);
    } catch (error) {
      this.logger.error(`Notification sink failed on ${event.type}`, error);
    }
  }
}
