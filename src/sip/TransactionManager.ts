import { MAX_FORWARDS, SipMethod, isProvisional, isSuccess } from '../constants';
import type { Logger } from '../logging/Logger';
import { SipError, SipErrorCode } from './SipError';
import { SipMessage } from './SipMessage';

export interface TransactionHandlers {
  onProvisional?(response: SipMessage, handle: TransactionHandle): void;
  onFinal(response: SipMessage, handle: TransactionHandle): void;
  onTimeout(error: SipError, handle: TransactionHandle): void;
}

export interface TransactionHandle {
  readonly id: string;
  readonly branch: string;
  readonly method: string;
  readonly request: SipMessage;
  readonly cancelled: boolean;
  readonly terminated: boolean;
  /** Advisory: the final response is still delivered, flagged as cancelled. */
  cancel(): void;
}

export interface TransactionManagerOptions {
  /** When true (WebSocket, TCP, TLS) no SIP-level retransmission happens. */
  reliable: boolean;
  t1Ms: number;
  t2Ms: number;
  timeoutMs: number;
  inviteProceedingTimeoutMs: number;
}

export type MessageSender = (message: SipMessage) => void;
export type Dispatcher = (task: () => void) => void;

type ServerTransaction = {
  method: string;
  lastResponse?: SipMessage;
  timeout: NodeJS.Timeout;
};

const transactionKey = (branch: string, method: string): string => `${branch}|${method.toUpperCase()}`;

class ClientTransaction implements TransactionHandle {
  public cancelled = false;
  public terminated = false;
  public proceeding = false;
  public retransmitTimer?: NodeJS.Timeout;
  public timeoutTimer?: NodeJS.Timeout;
  public retransmitIntervalMs: number;

  constructor(
    public readonly id: string,
    public readonly branch: string,
    public readonly method: string,
    public readonly request: SipMessage,
    public readonly handlers: TransactionHandlers,
    initialIntervalMs: number
  ) {
    this.retransmitIntervalMs = initialIntervalMs;
  }

  public cancel(): void {
    this.cancelled = true;
  }

  public clearTimers(): void {
    if (this.retransmitTimer) clearTimeout(this.retransmitTimer);
    if (this.timeoutTimer) clearTimeout(this.timeoutTimer);
    this.retransmitTimer = undefined;
    this.timeoutTimer = undefined;
  }
}

/**
 * Correlates requests with their responses by top-Via branch and CSeq
 * method, and owns the retransmission and timeout timers.
 */
export class TransactionManager {
  private readonly client = new Map<string, ClientTransaction>();
  private readonly server = new Map<string, ServerTransaction>();

  constructor(
    private readonly send: MessageSender,
    private readonly logger: Logger,
    private readonly options: TransactionManagerOptions,
    private readonly dispatch: Dispatcher = task => task()
  ) {}

  public get pendingCount(): number {
    return this.client.size;
  }

  public sendRequest(request: SipMessage, handlers: TransactionHandlers): TransactionHandle {
    const branch = request.getBranch();
    const method = request.getMethod();
    if (!branch || !method) {
      throw new SipError(SipErrorCode.INVALID_ARGUMENT, 'Client transaction needs a request with a Via branch');
    }
    if (method === SipMethod.ACK) {
      throw new SipError(SipErrorCode.INVALID_ARGUMENT, 'ACK is sent outside of client transactions');
    }

    const id = transactionKey(branch, method);
    if (this.client.has(id)) {
      throw new SipError(SipErrorCode.INVALID_ARGUMENT, `Transaction ${id} already exists`);
    }

    const transaction = new ClientTransaction(id, branch, method, request, handlers, this.options.t1Ms);
    this.client.set(id, transaction);

    this.send(request);
    if (!this.options.reliable) this.scheduleRetransmit(transaction);
    this.scheduleTimeout(transaction, this.options.timeoutMs);

    this.logger.debug(`Client transaction ${id} started`);
    return transaction;
  }

  /** Returns false when no transaction matched; the response is dropped. */
  public onResponseReceived(response: SipMessage): boolean {
    const branch = response.getBranch();
    const method = response.getCSeqMethod();
    const status = response.getStatusCode();
    if (!branch || !method || status === undefined) {
      this.logger.warn('Dropping response without branch or CSeq method');
      return false;
    }

    const id = transactionKey(branch, method);
    const transaction = this.client.get(id);
    if (!transaction || transaction.terminated) {
      this.logger.warn(`Dropping unmatched response ${status} for ${id} (Call-ID ${response.getCallId()})`);
      return false;
    }

    if (isProvisional(status)) {
      this.onProvisional(transaction);
      transaction.handlers.onProvisional?.(response, transaction);
      return true;
    }

    this.terminate(transaction);
    if (transaction.method === SipMethod.INVITE && !isSuccess(status)) {
      this.send(this.buildAckForFailure(transaction.request, response));
    }
    transaction.handlers.onFinal(response, transaction);
    return true;
  }

  /**
   * Returns false when the request is a retransmission (the last response is
   * sent again) or the ACK of a non-2xx final response.
   */
  public onRequestReceived(request: SipMessage): boolean {
    const branch = request.getBranch();
    const method = request.getMethod();
    if (!branch || !method) return true;

    if (method === SipMethod.ACK) {
      const invite = this.server.get(transactionKey(branch, SipMethod.INVITE));
      const status = invite?.lastResponse?.getStatusCode();
      if (status !== undefined && status >= 300) {
        this.logger.debug(`Absorbed ACK for ${status} on branch ${branch}`);
        return false;
      }
      return true;
    }

    const id = transactionKey(branch, method);
    const existing = this.server.get(id);
    if (existing) {
      this.logger.debug(`Retransmitted ${method} on branch ${branch}`);
      if (existing.lastResponse) this.send(existing.lastResponse);
      return false;
    }

    const timeout = setTimeout(() => this.server.delete(id), this.options.timeoutMs);
    this.server.set(id, { method, timeout });
    return true;
  }

  public sendResponse(request: SipMessage, response: SipMessage): void {
    const branch = request.getBranch();
    const method = request.getMethod();
    if (branch && method) {
      const entry = this.server.get(transactionKey(branch, method));
      if (entry) entry.lastResponse = response;
    }
    this.send(response);
  }

  /** ACK for 2xx and other messages that do not open a transaction. */
  public sendStateless(message: SipMessage): void {
    this.send(message);
  }

  public dispose(): void {
    for (const transaction of this.client.values()) transaction.clearTimers();
    for (const entry of this.server.values()) clearTimeout(entry.timeout);
    this.client.clear();
    this.server.clear();
  }

  private onProvisional(transaction: ClientTransaction): void {
    if (transaction.proceeding) return;
    transaction.proceeding = true;

    if (transaction.method === SipMethod.INVITE) {
      if (transaction.retransmitTimer) clearTimeout(transaction.retransmitTimer);
      transaction.retransmitTimer = undefined;
      this.scheduleTimeout(transaction, this.options.inviteProceedingTimeoutMs);
    } else {
      transaction.retransmitIntervalMs = this.options.t2Ms;
    }
  }

  private scheduleRetransmit(transaction: ClientTransaction): void {
    transaction.retransmitTimer = setTimeout(() => {
      if (transaction.terminated) return;
      this.logger.debug(`Retransmitting ${transaction.id}`);
      this.send(transaction.request);
      transaction.retransmitIntervalMs = Math.min(transaction.retransmitIntervalMs * 2, this.options.t2Ms);
      this.scheduleRetransmit(transaction);
    }, transaction.retransmitIntervalMs);
  }

  private scheduleTimeout(transaction: ClientTransaction, delayMs: number): void {
    if (transaction.timeoutTimer) clearTimeout(transaction.timeoutTimer);
    transaction.timeoutTimer = setTimeout(() => {
      if (transaction.terminated) return;
      this.terminate(transaction);
      this.logger.warn(`Transaction ${transaction.id} timed out after ${delayMs}ms`);
      const error = new SipError(
        SipErrorCode.TRANSACTION_TIMEOUT,
        `No final response to ${transaction.method} within ${delayMs}ms`
      );
      this.dispatch(() => transaction.handlers.onTimeout(error, transaction));
    }, delayMs);
  }

  private terminate(transaction: ClientTransaction): void {
    transaction.terminated = true;
    transaction.clearTimers();
    this.client.delete(transaction.id);
  }

  private buildAckForFailure(invite: SipMessage, response: SipMessage): SipMessage {
    const cseq = invite.getCSeq();
    return SipMessage.request({
      method: SipMethod.ACK,
      uri: invite.getRequestUri() ?? '',
      headers: [
        ['Via', invite.getTopVia() ?? ''],
        ['Route', invite.getHeader('Route')],
        ['Max-Forwards', MAX_FORWARDS],
        ['From', invite.getFirstHeader('From') ?? ''],
        ['To', response.getFirstHeader('To') ?? ''],
        ['Call-ID', invite.getCallId() ?? ''],
        ['CSeq', `${cseq?.seq ?? 1} ${SipMethod.ACK}`],
      ],
    });
  }
}
