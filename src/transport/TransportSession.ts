import type { EventEmitter } from 'events';
import WebSocket from 'ws';
import { MAX_SIP_MESSAGE_BYTES, WS_SUBPROTOCOL } from '../constants';
import { TransportState } from '../engine/events';
import type { Logger } from '../logging/Logger';
import { SipError, SipErrorCode } from '../sip/SipError';

/** The part of a `ws` client the session relies on. */
export interface SignalingSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string, callback?: (error?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type SocketFactory = (url: string, protocol: string) => SignalingSocket;

export interface TransportOptions {
  url: string;
  keepaliveIntervalMs: number;
  keepaliveGraceMs: number;
  reconnectInitialMs: number;
  reconnectMaxMs: number;
  reconnectFactor: number;
  /** 0 keeps retrying forever. */
  reconnectMaxAttempts: number;
  maxMessageBytes?: number;
}

export interface TransportListener {
  onMessage(text: string): void;
  onStateChange(previous: TransportState, state: TransportState, code?: SipErrorCode, reason?: string): void;
}

const OPEN = 1;

const defaultSocketFactory: SocketFactory = (url, protocol) => new WebSocket(url, protocol);

const decodeFrame = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
};

/**
 * One WebSocket to the SIP server. Frames sent while the socket is down are
 * queued and flushed on (re)connect. Every keepalive ping must be followed by
 * a pong or some traffic within the grace period, or the socket is dropped.
 */
export class TransportSession {
  private socket?: SignalingSocket;
  private current: TransportState = TransportState.Disconnected;
  private listener?: TransportListener;
  private readonly queue: string[] = [];
  private keepaliveTimer?: NodeJS.Timeout;
  private graceTimer?: NodeJS.Timeout;
  private reconnectTimer?: NodeJS.Timeout;
  private reconnectDelayMs: number;
  private attempts = 0;
  private lastActivity = 0;
  private closing = false;

  constructor(
    private readonly options: TransportOptions,
    private readonly logger: Logger,
    private readonly socketFactory: SocketFactory = defaultSocketFactory
  ) {
    this.reconnectDelayMs = options.reconnectInitialMs;
  }

  public get state(): TransportState {
    return this.current;
  }

  public get queuedCount(): number {
    return this.queue.length;
  }

  public attach(listener: TransportListener): void {
    this.listener = listener;
  }

  public connect(): void {
    if (this.current === TransportState.Connecting || this.current === TransportState.Connected) return;
    this.closing = false;
    this.setState(TransportState.Connecting);
    this.openSocket();
  }

  public send(text: string): void {
    const size = Buffer.byteLength(text, 'utf8');
    const limit = this.options.maxMessageBytes ?? MAX_SIP_MESSAGE_BYTES;
    if (size > limit) {
      throw new SipError(SipErrorCode.MESSAGE_TOO_LARGE, `Outbound frame of ${size} bytes exceeds ${limit}`);
    }
    if (this.current !== TransportState.Connected || this.socket?.readyState !== OPEN) {
      this.queue.push(text);
      return;
    }
    this.write(text);
  }

  public close(): void {
    this.closing = true;
    this.clearTimers();
    this.queue.length = 0;
    const socket = this.socket;
    this.socket = undefined;
    if (socket) {
      socket.removeAllListeners();
      socket.on('error', () => undefined);
      socket.close(1000, 'closing');
    }
    this.setState(TransportState.Closed);
  }

  private openSocket(): void {
    const socket = this.socketFactory(this.options.url, WS_SUBPROTOCOL);
    this.socket = socket;

    socket.on('open', () => {
      if (socket !== this.socket) return;
      this.logger.info(`SIP WebSocket connected: ${this.options.url}`);
      this.attempts = 0;
      this.reconnectDelayMs = this.options.reconnectInitialMs;
      this.markActivity();
      this.setState(TransportState.Connected);
      this.startKeepalive();
      this.flush();
    });

    socket.on('message', (data: WebSocket.RawData) => {
      if (socket !== this.socket) return;
      this.markActivity();
      const text = decodeFrame(data);
      const limit = this.options.maxMessageBytes ?? MAX_SIP_MESSAGE_BYTES;
      if (Buffer.byteLength(text, 'utf8') > limit) {
        this.logger.warn(`Dropping inbound frame larger than ${limit} bytes`);
        return;
      }
      // RFC 5626 keepalive CRLF
      if (!text.trim()) return;
      this.listener?.onMessage(text);
    });

    socket.on('pong', () => {
      if (socket === this.socket) this.markActivity();
    });

    socket.on('error', (error: Error) => {
      this.logger.warn(`SIP WebSocket error: ${error.message}`);
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (socket !== this.socket) return;
      const text = reason.length > 0 ? reason.toString('utf8') : `code ${code}`;
      this.onDown(`WebSocket closed (${text})`);
    });
  }

  private write(text: string): void {
    this.socket?.send(text, error => {
      if (error) this.logger.warn(`SIP WebSocket send failed: ${error.message}`);
    });
  }

  private flush(): void {
    while (this.queue.length > 0 && this.socket?.readyState === OPEN) {
      const next = this.queue.shift();
      if (next !== undefined) this.write(next);
    }
  }

  private startKeepalive(): void {
    this.stopKeepalive();
    const { keepaliveIntervalMs, keepaliveGraceMs } = this.options;
    if (keepaliveIntervalMs <= 0) return;

    this.keepaliveTimer = setInterval(() => {
      try {
        this.socket?.ping();
      } catch (error) {
        this.logger.warn('SIP WebSocket ping failed', error);
      }
      if (!this.graceTimer) {
        this.graceTimer = setTimeout(() => this.dropSilentSocket(), keepaliveGraceMs);
      }
    }, keepaliveIntervalMs);
  }

  private markActivity(): void {
    this.lastActivity = Date.now();
    if (this.graceTimer) clearTimeout(this.graceTimer);
    this.graceTimer = undefined;
  }

  private dropSilentSocket(): void {
    this.graceTimer = undefined;
    const silentMs = Date.now() - this.lastActivity;
    this.logger.warn(`SIP WebSocket silent for ${silentMs}ms, dropping it`);
    const socket = this.socket;
    this.socket = undefined;
    socket?.removeAllListeners();
    socket?.on('error', () => undefined);
    socket?.terminate();
    this.onDown('Keepalive timeout');
  }

  private onDown(reason: string): void {
    this.stopKeepalive();
    this.socket = undefined;
    if (this.closing) return;

    const { reconnectMaxAttempts } = this.options;
    if (reconnectMaxAttempts > 0 && this.attempts >= reconnectMaxAttempts) {
      this.logger.error(`SIP WebSocket gave up after ${this.attempts} reconnect attempts`);
      this.setState(TransportState.Closed, SipErrorCode.TRANSPORT_DOWN, reason);
      return;
    }
    this.setState(TransportState.Reconnecting, SipErrorCode.TRANSPORT_DOWN, reason);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    const delay = Math.min(this.reconnectDelayMs, this.options.reconnectMaxMs);
    this.attempts += 1;
    this.logger.warn(`SIP WebSocket reconnect #${this.attempts} in ${delay}ms`);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.openSocket();
    }, delay);
    this.reconnectDelayMs = Math.min(this.options.reconnectMaxMs, Math.floor(delay * this.options.reconnectFactor));
  }

  private setState(next: TransportState, code?: SipErrorCode, reason?: string): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.logger.info(`SIP transport: ${previous} -> ${next}${reason ? ` (${reason})` : ''}`);
    this.listener?.onStateChange(previous, next, code, reason);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) clearInterval(this.keepaliveTimer);
    if (this.graceTimer) clearTimeout(this.graceTimer);
    this.keepaliveTimer = undefined;
    this.graceTimer = undefined;
  }

  private clearTimers(): void {
    this.stopKeepalive();
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;
  }
}
