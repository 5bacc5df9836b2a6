// src/sip/SipMessage.ts
import crypto from 'crypto';
import { BRANCH_MAGIC_COOKIE, SIP_VERSION } from '../constants';
import {
  ROUTING_HEADERS,
  canonicalHeaderName,
  getHeaderParam,
  isListHeader,
  splitHeaderList,
} from './headers';
import { SipError, SipErrorCode } from './SipError';

export type HeaderEntries = Array<[string, string | string[]]>;

export interface SipRequestInit {
  method: string;
  uri: string;
  headers?: HeaderEntries;
  body?: string;
}

export interface SipResponseInit {
  status: number;
  reason: string;
  headers?: HeaderEntries;
  body?: string;
}

export interface CSeq {
  seq: number;
  method: string;
}

type StartLine =
  | { kind: 'request'; method: string; uri: string }
  | { kind: 'response'; status: number; reason: string };

const REQUEST_LINE = /^([A-Za-z]+)\s+(\S+)\s+SIP\/2\.0$/;
const STATUS_LINE = /^SIP\/2\.0\s+([1-6]\d\d)(?:\s+(.*))?$/;
const CSEQ_PATTERN = /^(\d+)\s+([A-Za-z]+)$/;
const ONE_VALUE_PER_LINE = new Set(['Via', 'Route', 'Record-Route', 'Contact']);

const malformed = (message: string): SipError => new SipError(SipErrorCode.MALFORMED_MESSAGE, message);

export class SipMessage {
  public headers: Map<string, string[]>;
  public body: string;
  private start: StartLine;

  private constructor(start: StartLine, headers: HeaderEntries = [], body = '') {
    this.start = start;
    this.headers = new Map();
    this.body = body;
    for (const [name, value] of headers) {
      for (const item of Array.isArray(value) ? value : [value]) {
        this.addHeader(name, item);
      }
    }
  }

  static request(init: SipRequestInit): SipMessage {
    return new SipMessage(
      { kind: 'request', method: init.method.toUpperCase(), uri: init.uri },
      init.headers,
      init.body
    );
  }

  static response(init: SipResponseInit): SipMessage {
    return new SipMessage({ kind: 'response', status: init.status, reason: init.reason }, init.headers, init.body);
  }

  /**
   * Decodes one SIP message. Throws `SipError(MALFORMED_MESSAGE)` when the
   * start-line cannot be read, a mandatory header is missing or
   * Content-Length disagrees with the body.
   */
  static parse(raw: string | Buffer): SipMessage {
    const text = SipMessage.decode(raw);
    const separator = SipMessage.findHeaderEnd(text);
    const head = separator ? text.slice(0, separator.index) : text;
    const body = separator ? text.slice(separator.index + separator.length) : '';

    const lines = head.split(/\r?\n/);
    while (lines.length && lines[0].trim() === '') lines.shift();
    const startLine = lines.shift();
    if (!startLine) throw malformed('Empty SIP message');

    const message = new SipMessage(SipMessage.parseStartLine(startLine.trim()), [], body);

    const unfolded: string[] = [];
    for (const line of lines) {
      if (line === '') continue;
      if (/^[ \t]/.test(line)) {
        if (!unfolded.length) throw malformed('Continuation line before any header');
        unfolded[unfolded.length - 1] += ` ${line.trim()}`;
        continue;
      }
      unfolded.push(line);
    }

    for (const line of unfolded) {
      const colon = line.indexOf(':');
      if (colon <= 0) throw malformed(`Invalid header line: ${line}`);
      message.addHeader(line.slice(0, colon), line.slice(colon + 1));
    }

    message.verifyContentLength();
    message.verifyMandatoryHeaders();
    return message;
  }

  /**
   * Lenient read of a request that failed `parse`, keeping only what is
   * needed to answer it with an error response.
   */
  static salvageRequest(raw: string | Buffer): SipMessage | undefined {
    const text = SipMessage.decode(raw);
    const separator = SipMessage.findHeaderEnd(text);
    const lines = (separator ? text.slice(0, separator.index) : text).split(/\r?\n/).filter(line => line.trim());
    const request = lines.shift()?.trim().match(REQUEST_LINE);
    if (!request) return undefined;

    const message = new SipMessage({ kind: 'request', method: request[1].toUpperCase(), uri: request[2] });
    for (const line of lines) {
      const colon = line.indexOf(':');
      if (colon <= 0 || /^[ \t]/.test(line)) continue;
      const name = canonicalHeaderName(line.slice(0, colon));
      if (['Via', 'Call-ID', 'CSeq', 'From', 'To'].includes(name)) {
        message.addHeader(name, line.slice(colon + 1));
      }
    }
    const complete = ['Via', 'Call-ID', 'CSeq', 'From', 'To'].every(name => message.hasHeader(name));
    return complete ? message : undefined;
  }

  // CRLFs ahead of the start-line are ignored (RFC 3261 7.5)
  private static decode(raw: string | Buffer): string {
    const text = typeof raw === 'string' ? raw : raw.toString('utf8');
    return text.replace(/^(?:\r?\n)+/, '');
  }

  private static findHeaderEnd(text: string): { index: number; length: number } | null {
    const crlf = text.indexOf('\r\n\r\n');
    const lf = text.indexOf('\n\n');
    if (crlf !== -1 && (lf === -1 || crlf < lf)) return { index: crlf, length: 4 };
    if (lf !== -1) return { index: lf, length: 2 };
    return null;
  }

  private static parseStartLine(line: string): StartLine {
    const status = line.match(STATUS_LINE);
    if (status) {
      return { kind: 'response', status: Number.parseInt(status[1], 10), reason: status[2]?.trim() ?? '' };
    }
    const request = line.match(REQUEST_LINE);
    if (request) {
      return { kind: 'request', method: request[1].toUpperCase(), uri: request[2] };
    }
    throw malformed(`Unparsable start-line: ${line}`);
  }

  private verifyContentLength(): void {
    const declared = this.getFirstHeader('Content-Length');
    this.removeHeader('Content-Length');
    if (declared === undefined) return;
    if (!/^\d+$/.test(declared)) throw malformed(`Invalid Content-Length: ${declared}`);
    const actual = Buffer.byteLength(this.body, 'utf8');
    if (Number.parseInt(declared, 10) !== actual) {
      throw malformed(`Content-Length ${declared} does not match body of ${actual} bytes`);
    }
  }

  private verifyMandatoryHeaders(): void {
    const required = this.isResponse() ? ['Call-ID', 'CSeq', 'From', 'To'] : ['Call-ID', 'CSeq', 'From', 'To', 'Via'];
    for (const name of required) {
      if (!this.getFirstHeader(name)) throw malformed(`Missing mandatory header ${name}`);
    }
    if (!this.getCSeq()) throw malformed(`Invalid CSeq: ${this.getFirstHeader('CSeq')}`);
  }

  public isResponse(): boolean {
    return this.start.kind === 'response';
  }

  public isRequest(): boolean {
    return this.start.kind === 'request';
  }

  public get startLine(): string {
    return this.start.kind === 'request'
      ? `${this.start.method} ${this.start.uri} ${SIP_VERSION}`
      : `${SIP_VERSION} ${this.start.status} ${this.start.reason}`;
  }

  public getHeader(name: string): string[] {
    return this.headers.get(canonicalHeaderName(name)) || [];
  }

  public getFirstHeader(name: string): string | undefined {
    return this.getHeader(name)[0];
  }

  public hasHeader(name: string): boolean {
    return this.getHeader(name).length > 0;
  }

  public setHeader(name: string, value: string | string[]): void {
    this.removeHeader(name);
    for (const item of Array.isArray(value) ? value : [value]) {
      this.addHeader(name, item);
    }
  }

  public addHeader(name: string, value: string): void {
    const key = canonicalHeaderName(name);
    const trimmed = value.trim();
    const values = isListHeader(key) ? splitHeaderList(trimmed) : [trimmed];
    if (!values.length) return;
    const arr = this.headers.get(key) ?? [];
    arr.push(...values);
    this.headers.set(key, arr);
  }

  public removeHeader(name: string): void {
    this.headers.delete(canonicalHeaderName(name));
  }

  public getCallId(): string | undefined {
    return this.getFirstHeader('Call-ID');
  }

  public getStatusCode(): number | undefined {
    return this.start.kind === 'response' ? this.start.status : undefined;
  }

  public getReasonPhrase(): string | undefined {
    return this.start.kind === 'response' ? this.start.reason : undefined;
  }

  public getMethod(): string | undefined {
    return this.start.kind === 'request' ? this.start.method : undefined;
  }

  public getRequestUri(): string | undefined {
    return this.start.kind === 'request' ? this.start.uri : undefined;
  }

  public getCSeq(): CSeq | undefined {
    const match = this.getFirstHeader('CSeq')?.match(CSEQ_PATTERN);
    if (!match) return undefined;
    return { seq: Number.parseInt(match[1], 10), method: match[2].toUpperCase() };
  }

  public getCSeqMethod(): string | undefined {
    return this.getCSeq()?.method;
  }

  public getTopVia(): string | undefined {
    return this.getFirstHeader('Via');
  }

  public getBranchFromVia(viaLine: string): string | undefined {
    return getHeaderParam(viaLine, 'branch') ?? undefined;
  }

  public getBranch(): string | undefined {
    const topVia = this.getTopVia();
    return topVia ? this.getBranchFromVia(topVia) : undefined;
  }

  public getFromTag(): string | undefined {
    const from = this.getFirstHeader('From');
    return from ? getHeaderParam(from, 'tag') ?? undefined : undefined;
  }

  public getToTag(): string | undefined {
    const to = this.getFirstHeader('To');
    return to ? getHeaderParam(to, 'tag') ?? undefined : undefined;
  }

  public getContactHeaders(): string[] {
    return this.getHeader('Contact');
  }

  public addViaTop(newVia: string): void {
    this.setHeader('Via', [newVia, ...this.getHeader('Via')]);
  }

  public clone(): SipMessage {
    const copy = new SipMessage({ ...this.start }, [], this.body);
    for (const [name, values] of this.headers) {
      copy.headers.set(name, [...values]);
    }
    return copy;
  }

  /**
   * Serializes the message: Via first, then the routing headers, then the
   * rest in insertion order. Content-Length is always recomputed.
   */
  public build(): string {
    const names = [
      'Via',
      ...ROUTING_HEADERS,
      ...[...this.headers.keys()].filter(
        name => name !== 'Via' && name !== 'Content-Length' && !ROUTING_HEADERS.some(r => r === name)
      ),
    ];

    const lines: string[] = [];
    for (const name of names) {
      const values = this.headers.get(name);
      if (!values?.length) continue;
      if (ONE_VALUE_PER_LINE.has(name) || !isListHeader(name)) {
        lines.push(...values.map(value => `${name}: ${value}`));
      } else {
        lines.push(`${name}: ${values.join(', ')}`);
      }
    }
    lines.push(`Content-Length: ${Buffer.byteLength(this.body, 'utf8')}`);

    return `${this.startLine}\r\n${lines.join('\r\n')}\r\n\r\n${this.body}`;
  }

  public toString(): string {
    return this.build();
  }
}

export const generateBranch = (): string => `${BRANCH_MAGIC_COOKIE}${crypto.randomBytes(8).toString('hex')}`;

export const generateTag = (): string => crypto.randomBytes(6).toString('hex');

export const generateCallId = (): string => crypto.randomUUID();
