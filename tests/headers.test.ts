import { describe, expect, it } from 'vitest';
import { canonicalHeaderName, getHeaderParam, splitHeaderList } from '../src/sip/headers';
import { formatNameAddr, normalizeTarget, parseNameAddr, parseUri } from '../src/sip/SipUri';

describe('header helpers', () => {
  it('canonicalizes compact and irregular header names', () => {
    expect(canonicalHeaderName('i')).toBe('Call-ID');
    expect(canonicalHeaderName('call-id')).toBe('Call-ID');
    expect(canonicalHeaderName('CSEQ')).toBe('CSeq');
    expect(canonicalHeaderName('www-authenticate')).toBe('WWW-Authenticate');
    expect(canonicalHeaderName('max-forwards')).toBe('Max-Forwards');
    expect(canonicalHeaderName('m')).toBe('Contact');
  });

  it('splits lists outside quotes and angle brackets', () => {
    expect(splitHeaderList('"Doe, John" <sip:j@example.com>, <sip:k@example.com;a=1,2>')).toEqual([
      '"Doe, John" <sip:j@example.com>',
      '<sip:k@example.com;a=1,2>',
    ]);
  });

  it('reads header parameters but not URI parameters', () => {
    const value = '<sip:alice@example.com;transport=ws>;tag=9;expires=60';
    expect(getHeaderParam(value, 'tag')).toBe('9');
    expect(getHeaderParam(value, 'EXPIRES')).toBe('60');
    expect(getHeaderParam(value, 'transport')).toBeUndefined();
    expect(getHeaderParam('SIP/2.0/WSS x.invalid;branch=z9hG4bK1;rport', 'rport')).toBeNull();
  });
});

describe('SIP URIs', () => {
  it('parses a URI with port and parameters', () => {
    expect(parseUri('sip:alice@example.com:5060;transport=ws')).toEqual({
      scheme: 'sip',
      user: 'alice',
      host: 'example.com',
      port: 5060,
      params: { transport: 'ws' },
    });
    expect(parseUri('mailto:alice@example.com')).toBeUndefined();
  });

  it('parses and formats name-addr values', () => {
    const parsed = parseNameAddr('"Bob" <sip:bob@example.com>;tag=xyz');
    expect(parsed).toEqual({ displayName: 'Bob', uri: 'sip:bob@example.com', params: { tag: 'xyz' } });
    expect(formatNameAddr(parsed)).toBe('"Bob" <sip:bob@example.com>;tag=xyz');
    expect(parseNameAddr('sip:carol@example.com;tag=1')).toEqual({
      uri: 'sip:carol@example.com',
      params: { tag: '1' },
    });
  });

  it('normalizes dial targets', () => {
    expect(normalizeTarget('1002', 'example.com')).toBe('sip:1002@example.com');
    expect(normalizeTarget('bob@other.net', 'example.com')).toBe('sip:bob@other.net');
    expect(normalizeTarget('sips:carol@secure.example.com', 'example.com')).toBe('sips:carol@secure.example.com');
  });
});
