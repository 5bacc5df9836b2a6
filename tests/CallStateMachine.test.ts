import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CallStateMachine, type CallContext } from '../src/calls/CallStateMachine';
import { CallState } from '../src/engine/events';
import { SipError, SipErrorCode } from '../src/sip/SipError';
import { SipMessage } from '../src/sip/SipMessage';
import { TransactionManager } from '../src/sip/TransactionManager';
import { SAMPLE_SDP, WireRecorder, createTestLogger, replyTo, testSettings } from './utils';

const REMOTE_CONTACT = '<sip:1002@192.0.2.20;transport=ws>';

const setup = () => {
  const wire = new WireRecorder();
  const logger = createTestLogger();
  const transactions = new TransactionManager(wire.send, logger, {
    reliable: true,
    t1Ms: 500,
    t2Ms: 4000,
    timeoutMs: 32000,
    inviteProceedingTimeoutMs: 180000,
  });
  const onStateChange = vi.fn();
  const onDtmfResult = vi.fn();
  const context: CallContext = {
    account: { username: '1001', password: 'test-secret', domain: 'example.com' },
    accountKey: '1001@example.com',
    transactions,
    settings: testSettings,
    logger,
    dispatch: task => task(),
    ackTimeoutMs: 32000,
    dtmfGapMs: 150,
    dtmfDefaultDurationMs: 160,
    onStateChange,
    onDtmfResult,
    cnonceFactory: () => '0a4f113b',
  };
  const states = (): string[] => onStateChange.mock.calls.map(call => `${call[1]}->${call[2]}`);
  return { wire, logger, transactions, context, onStateChange, onDtmfResult, states };
};

const inboundRequest = (lines: string[], body = ''): SipMessage => {
  const head = body ? [...lines, 'Content-Type: application/sdp'] : lines;
  return SipMessage.parse(`${head.join('\r\n')}\r\nContent-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`);
};

const INBOUND_INVITE = [
  'INVITE sip:1001@client.invalid;transport=ws SIP/2.0',
  'Via: SIP/2.0/WSS proxy.example.com;branch=z9hG4bKin1',
  'Record-Route: <sip:proxy.example.com;lr>',
  'From: "Bob" <sip:1002@example.com>;tag=caller',
  'To: <sip:1001@example.com>',
  'Call-ID: inbound-1',
  'CSeq: 10 INVITE',
  `Contact: ${REMOTE_CONTACT}`,
];

const inDialog = (method: string, cseq: number, localTag: string, branch: string): SipMessage =>
  inboundRequest([
    `${method} sip:1001@client.invalid;transport=ws SIP/2.0`,
    `Via: SIP/2.0/WSS proxy.example.com;branch=${branch}`,
    'From: "Bob" <sip:1002@example.com>;tag=caller',
    `To: <sip:1001@example.com>;tag=${localTag}`,
    'Call-ID: inbound-1',
    `CSeq: ${cseq} ${method}`,
  ]);

const errorCodeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (error) {
    return error instanceof SipError ? error.code : 'not a SipError';
  }
  return undefined;
};

describe('CallStateMachine (outbound)', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('goes Calling -> Ringing -> Connected and ACKs the 200 along the route set', () => {
    const { wire, transactions, context, states } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-1');
    call.makeCall(SAMPLE_SDP);

    const invite = wire.last();
    expect(invite.startLine).toBe('INVITE sip:1002@example.com SIP/2.0');
    expect(invite.getFirstHeader('Content-Type')).toBe('application/sdp');
    expect(invite.getFirstHeader('Contact')).toBe('<sip:1001@client.invalid;transport=ws>');
    expect(invite.body).toBe(SAMPLE_SDP);
    expect(call.state).toBe(CallState.Calling);

    transactions.onResponseReceived(replyTo(invite, 100, 'Trying'));
    expect(call.state).toBe(CallState.Calling);
    transactions.onResponseReceived(replyTo(invite, 180, 'Ringing', { toTag: 'callee' }));
    expect(call.state).toBe(CallState.Ringing);

    transactions.onResponseReceived(
      replyTo(invite, 200, 'OK', {
        toTag: 'callee',
        headers: [
          ['Record-Route', '<sip:proxy1.example.com;lr>'],
          ['Record-Route', '<sip:proxy2.example.com;lr>'],
          ['Contact', '<sip:1002@192.0.2.20:8089;transport=ws>'],
        ],
      })
    );

    const ack = wire.last();
    expect(ack.startLine).toBe('ACK sip:1002@192.0.2.20:8089;transport=ws SIP/2.0');
    expect(ack.getHeader('Route')).toEqual(['<sip:proxy2.example.com;lr>', '<sip:proxy1.example.com;lr>']);
    expect(ack.getFirstHeader('CSeq')).toBe('1 ACK');
    expect(ack.getToTag()).toBe('callee');
    expect(ack.getBranch()).not.toBe(invite.getBranch());
    expect(call.state).toBe(CallState.Connected);
    expect(states()).toEqual(['Idle->Calling', 'Calling->Ringing', 'Ringing->Connected']);
  });

  it('sends CANCEL, not BYE, when hanging up before any response', () => {
    const { wire, transactions, context, states } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-2');
    call.makeCall();
    const invite = wire.last();

    call.hangup();

    const cancel = wire.last();
    expect(cancel.getMethod()).toBe('CANCEL');
    expect(cancel.getBranch()).toBe(invite.getBranch());
    expect(cancel.getFirstHeader('CSeq')).toBe('1 CANCEL');
    expect(wire.requests('BYE')).toHaveLength(0);
    expect(call.state).toBe(CallState.Terminating);

    transactions.onResponseReceived(replyTo(cancel, 200, 'OK'));
    transactions.onResponseReceived(replyTo(invite, 487, 'Request Terminated', { toTag: 'callee' }));

    expect(wire.requests('ACK')).toHaveLength(1);
    expect(wire.requests('BYE')).toHaveLength(0);
    expect(call.state).toBe(CallState.Ended);
    expect(states()).toEqual(['Idle->Calling', 'Calling->Terminating', 'Terminating->Ended']);
  });

  it('sends ACK and BYE when a 200 arrives after the CANCEL', () => {
    const { wire, transactions, context, onStateChange, states } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-3');
    call.makeCall();
    const invite = wire.last();
    call.hangup();

    transactions.onResponseReceived(replyTo(invite, 200, 'OK', { toTag: 'callee', headers: [['Contact', REMOTE_CONTACT]] }));

    const [ack, bye] = wire.sent.slice(-2);
    expect(ack.getMethod()).toBe('ACK');
    expect(bye.startLine).toBe('BYE sip:1002@192.0.2.20;transport=ws SIP/2.0');
    expect(bye.getFirstHeader('CSeq')).toBe('2 BYE');
    expect(bye.getToTag()).toBe('callee');
    expect(call.state).toBe(CallState.Terminating);

    transactions.onResponseReceived(replyTo(bye, 200, 'OK'));
    expect(call.state).toBe(CallState.Ended);
    expect(states()).toEqual(['Idle->Calling', 'Calling->Terminating', 'Terminating->Ended']);
    expect(onStateChange).toHaveBeenLastCalledWith(call, CallState.Terminating, CallState.Ended, 'Cancelled');
  });

  it('retries the INVITE once with proxy credentials', () => {
    const { wire, transactions, context } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-4');
    call.makeCall();
    const invite = wire.last();

    transactions.onResponseReceived(
      replyTo(invite, 407, 'Proxy Authentication Required', {
        toTag: 'proxy',
        headers: [['Proxy-Authenticate', 'Digest realm="example.com", nonce="abc123", qop="auth"']],
      })
    );

    const retry = wire.last();
    expect(wire.requests('ACK')).toHaveLength(1);
    expect(retry.getMethod()).toBe('INVITE');
    expect(retry.getFirstHeader('CSeq')).toBe('2 INVITE');
    expect(retry.getFirstHeader('Proxy-Authorization')).toContain('response="6ffedf7e4d7d3ff07aca25cb3bd26c67"');
    expect(call.state).toBe(CallState.Calling);

    transactions.onResponseReceived(replyTo(retry, 200, 'OK', { toTag: 'callee', headers: [['Contact', REMOTE_CONTACT]] }));
    expect(call.state).toBe(CallState.Connected);
  });

  it('fails on a busy final response', () => {
    const { transactions, context, onStateChange, wire } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-5');
    call.makeCall();
    transactions.onResponseReceived(replyTo(wire.last(), 486, 'Busy Here', { toTag: 'callee' }));

    expect(call.state).toBe(CallState.Failed);
    expect(call.snapshot().endReason).toBe('486 Busy Here');
    expect(onStateChange).toHaveBeenLastCalledWith(call, CallState.Calling, CallState.Failed, '486 Busy Here');
  });

  it('ACKs and hangs up a 200 that arrives after the call failed', () => {
    const { wire, transactions, context, states } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-7');
    call.makeCall();
    const invite = wire.last();

    call.fail('Transport lost');
    expect(call.state).toBe(CallState.Failed);

    expect(() =>
      transactions.onResponseReceived(
        replyTo(invite, 200, 'OK', { toTag: 'callee', headers: [['Contact', REMOTE_CONTACT]] })
      )
    ).not.toThrow();

    expect(wire.requests('ACK')).toHaveLength(1);
    const bye = wire.last();
    expect(bye.startLine).toBe('BYE sip:1002@192.0.2.20;transport=ws SIP/2.0');
    expect(bye.getToTag()).toBe('callee');
    expect(bye.getFirstHeader('CSeq')).toBe('2 BYE');

    transactions.onResponseReceived(replyTo(bye, 200, 'OK'));
    expect(call.state).toBe(CallState.Failed);
    expect(call.snapshot().endReason).toBe('Transport lost');
    expect(states()).toEqual(['Idle->Calling', 'Calling->Failed']);
  });

  it('ignores a failure response that arrives after the call failed', () => {
    const { wire, transactions, context, states } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-8');
    call.makeCall();
    const invite = wire.last();
    call.fail('Transport lost');

    transactions.onResponseReceived(
      replyTo(invite, 401, 'Unauthorized', {
        toTag: 'callee',
        headers: [['WWW-Authenticate', 'Digest realm="example.com", nonce="abc123"']],
      })
    );

    expect(wire.requests('INVITE')).toHaveLength(1);
    expect(call.state).toBe(CallState.Failed);
    expect(states()).toEqual(['Idle->Calling', 'Calling->Failed']);
  });

  it('fails when the INVITE times out', () => {
    const { context } = setup();
    const call = CallStateMachine.outbound(context, 'sip:1002@example.com', 'out-6');
    call.makeCall();
    vi.advanceTimersByTime(32000);

    expect(call.state).toBe(CallState.Failed);
    expect(call.snapshot().endReason).toBe('No final response to INVITE within 32000ms');
  });
});

describe('CallStateMachine (inbound)', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const ringing = () => {
    const harness = setup();
    const invite = inboundRequest(INBOUND_INVITE, SAMPLE_SDP);
    harness.transactions.onRequestReceived(invite);
    const call = CallStateMachine.inbound(harness.context, invite);
    call.onInviteReceived();
    return { ...harness, call, invite };
  };

  const connected = () => {
    const harness = ringing();
    harness.call.accept(SAMPLE_SDP);
    const ok = harness.wire.last();
    const localTag = ok.getToTag() ?? '';
    harness.call.handleRequest(inDialog('ACK', 10, localTag, 'z9hG4bKack1'));
    return { ...harness, localTag };
  };

  it('answers the INVITE with 100 and 180 and rings', () => {
    const { wire, call, states } = ringing();

    expect(wire.sent.map(message => message.getStatusCode())).toEqual([100, 180]);
    expect(wire.sent[0].getToTag()).toBeUndefined();
    expect(wire.sent[1].getToTag()).toMatch(/^[0-9a-f]{12}$/);
    expect(call.state).toBe(CallState.Ringing);
    expect(call.direction).toBe('inbound');
    expect(states()).toEqual(['Idle->Ringing']);
  });

  it('accepts with SDP, waits for ACK, then holds and resumes', () => {
    const { wire, transactions, call, states } = connected();

    const ok = wire.responses(200)[0];
    expect(ok.body).toBe(SAMPLE_SDP);
    expect(ok.getFirstHeader('Contact')).toBe('<sip:1001@client.invalid;transport=ws>');
    expect(call.state).toBe(CallState.Connected);

    vi.advanceTimersByTime(32000);
    expect(wire.requests('BYE')).toHaveLength(0);

    call.hold();
    const reinvite = wire.last();
    expect(reinvite.startLine).toBe('INVITE sip:1002@192.0.2.20;transport=ws SIP/2.0');
    expect(reinvite.getHeader('Route')).toEqual(['<sip:proxy.example.com;lr>']);
    expect(reinvite.getFirstHeader('CSeq')).toBe('1 INVITE');
    expect(reinvite.getToTag()).toBe('caller');
    expect(reinvite.body).toContain('a=sendonly');
    expect(reinvite.body).toContain('o=- 1000 2 IN IP4 192.0.2.10');
    expect(call.state).toBe(CallState.Connected);

    transactions.onResponseReceived(replyTo(reinvite, 200, 'OK', { body: SAMPLE_SDP }));
    expect(wire.last().getFirstHeader('CSeq')).toBe('1 ACK');
    expect(call.state).toBe(CallState.OnHold);

    call.resume();
    const resume = wire.last();
    expect(resume.getFirstHeader('CSeq')).toBe('2 INVITE');
    expect(resume.body).toContain('a=sendrecv');
    expect(resume.body).toContain('o=- 1000 3 IN IP4 192.0.2.10');

    transactions.onResponseReceived(replyTo(resume, 200, 'OK', { body: SAMPLE_SDP }));
    expect(call.state).toBe(CallState.Connected);
    expect(states()).toEqual(['Idle->Ringing', 'Ringing->Connected', 'Connected->OnHold', 'OnHold->Connected']);
  });

  it('sends BYE when the 200 is never acknowledged', () => {
    const { wire, call } = ringing();
    call.accept();
    vi.advanceTimersByTime(32000);

    expect(wire.requests('BYE')).toHaveLength(1);
    expect(call.state).toBe(CallState.Terminating);
    expect(call.snapshot().endReason).toBe('No ACK received');
  });

  it('declines with 603', () => {
    const { wire, call, states } = ringing();
    call.decline();

    expect(wire.last().getStatusCode()).toBe(603);
    expect(wire.last().getReasonPhrase()).toBe('Decline');
    expect(call.state).toBe(CallState.Ended);
    expect(states()).toEqual(['Idle->Ringing', 'Ringing->Ended']);
  });

  it('handles CANCEL from the caller with 200 and 487', () => {
    const { wire, call } = ringing();
    call.handleRequest(
      inboundRequest([
        'CANCEL sip:1001@client.invalid;transport=ws SIP/2.0',
        'Via: SIP/2.0/WSS proxy.example.com;branch=z9hG4bKin1',
        'From: "Bob" <sip:1002@example.com>;tag=caller',
        'To: <sip:1001@example.com>',
        'Call-ID: inbound-1',
        'CSeq: 10 CANCEL',
      ])
    );

    const [cancelOk, terminated] = wire.sent.slice(-2);
    expect(cancelOk.getStatusCode()).toBe(200);
    expect(cancelOk.getCSeqMethod()).toBe('CANCEL');
    expect(terminated.getStatusCode()).toBe(487);
    expect(terminated.getCSeqMethod()).toBe('INVITE');
    expect(call.state).toBe(CallState.Ended);
    expect(call.snapshot().endReason).toBe('Cancelled by caller');
  });

  it('ends on a remote BYE', () => {
    const { wire, call, localTag, states } = connected();
    call.handleRequest(inDialog('BYE', 11, localTag, 'z9hG4bKbye1'));

    expect(wire.last().getStatusCode()).toBe(200);
    expect(wire.last().getCSeqMethod()).toBe('BYE');
    expect(call.state).toBe(CallState.Ended);
    expect(states().slice(-2)).toEqual(['Connected->Terminating', 'Terminating->Ended']);
    expect(call.snapshot().endReason).toBe('Remote hangup');
  });

  it('answers a remote re-INVITE with the local SDP without changing state', () => {
    const { wire, call, localTag } = connected();
    call.handleRequest(inDialog('INVITE', 11, localTag, 'z9hG4bKre1'));

    const ok = wire.last();
    expect(ok.getStatusCode()).toBe(200);
    expect(ok.getCSeqMethod()).toBe('INVITE');
    expect(ok.body).toBe(SAMPLE_SDP);
    expect(call.state).toBe(CallState.Connected);
  });

  it('rejects out-of-order requests with 500', () => {
    const { wire, call, localTag } = connected();
    call.handleRequest(inDialog('INFO', 9, localTag, 'z9hG4bKold'));

    expect(wire.last().startLine).toBe('SIP/2.0 500 CSeq Out Of Order');
  });

  it('tears the dialog down when a re-INVITE gets 481', () => {
    const { wire, transactions, call } = connected();
    call.hold();
    transactions.onResponseReceived(replyTo(wire.last(), 481, 'Call/Transaction Does Not Exist'));

    const bye = wire.last();
    expect(bye.getMethod()).toBe('BYE');
    expect(call.state).toBe(CallState.Terminating);

    transactions.onResponseReceived(replyTo(bye, 200, 'OK'));
    expect(call.state).toBe(CallState.Ended);
    expect(call.snapshot().endReason).toBe('Dialog lost during hold: 481 Call/Transaction Does Not Exist');
  });

  it('refuses hold before the call is connected', () => {
    const { call } = ringing();
    expect(errorCodeOf(() => call.hold())).toBe(SipErrorCode.ILLEGAL_TRANSITION);
    expect(call.state).toBe(CallState.Ringing);
  });

  it('sends queued DTMF digits one at a time over INFO', () => {
    const { wire, transactions, call, onDtmfResult } = connected();

    call.sendDtmf('5');
    call.sendDtmf('#', 100);
    expect(wire.requests('INFO')).toHaveLength(1);

    const first = wire.last();
    expect(first.getFirstHeader('Content-Type')).toBe('application/dtmf-relay');
    expect(first.body).toBe('Signal=5\r\nDuration=160\r\n');

    transactions.onResponseReceived(replyTo(first, 200, 'OK'));
    expect(onDtmfResult).toHaveBeenCalledWith(call, '5', true);

    vi.advanceTimersByTime(149);
    expect(wire.requests('INFO')).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(wire.requests('INFO')).toHaveLength(2);
    expect(wire.last().body).toBe('Signal=#\r\nDuration=100\r\n');

    transactions.onResponseReceived(replyTo(wire.last(), 500, 'Server Internal Error'));
    expect(onDtmfResult).toHaveBeenLastCalledWith(call, '#', false);
  });

  it('rejects invalid DTMF digits', () => {
    const { call } = connected();
    expect(errorCodeOf(() => call.sendDtmf('X'))).toBe(SipErrorCode.INVALID_ARGUMENT);
  });

  it('queues a digit sequence in order', () => {
    const { wire, transactions, call, onDtmfResult } = connected();

    call.sendDtmfSequence('1a#', 120);
    expect(wire.requests('INFO')).toHaveLength(1);
    expect(wire.last().body).toBe('Signal=1\r\nDuration=120\r\n');

    transactions.onResponseReceived(replyTo(wire.last(), 200, 'OK'));
    vi.advanceTimersByTime(150);
    expect(wire.last().body).toBe('Signal=A\r\nDuration=120\r\n');

    transactions.onResponseReceived(replyTo(wire.last(), 200, 'OK'));
    vi.advanceTimersByTime(150);
    expect(wire.last().body).toBe('Signal=#\r\nDuration=120\r\n');

    transactions.onResponseReceived(replyTo(wire.last(), 200, 'OK'));
    expect(onDtmfResult.mock.calls.map(args => args[1])).toEqual(['1', 'A', '#']);
    expect(wire.requests('INFO')).toHaveLength(3);
  });

  it('queues nothing from a sequence with an invalid digit', () => {
    const { wire, call } = connected();
    expect(errorCodeOf(() => call.sendDtmfSequence('12X'))).toBe(SipErrorCode.INVALID_ARGUMENT);
    expect(errorCodeOf(() => call.sendDtmfSequence(''))).toBe(SipErrorCode.INVALID_ARGUMENT);
    expect(wire.requests('INFO')).toHaveLength(0);
  });

  it('answers 481 to a BYE carrying another dialog\'s tags', () => {
    const { wire, logger, call, localTag } = connected();

    call.handleRequest(inDialog('BYE', 11, 'not-our-tag', 'z9hG4bKbye2'));
    expect(wire.last().startLine).toBe('SIP/2.0 481 Call/Transaction Does Not Exist');
    expect(wire.last().getToTag()).toBe('not-our-tag');
    expect(call.state).toBe(CallState.Connected);
    expect(logger.warn).toHaveBeenCalledWith('Call inbound-1: BYE with tags caller/not-our-tag matches no dialog');

    call.handleRequest(
      inboundRequest([
        'BYE sip:1001@client.invalid;transport=ws SIP/2.0',
        'Via: SIP/2.0/WSS proxy.example.com;branch=z9hG4bKbye3',
        'From: "Bob" <sip:1002@example.com>;tag=someone-else',
        `To: <sip:1001@example.com>;tag=${localTag}`,
        'Call-ID: inbound-1',
        'CSeq: 12 BYE',
      ])
    );
    expect(wire.last().getStatusCode()).toBe(481);
    expect(call.state).toBe(CallState.Connected);
  });

  it('leaves the remote target alone for a re-INVITE of another dialog', () => {
    const { wire, call } = connected();
    call.handleRequest(inDialog('INVITE', 11, 'not-our-tag', 'z9hG4bKre2'));
    expect(wire.last().getStatusCode()).toBe(481);

    call.hold();
    expect(wire.last().startLine).toBe('INVITE sip:1002@192.0.2.20;transport=ws SIP/2.0');
  });
});
