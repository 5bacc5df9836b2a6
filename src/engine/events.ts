import type { SipErrorCode } from '../sip/SipError';

export const RegistrationState = {
  None: 'None',
  Registering: 'Registering',
  Registered: 'Registered',
  Refreshing: 'Refreshing',
  Unregistering: 'Unregistering',
  Unregistered: 'Unregistered',
  Failed: 'Failed',
} as const;

export type RegistrationState = (typeof RegistrationState)[keyof typeof RegistrationState];

export const CallState = {
  Idle: 'Idle',
  Calling: 'Calling',
  Ringing: 'Ringing',
  Connected: 'Connected',
  OnHold: 'OnHold',
  Terminating: 'Terminating',
  Ended: 'Ended',
  Failed: 'Failed',
} as const;

export type CallState = (typeof CallState)[keyof typeof CallState];

export const TransportState = {
  Disconnected: 'Disconnected',
  Connecting: 'Connecting',
  Connected: 'Connected',
  Reconnecting: 'Reconnecting',
  Closed: 'Closed',
} as const;

export type TransportState = (typeof TransportState)[keyof typeof TransportState];

export type CallDirection = 'inbound' | 'outbound';

export type SignalingEvent =
  | {
      type: 'RegistrationStateChanged';
      account: string;
      previous: RegistrationState;
      state: RegistrationState;
      reason?: string;
    }
  | {
      type: 'CallStateChanged';
      callId: string;
      account: string;
      direction: CallDirection;
      previous: CallState;
      state: CallState;
      reason?: string;
    }
  | {
      type: 'IncomingCall';
      callId: string;
      account: string;
      callerNumber: string;
      callerName?: string;
    }
  | {
      type: 'DtmfResult';
      callId: string;
      digit: string;
      success: boolean;
    }
  | {
      type: 'TransportStateChanged';
      previous: TransportState;
      state: TransportState;
      code?: SipErrorCode;
      reason?: string;
    };

/** The single outward channel; fan-out to many listeners happens outside the engine. */
export type NotificationSink = (event: SignalingEvent) => void;
