export const SipMethod = {
  INVITE: 'INVITE',
  ACK: 'ACK',
  BYE: 'BYE',
  CANCEL: 'CANCEL',
  REGISTER: 'REGISTER',
  OPTIONS: 'OPTIONS',
  INFO: 'INFO',
} as const;

export type SipMethod = (typeof SipMethod)[keyof typeof SipMethod];

export const Protocol = {
  WS: 'WS',
  WSS: 'WSS',
} as const;

export type ProtocolType = (typeof Protocol)[keyof typeof Protocol];

export const SIP_VERSION = 'SIP/2.0';
export const BRANCH_MAGIC_COOKIE = 'z9hG4bK';
export const MAX_FORWARDS = '70';
export const WS_SUBPROTOCOL = 'sip';
export const MAX_SIP_MESSAGE_BYTES = 64 * 1024;

export const ALLOWED_METHODS = [
  SipMethod.INVITE,
  SipMethod.ACK,
  SipMethod.CANCEL,
  SipMethod.BYE,
  SipMethod.INFO,
  SipMethod.OPTIONS,
].join(', ');
