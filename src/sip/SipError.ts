export const SipErrorCode = {
  MALFORMED_MESSAGE: 'MALFORMED_MESSAGE',
  MESSAGE_TOO_LARGE: 'MESSAGE_TOO_LARGE',
  UNSUPPORTED_CHALLENGE: 'UNSUPPORTED_CHALLENGE',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  TRANSACTION_TIMEOUT: 'TRANSACTION_TIMEOUT',
  ILLEGAL_TRANSITION: 'ILLEGAL_TRANSITION',
  TRANSPORT_DOWN: 'TRANSPORT_DOWN',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const;

export type SipErrorCode = (typeof SipErrorCode)[keyof typeof SipErrorCode];

export class SipError extends Error {
  public readonly code: SipErrorCode;

  constructor(code: SipErrorCode, message: string) {
    super(message);
    this.name = 'SipError';
    this.code = code;
  }
}

export const isSipError = (error: unknown, code?: SipErrorCode): error is SipError =>
  error instanceof SipError && (code === undefined || error.code === code);
