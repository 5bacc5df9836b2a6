export * from './SipError';
export * from './SipMessage';
export * from './SipUri';
export * from './headers';
export * from './DigestAuthenticator';
export * from './RequestFactory';
export * from './TransactionManager';
