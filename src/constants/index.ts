export * from './protocol';
export * from './status';
