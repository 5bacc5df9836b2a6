export * from './ConsoleLogger';
export type { Logger, LogLevel } from './Logger';
