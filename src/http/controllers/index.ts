export * from './HealthController';
export * from './StatusController';
