export * from './configurations';
export * from './constants';
export * from './logging';
export * from './sip';
export * from './engine/events';
export * from './engine/SignalingCoordinator';
export * from './engine/SerialExecutor';
export * from './registration/RegistrationStateMachine';
export * from './calls/CallStateMachine';
export * from './calls/sdp';
export * from './transport/TransportSession';
export * from './store';
export { createEngineContainer } from './container';
export type { EngineCradle, EngineOverrides } from './container';
