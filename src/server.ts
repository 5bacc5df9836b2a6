import { Config } from './configurations';
import { createEngineContainer } from './container';
import type { SignalingEvent } from './engine/events';

const config = new Config();
const container = createEngineContainer(config);

const logger = container.resolve('logger');
const coordinator = container.resolve('coordinator');
const apiServer = container.resolve('apiServer');

const describeEvent = (event: SignalingEvent): string => {
  switch (event.type) {
    case 'RegistrationStateChanged':
      return `${event.account}: ${event.previous} -> ${event.state}`;
    case 'CallStateChanged':
      return `call ${event.callId} (${event.direction}): ${event.previous} -> ${event.state}`;
    case 'IncomingCall':
      return `incoming call ${event.callId} from ${event.callerNumber} to ${event.account}`;
    case 'DtmfResult':
      return `DTMF ${event.digit} on ${event.callId}: ${event.success ? 'sent' : 'failed'}`;
    case 'TransportStateChanged':
      return `transport ${event.previous} -> ${event.state}`;
  }
};

coordinator.setNotificationSink(event => {
  logger.info(`[event] ${describeEvent(event)}`, 'reason' in event && event.reason ? event.reason : undefined);
});

coordinator.start().catch(error => {
  logger.error('Failed to start signaling engine', error);
  process.exitCode = 1;
});

apiServer.start();

const shutdown = (signal: string) => {
  logger.info(`Shutting down SIP engine (${signal})...`);
  Promise.all([coordinator.stop(), apiServer.stop()])
    .then(() => process.exit(0))
    .catch(error => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
