import { createContainer, asFunction, asValue, InjectionMode, type AwilixContainer } from 'awilix';
import { Config } from './configurations';
import { DialogStore, RegistrationStore } from './store';
import { ConsoleLogger } from './logging';
import type { Logger } from './logging/Logger';
import { TransportSession, type SocketFactory } from './transport/TransportSession';
import { SignalingCoordinator, type MediaMonitor } from './engine/SignalingCoordinator';
import { ApiServer } from './http';

export interface EngineCradle {
  config: Config;
  logger: Logger;
  registrationStore: RegistrationStore;
  dialogStore: DialogStore;
  transport: TransportSession;
  coordinator: SignalingCoordinator;
  apiServer: ApiServer;
}

export interface EngineOverrides {
  logger?: Logger;
  socketFactory?: SocketFactory;
  mediaMonitor?: MediaMonitor;
}

/** One container per engine; nothing here is a module-level singleton. */
export const createEngineContainer = (
  config: Config,
  overrides: EngineOverrides = {}
): AwilixContainer<EngineCradle> => {
  const container = createContainer<EngineCradle>({ injectionMode: InjectionMode.PROXY });

  container.register({
    config: asValue(config),
    logger: overrides.logger
      ? asValue(overrides.logger)
      : asFunction(({ config }: EngineCradle) => new ConsoleLogger(config.LOG_LEVEL)).singleton(),
    registrationStore: asFunction(() => new RegistrationStore()).singleton(),
    dialogStore: asFunction(() => new DialogStore()).singleton(),
    transport: asFunction(
      ({ config, logger }: EngineCradle) =>
        new TransportSession(
          {
            url: config.SIP_WS_URL,
            keepaliveIntervalMs: config.SIP_KEEPALIVE_INTERVAL_MS,
            keepaliveGraceMs: config.SIP_KEEPALIVE_GRACE_MS,
            reconnectInitialMs: config.SIP_RECONNECT_INITIAL_MS,
            reconnectMaxMs: config.SIP_RECONNECT_MAX_MS,
            reconnectFactor: config.SIP_RECONNECT_FACTOR,
            reconnectMaxAttempts: config.SIP_RECONNECT_MAX_ATTEMPTS,
          },
          logger,
          overrides.socketFactory
        )
    ).singleton(),
    coordinator: asFunction(
      ({ config, logger, transport, registrationStore, dialogStore }: EngineCradle) =>
        new SignalingCoordinator({
          config,
          logger,
          transport,
          registrationStore,
          dialogStore,
          mediaMonitor: overrides.mediaMonitor,
        })
    ).singleton(),
    apiServer: asFunction(
      ({ config, logger, coordinator }: EngineCradle) => new ApiServer(config, logger, coordinator)
    ).singleton(),
  });

  return container;
};
