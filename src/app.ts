import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { connectedClients, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { isNullIdentity } from './domain/governance/identity.js';
import { EventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { GovernanceService } from './services/governanceService.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  events: EventBus;
  governanceService: GovernanceService;
}

export interface BuildAppOptions {
  /** Seconds since epoch; defaults to the wall clock. */
  clock?: () => number;
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<AppContext> {
  if (isNullIdentity(config.ledger.adminAddress)) {
    throw new Error('LEDGER_ADMIN_ADDRESS must not be empty or the zero address.');
  }

  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  if (config.ws.enabled) {
    await app.register(fastifyWebSocket);
  }

  const stateStore = new StateStore(config.paths.stateFile, config.ledger.adminAddress);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const events = new EventBus((event, error) => {
    logger.log('error', 'event.listener_failed', { event, error: String(error) })
      .catch((logError: unknown) => console.error(logError));
  });

  const governanceService = new GovernanceService(stateStore, logger, events, options.clock);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    governanceService,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      processPid: process.pid,
      wsClients: connectedClients(),
    }),
  });

  // Register WebSocket live event feed endpoint.
  if (config.ws.enabled) {
    await registerWebSocket(app, events);
  }

  return {
    app,
    stateStore,
    logger,
    events,
    governanceService,
  };
}
