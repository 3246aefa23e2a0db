import Fastify, { FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { connectedClients, registerWebSocket } from './api/websocket.js';
import { bootstrapGovernance, Genesis, loadGenesis } from './bootstrap.js';
import { AppConfig } from './config.js';
import { eventBus } from './infra/eventBus.js';
import { LedgerClock, SystemClock } from './infra/ledger/clock.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { createGovernanceSystem, GovernanceSystem } from './system.js';

export interface BuildOptions {
  /** Defaults to wall-clock seconds. */
  clock?: LedgerClock;
  /** When false, state and the event log stay in memory. */
  persist?: boolean;
  /** Used instead of reading `paths.genesisFile`. */
  genesis?: Genesis;
}

export interface AppContext {
  app: FastifyInstance;
  system: GovernanceSystem;
  stateStore: StateStore;
  logger: EventLogger;
}

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const persist = options.persist ?? true;

  const stateStore = new StateStore(persist ? config.paths.stateFile : null);
  await stateStore.init();

  const logger = new EventLogger(persist ? config.paths.logFile : null);
  await logger.init();

  eventBus.onListenerError((event, error) => {
    logger.enqueue('error', 'event.listener_failed', { event, error: String(error) });
  });

  const clock = options.clock ?? new SystemClock();
  const system = createGovernanceSystem(stateStore, clock, logger, config);

  if (config.ledger.autoBootstrap) {
    const genesis = options.genesis ?? await loadGenesis(config.paths.genesisFile);
    const deployment = await bootstrapGovernance(system, config, genesis);
    await logger.log('info', 'governance.bootstrapped', deployment);
  }

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    system,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      ledgerTime: clock.now(),
      activeProposals: system.governance.listActiveProposals().length,
      pendingOperations: system.timelock.listPending().length,
      websocketClients: connectedClients(),
      processPid: process.pid,
    }),
  });

  // Register WebSocket live event feed endpoint.
  await registerWebSocket(app);

  return {
    app,
    system,
    stateStore,
    logger,
  };
}
