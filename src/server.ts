/**
 * Express server configuration.
 *
 * Builds the graph once, wires executor and bridge around it, and
 * mounts the routes. Every request handler receives the same immutable
 * graph through the context; nothing is module-global.
 */

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { MessageCatalog, loadMessageCatalog } from './config/messages';
import { AgentState } from './domain/state';
import { createAgentGraph } from './agent/graph';
import { GraphExecutor } from './engine/executor';
import { CompiledGraph } from './graph/types';
import { StreamingBridge } from './stream/bridge';
import { corsMiddleware, errorHandler } from './api/middleware';
import { createStreamRoutes } from './api/stream';
import { createGraphRoutes } from './api/graph';

const startTime = Date.now();

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  catalog: MessageCatalog;
  graph: CompiledGraph<AgentState>;
  executor: GraphExecutor<AgentState>;
  bridge: StreamingBridge;
}

export interface AppContextOverrides {
  config?: AppConfig;
  catalog?: MessageCatalog;
}

/**
 * Create the application context. Throws ConfigError or
 * GraphValidationError; both are fatal at startup.
 */
export function createAppContext(overrides: AppContextOverrides = {}): AppContext {
  const config = overrides.config ?? loadConfig();
  const catalog = overrides.catalog ?? loadMessageCatalog(config.messagesPath);
  const graph = createAgentGraph({ catalog, latency: config.latency });
  const executor = new GraphExecutor(graph, {
    nodeTimeoutMs: config.nodeTimeoutMs,
    maxSteps: config.maxSteps,
  });
  const bridge = new StreamingBridge(executor, catalog, { capacity: config.streamCapacity });

  return { config, catalog, graph, executor, bridge };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(corsMiddleware());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
    });
  });

  app.use('/', createStreamRoutes(ctx.bridge));
  app.use('/', createGraphRoutes(ctx.graph));

  app.use(errorHandler);

  return app;
}
