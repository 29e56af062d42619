/**
 * graph-stream: runs a small state-graph workflow and streams its
 * progress to HTTP clients as Server-Sent Events.
 *
 * Entry point for the server. Configuration or graph errors abort
 * startup.
 */

import { createApp, createAppContext } from './server';
import { errorMessage } from './domain/errors';
import { logger, setLogLevel } from './logger';

export function main(): void {
  const context = createAppContext();
  setLogLevel(context.config.logLevel);
  const app = createApp(context);

  app.listen(context.config.port, () => {
    logger.info('Server listening', { port: context.config.port, nodes: [...context.graph.nodes.keys()] });
  });
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    logger.error('Startup failed', { error: errorMessage(err) });
    process.exit(1);
  }
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export * from './domain';
export * from './graph';
export * from './engine';
export * from './stream';
export * from './agent';
export * from './config';
export * from './config/messages';
export * from './logger';
