/**
 * Streaming API routes.
 *
 * GET /stream?prompt=<text>: run the agent and stream its progress as SSE
 */

import { Router } from 'express';
import { errorMessage } from '../domain/errors';
import { logger } from '../logger';
import { StreamingBridge } from '../stream/bridge';
import { SSE_HEADERS, formatEvent, writeFrame } from '../stream/sse';

export function createStreamRoutes(bridge: StreamingBridge): Router {
  const router = Router();

  /**
   * GET /stream
   * Always answers 200; failures arrive in-band as an error frame.
   */
  router.get('/stream', async (req, res) => {
    const prompt = typeof req.query.prompt === 'string' ? req.query.prompt : undefined;

    res.status(200);
    res.set(SSE_HEADERS);
    res.flushHeaders();

    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        disconnect.abort('client disconnected');
      }
    });

    const channel = bridge.open(prompt, { signal: disconnect.signal });
    let frames = 0;
    try {
      for await (const event of channel) {
        if (!(await writeFrame(res, formatEvent(event)))) break;
        frames++;
      }
    } catch (err) {
      logger.error('Stream write failed', { error: errorMessage(err) });
    } finally {
      logger.debug('Stream finished', { frames, disconnected: disconnect.signal.aborted });
      if (!res.writableEnded) res.end();
    }
  });

  return router;
}
