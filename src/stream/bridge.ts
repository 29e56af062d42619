/**
 * Streaming Bridge: turns one executor run into an ordered event
 * sequence on a bounded channel.
 *
 * For every completed node it pushes the node's progress line, then one
 * result (from the same run's accumulated state) or one error, then the
 * end sentinel. The sentinel is pushed from a `finally` block, so it
 * follows success, failure and cancellation alike.
 *
 * An aborted request signal cancels the run only; the channel stays open
 * so the cancellation error and the sentinel still reach the reader. The
 * reader abandoning the channel cancels both.
 */

import { EmptyPromptError, TypedError, errorMessage, toTypedError } from '../domain/errors';
import { AgentState, createInitialState } from '../domain/state';
import { MessageCatalog } from '../config/messages';
import { GraphExecutor } from '../engine/executor';
import { logger } from '../logger';
import { EventChannel } from './channel';
import { StreamEvent } from './events';

export interface BridgeOptions {
  /** Events buffered before the producer waits for the consumer. */
  capacity: number;
}

export interface OpenStreamOptions {
  /** Aborts the run, e.g. when the HTTP client disconnects. */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: BridgeOptions = {
  capacity: 16,
};

export class StreamingBridge {
  private readonly options: BridgeOptions;

  constructor(
    private readonly executor: GraphExecutor<AgentState>,
    private readonly catalog: MessageCatalog,
    options?: Partial<BridgeOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Start streaming a run for `prompt`. The returned channel is the
   * only output; it closes after the last event.
   */
  open(prompt: string | undefined, options: OpenStreamOptions = {}): EventChannel<StreamEvent> {
    const channel = new EventChannel<StreamEvent>(this.options.capacity);

    const runController = new AbortController();
    const external = options.signal;
    const onExternalAbort = () => runController.abort('client disconnected');
    const onChannelCancel = () => runController.abort(channel.signal.reason);
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }
    channel.signal.addEventListener('abort', onChannelCancel, { once: true });

    void this.pump(channel, prompt, runController.signal)
      .catch((err) => {
        logger.error('Stream producer failed', { error: errorMessage(err) });
      })
      .finally(() => {
        external?.removeEventListener('abort', onExternalAbort);
        channel.signal.removeEventListener('abort', onChannelCancel);
        channel.close();
      });

    return channel;
  }

  private async pump(
    channel: EventChannel<StreamEvent>,
    prompt: string | undefined,
    signal: AbortSignal,
  ): Promise<void> {
    if (!prompt) {
      const error = new EmptyPromptError().typedError;
      logger.info('Rejected stream request', { code: error.code });
      await channel.push({ type: 'error', error, message: this.catalog.errors.emptyPrompt });
      return;
    }

    const run = this.executor.run(createInitialState(prompt), { signal });
    const log = logger.child({ runId: run.id });

    try {
      for await (const step of run) {
        const message = this.progressMessage(step.nodeId);
        if (message !== undefined) {
          await channel.push({ type: 'progress', nodeId: step.nodeId, index: step.index, message });
        }
      }
      // Same run, same state: the answer is never recomputed.
      const answer = run.state.finalAnswer ?? this.catalog.errors.missingAnswer;
      await channel.push({ type: 'result', message: answer });
    } catch (err) {
      const error = toTypedError(err);
      log.warn('Run failed while streaming', { code: error.code, error: error.message });
      await channel.push(this.errorEvent(error));
    } finally {
      await channel.push({ type: 'end', message: this.catalog.endOfStream });
    }
  }

  private progressMessage(nodeId: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.catalog.progress, nodeId)
      ? this.catalog.progress[nodeId]
      : undefined;
  }

  private errorEvent(error: TypedError): StreamEvent {
    return {
      type: 'error',
      error,
      message: `${this.catalog.errors.fatalPrefix} ${error.message}`,
    };
  }
}
