import { runNode, sleep, NodeRunOptions } from '../../src/engine/node-runner';
import { NodeDefinition, NodeHandler } from '../../src/graph/types';
import { NodeExecutionError, RunCanceledError } from '../../src/domain/errors';
import { logger } from '../../src/logger';

interface CounterState {
  count: number;
}

function options(overrides: Partial<NodeRunOptions> = {}): NodeRunOptions {
  return {
    runId: 'run_test',
    signal: new AbortController().signal,
    defaultTimeoutMs: 0,
    logger,
    ...overrides,
  };
}

function node(handler: NodeHandler<CounterState>, timeoutMs?: number): NodeDefinition<CounterState> {
  return { id: 'n', handler, timeoutMs };
}

describe('runNode', () => {
  test('returns the handler update', async () => {
    const update = await runNode(node(async (s) => ({ count: s.count + 2 })), { count: 1 }, options());
    expect(update).toEqual({ count: 3 });
  });

  test('passes run and node ids to the handler', async () => {
    const handler = jest.fn(async () => ({}));
    await runNode(node(handler), { count: 0 }, options());
    expect(handler.mock.calls[0]).toEqual([
      { count: 0 },
      expect.objectContaining({ runId: 'run_test', nodeId: 'n' }),
    ]);
  });

  test('a non-object result is a node failure', async () => {
    const broken: NodeHandler<CounterState> = () => Promise.resolve(JSON.parse('null'));
    await expect(runNode(node(broken), { count: 0 }, options())).rejects.toMatchObject({
      code: 'NODE.EXECUTION_ERROR',
      message: 'Node "n" failed: handler must resolve to an object',
    });
  });

  test('wraps thrown errors and keeps the original', async () => {
    const original = new Error('bad input');
    const failing = node(async () => {
      throw original;
    });

    const error = await runNode(failing, { count: 0 }, options()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NodeExecutionError);
    expect(error).toMatchObject({ originalError: original, message: 'Node "n" failed: bad input' });
  });

  test('times out and aborts the node signal', async () => {
    let nodeSignal: AbortSignal | undefined;
    const stuck = node(async (_s, context) => {
      nodeSignal = context.signal;
      await sleep(10_000, context.signal);
      return {};
    }, 15);

    await expect(runNode(stuck, { count: 0 }, options())).rejects.toMatchObject({ code: 'NODE.TIMEOUT' });
    expect(nodeSignal?.aborted).toBe(true);
  });

  test('refuses to start on an aborted run', async () => {
    const controller = new AbortController();
    controller.abort('stop');
    const handler = jest.fn(async () => ({}));

    await expect(runNode(node(handler), { count: 0 }, options({ signal: controller.signal }))).rejects.toThrow(
      RunCanceledError,
    );
    expect(handler).not.toHaveBeenCalled();
  });

  test('run cancellation interrupts a running node', async () => {
    const controller = new AbortController();
    const waiting = node(async (_s, context) => {
      await sleep(10_000, context.signal);
      return {};
    });

    const pending = runNode(waiting, { count: 0 }, options({ signal: controller.signal }));
    controller.abort('client disconnected');
    await expect(pending).rejects.toMatchObject({ code: 'RUN.CANCELED', message: 'Run canceled: client disconnected' });
  });
});

describe('sleep', () => {
  test('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  test('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort('enough');
    await expect(pending).rejects.toThrow('enough');
  });
});
