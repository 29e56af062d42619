import express from 'express';
import { AppConfig, DEFAULT_CONFIG } from '../src/config';
import { MessageCatalog, loadMessageCatalog } from '../src/config/messages';
import { AppContext, createAppContext } from '../src/server';
import { StreamEvent } from '../src/stream/events';

/** Config with no simulated latency. */
export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    latency: { plan: 0, execute: 0, checkResult: 0 },
    ...overrides,
  };
}

export function testCatalog(): MessageCatalog {
  return loadMessageCatalog();
}

export function createTestContext(overrides: Partial<AppConfig> = {}): AppContext {
  return createAppContext({ config: testConfig(overrides), catalog: testCatalog() });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export function messagesOf(events: StreamEvent[]): string[] {
  return events.map((e) => e.message);
}

export interface TextResponse {
  status: number;
  headers: Headers;
  text: string;
}

/** Serve `app` on an ephemeral port for one request. */
export async function request(app: express.Application, method: string, path: string): Promise<TextResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  try {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    const { port } = address;
    const res = await fetch(`http://127.0.0.1:${port}${path}`, { method });
    return { status: res.status, headers: res.headers, text: await res.text() };
  } finally {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }
}
