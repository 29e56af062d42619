import { DEFAULT_CONFIG, loadConfig } from '../../src/config';
import { DEFAULT_MESSAGES_PATH } from '../../src/config/messages';
import { ConfigError } from '../../src/domain/errors';
import { LogLevel } from '../../src/logger';

describe('loadConfig', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.port).toBe(5000);
    expect(DEFAULT_CONFIG.messagesPath).toBe(DEFAULT_MESSAGES_PATH);
  });

  test('reads every setting from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      NODE_TIMEOUT_MS: '0',
      MAX_STEPS: '5',
      STREAM_CAPACITY: '2',
      PLAN_LATENCY_MS: '1',
      EXECUTE_LATENCY_MS: '2',
      CHECK_LATENCY_MS: '3',
      MESSAGES_PATH: ' /tmp/messages.json ',
    });

    expect(config).toEqual({
      port: 8080,
      logLevel: LogLevel.Debug,
      nodeTimeoutMs: 0,
      maxSteps: 5,
      streamCapacity: 2,
      latency: { plan: 1, execute: 2, checkResult: 3 },
      messagesPath: '/tmp/messages.json',
    });
  });

  test('blank values use the default', () => {
    expect(loadConfig({ PORT: '  ', MESSAGES_PATH: '' }).port).toBe(5000);
  });

  test.each([
    ['PORT', 'abc'],
    ['PORT', '0'],
    ['MAX_STEPS', '-1'],
    ['STREAM_CAPACITY', '1.5'],
    ['LOG_LEVEL', 'verbose'],
  ])('rejects %s=%p', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigError);
  });

  test('names the offending variable', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(
      'Invalid configuration value for PORT: "abc" (expected an integer >= 1)',
    );
  });
});
