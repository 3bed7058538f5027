import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      serverUrl: 'ws://localhost:8000/ws',
      reconnectAttempts: 10,
      reconnectDelayMs: 1000,
      cursorStaleMs: 5000,
      historyLimit: 100,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SYNC_SERVER_URL: 'wss://relay.example/ws',
      SYNC_RECONNECT_ATTEMPTS: '3',
      SYNC_RECONNECT_DELAY_MS: '250',
      CURSOR_STALE_MS: '2000',
      HISTORY_LIMIT: '20',
    });
    expect(config).toEqual({
      serverUrl: 'wss://relay.example/ws',
      reconnectAttempts: 3,
      reconnectDelayMs: 250,
      cursorStaleMs: 2000,
      historyLimit: 20,
    });
  });

  it('ignores values that are not non-negative integers', () => {
    const config = loadConfig({ SYNC_RECONNECT_ATTEMPTS: 'many', HISTORY_LIMIT: '-5' });
    expect(config.reconnectAttempts).toBe(10);
    expect(config.historyLimit).toBe(100);
  });
});
