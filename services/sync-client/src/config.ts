export interface SyncConfig {
  serverUrl: string;
  reconnectAttempts: number;
  reconnectDelayMs: number;
  cursorStaleMs: number;
  historyLimit: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || String(fallback));
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  return {
    serverUrl: env.SYNC_SERVER_URL || 'ws://localhost:8000/ws',
    reconnectAttempts: intFromEnv(env.SYNC_RECONNECT_ATTEMPTS, 10),
    reconnectDelayMs: intFromEnv(env.SYNC_RECONNECT_DELAY_MS, 1000),
    cursorStaleMs: intFromEnv(env.CURSOR_STALE_MS, 5000),
    historyLimit: intFromEnv(env.HISTORY_LIMIT, 100),
  };
}
