import path from 'path';

function flag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

export const CONFIG = {
  port: Number(process.env.PORT || 43118),
  host: String(process.env.HOST || '0.0.0.0'),
  token: process.env.TOKEN || '',
  containerName: process.env.CONTAINER_NAME || 'blockdag-testnet-network',
  corsOrigin: process.env.CORS_ORIGIN || '*',
  dockerUseSudo: flag(process.env.DOCKER_USE_SUDO),
  stateFile: process.env.STATE_FILE || path.join(process.cwd(), '.state.json'),
  defaultTail: Number(process.env.DEFAULT_TAIL || 600),
  responseCacheTtlMs: Number(process.env.RESPONSE_CACHE_TTL_MS || 2000),
  peersStaleSecs: Number(process.env.PEERS_STALE_SECS || 90),
  peersListMax: Number(process.env.PEERS_LIST_MAX || 8),
  displayTimeZone: process.env.DISPLAY_TIME_ZONE || 'America/New_York',
  errorThreshold: Number(process.env.ERROR_THRESHOLD || 1),
  initialSince: process.env.INITIAL_SINCE || '1h', // used until a watermark exists
  initialTail: Number(process.env.INITIAL_TAIL || 10000),
  incrementalTail: Number(process.env.INCREMENTAL_TAIL || 5000),
  verbose: flag(process.env.VERBOSE),
};

export type Config = typeof CONFIG;

export function requireToken(): string {
  if (!CONFIG.token) return '';
  return CONFIG.token;
}
