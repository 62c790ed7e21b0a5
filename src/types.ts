export type HealthState = 'error' | 'syncing' | 'mining' | 'connected' | 'unclear';

export interface Counters {
  mined: number;
  processed: number;
  sealed: number;
}

export interface PersistedState {
  lastSeenTimestamp: string | null; // watermark: last log timestamp already counted
  lastHeight: number | null;
  counters: Counters;
}

export interface LogWindow {
  container: string;
  since: string;
  tail: number;
  text: string;
}

export interface PeerCacheEntry {
  value: number;
  observedAt: number; // epoch millis
}

export interface PeerIdentity {
  shortId: string;
  fullId: string;
  occurrenceCount: number;
}

export interface StatusQuery {
  container: string;
  since: string;
  tail: number;
}

// Wire shape of GET /api/status
export interface StatusSnapshot {
  ok: true;
  health_state: HealthState;
  health_msg: string;
  sync_status: string;
  last_log_time_raw: string;
  last_log_time_local: string;
  peers: string;
  peers_list: { id: string; count: number; full: string }[];
  height: string;
  height_stale: boolean;
  mined_total: number;
  processed_total: number;
  sealed_total: number;
  since: string;
  tail: number;
  container: string;
}

export interface StatusFailure {
  ok: false;
  status: number;
  error: string;
}

export type StatusResult = { ok: true; snapshot: StatusSnapshot } | StatusFailure;

// `output` is stdout and stderr interleaved; `stdout` is stdout alone.
export type CommandResult =
  | { kind: 'ok'; output: string; stdout: string }
  | { kind: 'failed'; reason: string; output: string; stdout: string };
