import { LogSource } from './docker';
import {
  deriveHealthState,
  derivePeerCount,
  derivePeerIdentities,
  deriveSyncStatus,
  extractMaxInt,
  HEIGHT_PATTERNS,
  lastTimestamp,
} from './patterns';
import { PeerCache } from './peerCache';
import { StateStore } from './stateStore';
import { formatLocalTimestamp } from './timeFormat';
import { LogWindow, PersistedState, StatusQuery, StatusSnapshot } from './types';

export interface SnapshotOptions {
  timeZone: string;
  peersListMax: number;
  errorThreshold: number;
}

export class LiveSnapshotBuilder {
  constructor(
    private source: LogSource,
    private store: StateStore,
    private peers: PeerCache,
    private opts: SnapshotOptions,
  ) {}

  async fetchWindow(query: StatusQuery): Promise<LogWindow> {
    const text = await this.source.fetchLogs(query.container, query.since, query.tail);
    return { ...query, text };
  }

  async build(query: StatusQuery, totals: PersistedState): Promise<StatusSnapshot> {
    return this.fromWindow(await this.fetchWindow(query), totals);
  }

  /** `totals` is the aggregator's record for this poll; counters and the height fallback come from it. */
  async fromWindow(window: LogWindow, totals: PersistedState): Promise<StatusSnapshot> {
    const { text } = window;
    const health = deriveHealthState(text, { errorThreshold: this.opts.errorThreshold });
    const lastTs = lastTimestamp(text) || (await this.source.containerStartedAt(window.container)) || 'N/A';

    const height = extractMaxInt(HEIGHT_PATTERNS, text);
    const fallbackHeight = totals.lastHeight;
    if (height !== null) {
      await this.store.update((state) => { state.lastHeight = height; });
      totals.lastHeight = height;
    }
    const shownHeight = height ?? fallbackHeight;

    return {
      ok: true,
      health_state: health.state,
      health_msg: health.message,
      sync_status: deriveSyncStatus(text),
      last_log_time_raw: lastTs,
      last_log_time_local: formatLocalTimestamp(lastTs, this.opts.timeZone),
      peers: this.peers.resolve(derivePeerCount(text)),
      peers_list: derivePeerIdentities(text, this.opts.peersListMax).map((p) => ({
        id: p.shortId,
        count: p.occurrenceCount,
        full: p.fullId,
      })),
      height: shownHeight !== null ? String(shownHeight) : 'N/A',
      height_stale: height === null && fallbackHeight !== null,
      mined_total: totals.counters.mined,
      processed_total: totals.counters.processed,
      sealed_total: totals.counters.sealed,
      since: window.since,
      tail: window.tail,
      container: window.container,
    };
  }
}
