import { IncrementalAggregator } from './aggregator';
import { Config } from './config';
import { DockerLogSource, LogSource } from './docker';
import { PeerCache } from './peerCache';
import { ResponseCache } from './responseCache';
import { LiveSnapshotBuilder } from './snapshot';
import { StateStore } from './stateStore';
import { PersistedState, StatusQuery, StatusResult, StatusSnapshot } from './types';

export interface StatusServiceDeps {
  source: LogSource;
  store: StateStore;
  aggregator: IncrementalAggregator;
  builder: LiveSnapshotBuilder;
  cache: ResponseCache<StatusSnapshot>;
}

export class StatusService {
  constructor(private deps: StatusServiceDeps) {}

  async getStatus(query: StatusQuery): Promise<StatusResult> {
    const cached = this.deps.cache.get();
    if (cached) return { ok: true, snapshot: cached };

    if (!(await this.deps.source.containerExists(query.container))) {
      return { ok: false, status: 404, error: `Container '${query.container}' not found.` };
    }
    const totals = await this.deps.aggregator.aggregate(query.container);
    const snapshot = await this.deps.builder.build(query, totals);
    this.deps.cache.set(snapshot);
    return { ok: true, snapshot };
  }

  async resetTotals(): Promise<PersistedState> {
    const state = await this.deps.store.reset();
    this.deps.cache.invalidate();
    return state;
  }
}

export function createStatusService(
  config: Config,
  source: LogSource = new DockerLogSource({ useSudo: config.dockerUseSudo, verbose: config.verbose }),
  now: () => number = Date.now,
): StatusService {
  const store = new StateStore(config.stateFile);
  return new StatusService({
    source,
    store,
    aggregator: new IncrementalAggregator(source, store, {
      initialSince: config.initialSince,
      initialTail: config.initialTail,
      incrementalTail: config.incrementalTail,
      verbose: config.verbose,
    }),
    builder: new LiveSnapshotBuilder(source, store, new PeerCache(config.peersStaleSecs * 1000, now), {
      timeZone: config.displayTimeZone,
      peersListMax: config.peersListMax,
      errorThreshold: config.errorThreshold,
    }),
    cache: new ResponseCache<StatusSnapshot>(config.responseCacheTtlMs, now),
  });
}
