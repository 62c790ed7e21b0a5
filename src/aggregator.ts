import { LogSource } from './docker';
import { countOccurrences, lastTimestamp, MINED_PATTERNS, PROCESSED_PATTERNS, SEALED_PATTERNS } from './patterns';
import { StateStore } from './stateStore';
import { parseLogTimestamp } from './timeFormat';
import { PersistedState } from './types';

export interface AggregatorOptions {
  initialSince: string;
  initialTail: number;
  incrementalTail: number;
  verbose: boolean;
}

/**
 * Adds the events found in `text` to the running totals and moves the
 * watermark to the last timestamp in it. Mutates and returns `state`.
 */
export function applyLogs(state: PersistedState, text: string): PersistedState {
  if (!text) return state;
  state.counters.mined += countOccurrences(MINED_PATTERNS, text);
  state.counters.processed += countOccurrences(PROCESSED_PATTERNS, text);
  state.counters.sealed += countOccurrences(SEALED_PATTERNS, text);
  const last = lastTimestamp(text);
  if (last) state.lastSeenTimestamp = last;
  return state;
}

function regressed(previous: string | null, next: string | null): boolean {
  if (!previous || !next) return false;
  const a = parseLogTimestamp(previous);
  const b = parseLogTimestamp(next);
  return a !== null && b !== null && b.getTime() < a.getTime();
}

/**
 * Advances the durable counters by what appeared since the last watermark.
 *
 * `docker logs --since` is inclusive, so a line stamped exactly at the
 * watermark is seen again on the next pass and counted twice. Each pass
 * runs inside the store's critical section, so concurrent callers queue
 * behind one another instead of reading the same watermark.
 */
export class IncrementalAggregator {
  constructor(
    private source: LogSource,
    private store: StateStore,
    private opts: AggregatorOptions,
  ) {}

  aggregate(container: string): Promise<PersistedState> {
    return this.store.update(async (state) => {
      const previous = state.lastSeenTimestamp;
      const since = previous ?? this.opts.initialSince;
      const tail = previous ? this.opts.incrementalTail : this.opts.initialTail;
      const text = await this.source.fetchLogs(container, since, tail);
      applyLogs(state, text);
      if (regressed(previous, state.lastSeenTimestamp)) {
        // eslint-disable-next-line no-console
        console.error(`[AGG] watermark moved backwards ${previous} -> ${state.lastSeenTimestamp}`);
      }
      if (this.opts.verbose) {
        // eslint-disable-next-line no-console
        console.log(`[AGG] ${container} since=${since} bytes=${text.length} watermark=${state.lastSeenTimestamp}`);
      }
    });
  }
}
