import fs from 'fs';
import path from 'path';
import { Counters, PersistedState } from './types';

// On-disk record; snake_case keys are kept so older state files still load.
interface StoredState {
  last_seen_ts: string | null;
  last_height: number | null;
  counters: Counters;
}

export function defaultState(): PersistedState {
  return { lastSeenTimestamp: null, lastHeight: null, counters: { mined: 0, processed: 0, sealed: 0 } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value : 0;
}

/** Field-by-field: anything missing or mistyped falls back to its default. */
export function fromStored(raw: unknown): PersistedState {
  const state = defaultState();
  if (!isRecord(raw)) return state;
  if (typeof raw.last_seen_ts === 'string') state.lastSeenTimestamp = raw.last_seen_ts;
  if (typeof raw.last_height === 'number' && Number.isSafeInteger(raw.last_height) && raw.last_height >= 0) {
    state.lastHeight = raw.last_height;
  }
  if (isRecord(raw.counters)) {
    state.counters = {
      mined: count(raw.counters.mined),
      processed: count(raw.counters.processed),
      sealed: count(raw.counters.sealed),
    };
  }
  return state;
}

export function toStored(state: PersistedState): StoredState {
  return {
    last_seen_ts: state.lastSeenTimestamp,
    last_height: state.lastHeight,
    counters: { ...state.counters },
  };
}

/**
 * File-backed state shared by the aggregator and the snapshot builder.
 * Every read-modify-write goes through {@link StateStore.update}, which runs
 * one mutation at a time so neither side clobbers the other's fields.
 */
export class StateStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private file: string) {}

  async load(): Promise<PersistedState> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.file, 'utf8');
    } catch (e: unknown) {
      const code = e instanceof Error && 'code' in e ? e.code : undefined;
      if (code !== 'ENOENT') this.notice(`read failed, using defaults: ${String(e)}`);
      return defaultState();
    }
    try {
      return fromStored(JSON.parse(content));
    } catch (e: unknown) {
      this.notice(`corrupt state file, using defaults: ${String(e)}`);
      return defaultState();
    }
  }

  /** Atomic replace via a temp file. Returns false when the write was dropped. */
  async save(state: PersistedState): Promise<boolean> {
    const tmp = `${this.file}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(toStored(state)), 'utf8');
      await fs.promises.rename(tmp, this.file);
      return true;
    } catch (e: unknown) {
      this.notice(`write failed, state not persisted: ${String(e)}`);
      return false;
    }
  }

  update(mutate: (state: PersistedState) => void | Promise<void>): Promise<PersistedState> {
    return this.exclusive(async () => {
      const state = await this.load();
      await mutate(state);
      await this.save(state);
      return state;
    });
  }

  reset(): Promise<PersistedState> {
    return this.exclusive(async () => {
      const state = defaultState();
      await this.save(state);
      return state;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The caller sees a rejection through `run`; the queue only needs to keep moving.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private notice(msg: string) {
    // eslint-disable-next-line no-console
    console.error(`[STATE] ${this.file}: ${msg}`);
  }
}
