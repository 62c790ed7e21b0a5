import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CONFIG, Config } from './config';
import { createStatusService, StatusService } from './statusService';
import { FakeLogSource } from './testing/fakeLogSource';
import { StatusResult, StatusSnapshot } from './types';

function snapshotOf(result: StatusResult): StatusSnapshot {
  if (!result.ok) throw new Error(`expected a snapshot, got ${result.error}`);
  return result.snapshot;
}

describe('StatusService', () => {
  let dir: string;
  let config: Config;
  let source: FakeLogSource;
  let now: number;
  let service: StatusService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'status-'));
    config = { ...CONFIG, stateFile: path.join(dir, 'state.json'), displayTimeZone: 'UTC', responseCacheTtlMs: 2000 };
    source = new FakeLogSource();
    // Aggregation asks for a large backlog; the live window asks for the caller's tail.
    source.onFetch = ({ maxLines }) =>
      maxLines === config.initialTail
        ? '2025-01-15T10:00:00Z block mined\n2025-01-15T10:00:01Z block mined\n'
        : '2025-01-15T10:00:01Z block mined peers=3\n';
    now = 0;
    service = createStatusService(config, source, () => now);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails fast for an unknown container', async () => {
    expect(await service.getStatus({ container: 'ghost', since: '', tail: 600 })).toEqual({
      ok: false,
      status: 404,
      error: "Container 'ghost' not found.",
    });
    expect(source.calls).toEqual([]);
  });

  it('merges durable totals into the live snapshot', async () => {
    const snap = snapshotOf(await service.getStatus({ container: 'node-1', since: '', tail: 600 }));
    expect(snap.mined_total).toBe(2);
    expect(snap.health_state).toBe('mining');
    expect(snap.peers).toBe('3');
    expect(source.calls).toEqual([
      { container: 'node-1', since: '1h', maxLines: config.initialTail },
      { container: 'node-1', since: '', maxLines: 600 },
    ]);
  });

  it('serves one cached snapshot to every caller inside the ttl', async () => {
    const first = snapshotOf(await service.getStatus({ container: 'node-1', since: '', tail: 600 }));
    now = 1500;
    const second = snapshotOf(await service.getStatus({ container: 'other', since: '10m', tail: 20 }));
    expect(second).toBe(first);
    expect(source.calls).toHaveLength(2);

    now = 2001;
    const third = snapshotOf(await service.getStatus({ container: 'node-1', since: '', tail: 600 }));
    expect(third).not.toBe(first);
    expect(source.calls).toHaveLength(4);
    expect(source.calls[2].since).toBe('2025-01-15T10:00:01Z');
  });

  it('resets totals and drops the cached snapshot', async () => {
    await service.getStatus({ container: 'node-1', since: '', tail: 600 });
    const state = await service.resetTotals();
    expect(state).toEqual({ lastSeenTimestamp: null, lastHeight: null, counters: { mined: 0, processed: 0, sealed: 0 } });

    const snap = snapshotOf(await service.getStatus({ container: 'node-1', since: '', tail: 600 }));
    expect(snap.mined_total).toBe(2);
    expect(source.calls[2]).toEqual({ container: 'node-1', since: '1h', maxLines: config.initialTail });
  });

  it('still reports this poll when the state file cannot be written', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    // a regular file where the state directory should be
    fs.writeFileSync(path.join(dir, 'blocker'), '');
    const blocked = { ...config, stateFile: path.join(dir, 'blocker', 'state.json') };
    source.onFetch = ({ maxLines }) =>
      maxLines === blocked.initialTail
        ? '2025-01-15T10:00:00Z block mined\n2025-01-15T10:00:01Z block mined\n'
        : '2025-01-15T10:00:01Z height=5\n';
    const degraded = createStatusService(blocked, source, () => now);

    const snap = snapshotOf(await degraded.getStatus({ container: 'node-1', since: '', tail: 600 }));
    expect(snap).toMatchObject({ mined_total: 2, processed_total: 0, sealed_total: 0, height: '5', height_stale: false });
    expect(console.error).toHaveBeenCalled();
  });
});
