import { HealthState, PeerIdentity } from './types';

export const TIMESTAMP_PATTERN = /\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-][0-2]\d:\d{2})?/g;

export const MINED_PATTERNS: RegExp[] = [/\bmined\b/i, /\bmining\s+completed\b/i];
export const PROCESSED_PATTERNS: RegExp[] = [/\bprocessed\b/i, /\baccepted\b/i, /\bapplied\b/i];
export const SEALED_PATTERNS: RegExp[] = [/\bsealed\b/i, /\bblock\s+sealed\b/i];
export const HEIGHT_PATTERNS: RegExp[] = [
  /(?:height|best height|tip height|best|tip)[^0-9]*([0-9,]+)/i,
  /(?:number|block[ _-]?number|blk|no\.)[^0-9]*([0-9,]+)/i,
  /\bheight=([0-9,]+)\b/i,
  /block\s+([0-9,]+)/i,
];

// Checked in order; the first pattern family is the most specific.
export const PEER_COUNT_PATTERNS: RegExp[] = [
  /\bpeers?\s*[:=]\s*([0-9,]+)\s*\/\s*[0-9,]+\b/i,
  /\bconnected\s+(?:to\s+)?([0-9,]+)\s+peers?\b/i,
  /\b(?:peer_count|peerCount|numPeers|num_peers)\s*[:=]\s*([0-9,]+)\b/i,
  /["'](?:peerCount|connectedPeers|peers)["']\s*[:=]\s*([0-9,]+)\b/i,
  /\bpeers?\s*[:=]\s*([0-9,]+)\b/i,
];

export const PEER_ID_PATTERNS: RegExp[] = [
  /\bpeer(?:Id|ID)?=([A-Za-z0-9:/._-]+)/,
  /(?:\/p2p\/|\/ipfs\/)([A-Za-z0-9]+)/,
];

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

function globalCopy(pattern: RegExp, caseInsensitive: boolean): RegExp {
  let flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  if (caseInsensitive && !flags.includes('i')) flags += 'i';
  return new RegExp(pattern.source, flags);
}

// The value of a match: its last non-empty capture group, or the whole match.
function matchValue(m: RegExpMatchArray): string {
  for (let i = m.length - 1; i >= 1; i--) {
    if (m[i]) return m[i];
  }
  return m.length > 1 ? '' : m[0];
}

export function normalizeInt(raw: string): number | null {
  const compact = raw.replace(/[,\s]/g, '');
  const m = compact.match(/(\d+)/);
  if (!m) return null;
  const value = Number(m[1]);
  return Number.isSafeInteger(value) ? value : null;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function extractTimestamps(text: string): string[] {
  return text.match(globalCopy(TIMESTAMP_PATTERN, false)) ?? [];
}

export function lastTimestamp(text: string): string | null {
  const all = extractTimestamps(text);
  return all.length > 0 ? all[all.length - 1] : null;
}

function extractInts(patterns: RegExp[], text: string): number[] {
  const values: number[] = [];
  for (const pattern of patterns) {
    for (const m of text.matchAll(globalCopy(pattern, true))) {
      const v = normalizeInt(matchValue(m));
      if (v !== null && v >= 0) values.push(v);
    }
  }
  return values;
}

export function extractMaxInt(patterns: RegExp[], text: string): number | null {
  const values = extractInts(patterns, text);
  return values.length > 0 ? Math.max(...values) : null;
}

/** Overlapping patterns are not deduplicated: a line matching two of them counts twice. */
export function countOccurrences(patterns: RegExp[], text: string): number {
  return patterns.reduce((total, pattern) => total + Array.from(text.matchAll(globalCopy(pattern, true))).length, 0);
}

function peerIdentityCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const pattern of PEER_ID_PATTERNS) {
    for (const m of text.matchAll(globalCopy(pattern, false))) {
      const id = m[1].trim().replace(/[.,;]+$/, '');
      if (id) counts.set(id, (counts.get(id) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Largest numeric peer count in the text. Only when no numeric mention exists
 * at all is the number of distinct peer identities used instead.
 */
export function derivePeerCount(text: string): number | null {
  const numeric = extractInts(PEER_COUNT_PATTERNS, text);
  if (numeric.length > 0) return Math.max(...numeric);
  const ids = peerIdentityCounts(text);
  return ids.size > 0 ? ids.size : null;
}

export function shortenPeerId(id: string): string {
  return id.length > 14 ? `${id.slice(0, 7)}…${id.slice(-3)}` : id;
}

export function derivePeerIdentities(text: string, maxItems: number): PeerIdentity[] {
  return Array.from(peerIdentityCounts(text), ([fullId, occurrenceCount]) => ({
    shortId: shortenPeerId(fullId),
    fullId,
    occurrenceCount,
  }))
    .sort((a, b) => {
      if (b.occurrenceCount !== a.occurrenceCount) return b.occurrenceCount - a.occurrenceCount;
      if (a.fullId === b.fullId) return 0;
      return a.fullId < b.fullId ? -1 : 1;
    })
    .slice(0, Math.max(0, maxItems));
}

export interface HealthOptions {
  // Minimum number of error keyword hits before the error state is reported.
  errorThreshold: number;
}

export interface HealthRule {
  state: HealthState;
  message: string;
  matches: (text: string, opts: HealthOptions) => boolean;
}

const ERROR_PATTERN = /\berror|fatal|panic\b/i;

export const HEALTH_RULES: readonly HealthRule[] = [
  {
    state: 'error',
    message: '❌ Errors detected — check logs',
    matches: (text, opts) => countOccurrences([ERROR_PATTERN], text) >= Math.max(1, opts.errorThreshold),
  },
  {
    state: 'syncing',
    message: '⏳ Syncing (downloading blocks)',
    matches: (text) => /downloading blocks|sync(ing)?|catching up/i.test(text),
  },
  {
    state: 'mining',
    message: '✅ Mining/processing activity',
    matches: (text) => /\b(mined|mining|accepted|sealed)\b/i.test(text),
  },
  {
    state: 'connected',
    message: '🔗 Connected to peers',
    matches: (text) => /\bconnected\b|\bpeers?\b/i.test(text),
  },
];

const UNCLEAR = { state: 'unclear' as const, message: '❔ Status unclear — check logs' };

export function deriveHealthState(
  text: string,
  opts: HealthOptions = { errorThreshold: 1 },
): { state: HealthState; message: string } {
  const rule = HEALTH_RULES.find((r) => r.matches(text, opts));
  return rule ? { state: rule.state, message: rule.message } : UNCLEAR;
}

// Coarser than deriveHealthState on purpose: "synced" needs the exact import phrase.
const SYNC_RULES: readonly [RegExp, string][] = [
  [/error/i, '❌ Error'],
  [/sync|downloading block/i, '⏳ Syncing'],
  [/Imported new chain segment/i, '✅ Synced'],
];

export function deriveSyncStatus(text: string): string {
  const hit = SYNC_RULES.find(([pattern]) => pattern.test(text));
  return hit ? hit[1] : 'N/A';
}
