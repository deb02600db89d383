import { STORAGE_TIER_ORDER } from './types.js';
import type { ExtractedToken, StorageSnapshot, TokenSource } from './types.js';

export const DEFAULT_TOKEN_MARKERS: readonly string[] = ['token', 'auth', 'access', 'jwt'];

const PLACEHOLDER_VALUES = new Set(['null', 'undefined', '[object object]', 'false', '""']);

const RESPONSE_TOKEN_PATTERN = /AccessToken\s+Generated\s*:\s*(\S+)/;
const RESPONSE_TOKEN_KEY = 'AccessToken Generated';

export interface TokenSearchOptions {
  /** Address the browser landed on after login. */
  url?: string;
  /** Bodies of the login callback responses, in arrival order. */
  responseBodies?: readonly string[];
  now?: () => Date;
}

export type TokenExtraction =
  | { ok: true; token: ExtractedToken }
  | { ok: false; kind: 'TokenNotFound'; inspectedKeys: number };

type Candidate = { source: TokenSource; key: string; value: string };

export function isPlaceholderToken(value: string): boolean {
  const trimmed = value.trim();
  return !trimmed || PLACEHOLDER_VALUES.has(trimmed.toLowerCase());
}

/** Storage often holds JSON.stringify'd strings; take the inner value when that is the case. */
function unwrapStoredValue(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) {
    return trimmed;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    return typeof parsed === 'string' ? parsed.trim() : trimmed;
  } catch {
    return trimmed;
  }
}

function matchesMarker(key: string, markers: readonly string[]): boolean {
  const lowered = key.toLowerCase();
  return markers.some((marker) => lowered.includes(marker.toLowerCase()));
}

function* storageCandidates(snapshot: StorageSnapshot): Generator<Candidate> {
  for (const tier of STORAGE_TIER_ORDER) {
    for (const [key, value] of Object.entries(snapshot[tier])) {
      yield { source: tier, key, value };
    }
  }
}

function* responseCandidates(bodies: readonly string[]): Generator<Candidate> {
  for (const body of bodies) {
    const match = RESPONSE_TOKEN_PATTERN.exec(body);
    yield { source: 'response', key: RESPONSE_TOKEN_KEY, value: match?.[1] ?? '' };
  }
}

function* urlCandidates(url: string): Generator<Candidate> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return;
  }

  for (const params of [parsed.searchParams, new URLSearchParams(parsed.hash.slice(1))]) {
    for (const [key, value] of params) {
      yield { source: 'url', key, value };
    }
  }
}

/**
 * Returns the first credential-shaped entry. Storage is searched persistent, then session, then
 * cookies; after that the callback response body and finally the landing URL. Within a source,
 * page order wins.
 */
export function extractToken(
  snapshot: StorageSnapshot,
  markers: readonly string[] = DEFAULT_TOKEN_MARKERS,
  options: TokenSearchOptions = {}
): TokenExtraction {
  const now = options.now ?? (() => new Date());
  const sources = [
    storageCandidates(snapshot),
    responseCandidates(options.responseBodies ?? []),
    urlCandidates(options.url ?? '')
  ];
  let inspectedKeys = 0;

  for (const candidates of sources) {
    for (const { source, key, value: raw } of candidates) {
      inspectedKeys += 1;
      if (source !== 'response' && !matchesMarker(key, markers)) {
        continue;
      }

      const value = unwrapStoredValue(raw);
      if (isPlaceholderToken(value)) {
        continue;
      }

      return {
        ok: true,
        token: { value, sourceTier: source, sourceKey: key, extractedAt: now() }
      };
    }
  }

  return { ok: false, kind: 'TokenNotFound', inspectedKeys };
}

export function maskToken(value: string): string {
  return value.length <= 8 ? '****' : `${value.slice(0, 8)}...`;
}
