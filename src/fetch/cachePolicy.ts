// Largest value of the INTEGER polling_hint_sec column; longer max-ages are clamped.
export const MAX_AGE_CEILING_SEC = 2_147_483_647;

export type HeaderLookup = (name: string) => string | null;

export interface CacheControl {
  maxAgeSec: number | null;
  noStore: boolean;
  noCache: boolean;
}

export function parseCacheControl(value: string | null): CacheControl {
  const result: CacheControl = { maxAgeSec: null, noStore: false, noCache: false };
  if (!value) return result;

  for (const rawDirective of value.split(",")) {
    const [rawName, rawArg] = rawDirective.split("=", 2);
    const name = rawName.trim().toLowerCase();
    if (name === "no-store") {
      result.noStore = true;
    } else if (name === "no-cache") {
      result.noCache = true;
    } else if (name === "max-age" && rawArg !== undefined) {
      const arg = rawArg.trim().replace(/^"|"$/g, "");
      if (/^\d+$/.test(arg)) {
        result.maxAgeSec = Math.min(Number.parseInt(arg, 10), MAX_AGE_CEILING_SEC);
      }
    }
  }
  return result;
}

export function parseHttpDate(value: string | null): Date | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Next expiry for a 200 or 304 received at `now`. Precedence, lowest first:
 * the default offset, `Expires`, `Cache-Control: max-age`. A bare `no-store`
 * or `no-cache` expires immediately. Never earlier than `now`.
 */
export function computeExpiresAt(now: Date, header: HeaderLookup, defaultExpirationSec: number): Date {
  const cacheControl = parseCacheControl(header("cache-control"));

  let expiresAt = addSeconds(now, defaultExpirationSec);

  const expires = parseHttpDate(header("expires"));
  if (expires) {
    expiresAt = expires;
  }

  if (cacheControl.maxAgeSec !== null) {
    expiresAt = addSeconds(now, cacheControl.maxAgeSec);
  } else if (cacheControl.noStore || cacheControl.noCache) {
    expiresAt = now;
  }

  return expiresAt.getTime() < now.getTime() ? now : expiresAt;
}

/** Server-suggested polling interval: the response's max-age, if any. */
export function pollingHintFromHeaders(header: HeaderLookup): number | null {
  return parseCacheControl(header("cache-control")).maxAgeSec;
}

/** Whole seconds until `expiresAt`, rounded up; 0 once expired. */
export function remainingFreshnessSec(now: Date, expiresAt: Date): number {
  const ms = expiresAt.getTime() - now.getTime();
  return ms <= 0 ? 0 : Math.ceil(ms / 1000);
}
