import { z } from "zod";
import { withComponent } from "../lib/logger.js";
import { IdentityProviderUnavailableError } from "./identity-errors.js";

export interface SigningKeySource {
  /** PEM-encoded key or certificate for `kid`, or null when the provider does not publish it. */
  getKey(kid: string, options?: { forceRefresh?: boolean }): Promise<string | null>;
}

export class StaticSigningKeySource implements SigningKeySource {
  private readonly keys: ReadonlyMap<string, string>;

  constructor(keys: Record<string, string>) {
    this.keys = new Map(Object.entries(keys));
  }

  async getKey(kid: string) {
    return this.keys.get(kid) ?? null;
  }
}

export interface HttpSigningKeySourceOptions {
  url: string;
  timeoutMs: number;
  attempts: number;
  backoffMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const keySetSchema = z.record(z.string().min(1));

const DEFAULT_MAX_AGE_SECONDS = 300;
const MIN_FORCED_REFRESH_INTERVAL_MS = 30_000;

const log = withComponent("signing-keys");

function parseMaxAge(cacheControl: string | null) {
  const match = cacheControl?.match(/max-age=(\d+)/);
  return match ? Number(match[1]) : DEFAULT_MAX_AGE_SECONDS;
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetches the provider's published `{kid: certificate}` map and caches it for
 * the response's `max-age`. A fetch is retried with linear backoff before
 * surfacing IdentityProviderUnavailableError.
 */
export class HttpSigningKeySource implements SigningKeySource {
  private cache: { keys: Map<string, string>; fetchedAt: number; expiresAt: number } | null = null;
  private inflight: Promise<Map<string, string>> | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpSigningKeySourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  async getKey(kid: string, options: { forceRefresh?: boolean } = {}) {
    const keys = await this.load(options.forceRefresh ?? false);
    return keys.get(kid) ?? null;
  }

  private async load(forceRefresh: boolean) {
    const cached = this.cache;
    const now = this.now();

    if (cached) {
      const fresh = cached.expiresAt > now;
      const recentlyFetched = now - cached.fetchedAt < MIN_FORCED_REFRESH_INTERVAL_MS;

      if ((fresh && !forceRefresh) || (forceRefresh && recentlyFetched)) {
        return cached.keys;
      }
    }

    if (!this.inflight) {
      this.inflight = this.fetchWithRetry().finally(() => {
        this.inflight = null;
      });
    }

    return this.inflight;
  }

  private async fetchWithRetry() {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.options.attempts; attempt += 1) {
      try {
        return await this.fetchOnce();
      } catch (error) {
        lastError = error;
        log.warn(
          {
            attempt,
            attempts: this.options.attempts,
            message: error instanceof Error ? error.message : String(error)
          },
          "Signing key fetch failed"
        );

        if (attempt < this.options.attempts) {
          await this.sleep(this.options.backoffMs * attempt);
        }
      }
    }

    throw new IdentityProviderUnavailableError("Unable to fetch identity provider signing keys", {
      cause: lastError
    });
  }

  private async fetchOnce() {
    const response = await this.fetchImpl(this.options.url, {
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`Signing key endpoint responded with ${response.status}`);
    }

    const body: unknown = await response.json();
    const keys = new Map(Object.entries(keySetSchema.parse(body)));
    const fetchedAt = this.now();

    this.cache = {
      keys,
      fetchedAt,
      expiresAt: fetchedAt + parseMaxAge(response.headers.get("cache-control")) * 1000
    };

    return keys;
  }
}
