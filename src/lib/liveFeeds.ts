/**
 * Display-only live lookups (KES/USD rate, pump price).
 * Each lookup is bounded by a timeout, cached for a TTL, and degrades to the last good value
 * or a fixed fallback constant. Nothing here throws past the lookup boundary.
 */

import { z } from "zod";
import type { AppConfig } from "@/config/appConfig";
import { FOREX_FALLBACK_KES_PER_USD, FUEL_FALLBACK_KES } from "@/config/feedDefaults";
import { dlog, dwarn } from "@/lib/debug";

export type FeedId = "forex" | "fuel";

/** live = fresh or within TTL; stale = last good value after a failure; fallback = constant. */
export type LiveReadingStatus = "live" | "stale" | "fallback";

export type LiveReading = {
  feedId: FeedId;
  label: string;
  value: number;
  status: LiveReadingStatus;
  /** Epoch ms of the reading's successful fetch; null for the fallback constant. */
  fetchedAt: number | null;
  error?: string;
};

export type LiveRateProvider = {
  id: FeedId;
  label: string;
  fetchRate: (signal: AbortSignal) => Promise<number>;
};

export type LiveLookupOptions = {
  timeoutMs: number;
  ttlMs: number;
  retryAfterMs: number;
  fallback: number;
  now?: () => number;
};

export type LiveLookup = () => Promise<LiveReading>;

export class FeedTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "FeedTimeoutError";
  }
}

/**
 * Runs `run` with an abort signal; rejects with FeedTimeoutError after timeoutMs even if the
 * callee ignores the signal.
 */
export async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new FeedTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createLiveLookup(provider: LiveRateProvider, options: LiveLookupOptions): LiveLookup {
  const now = options.now ?? Date.now;
  let lastGood: { value: number; at: number } | null = null;
  let lastFailure: { at: number; error: string } | null = null;
  let inflight: Promise<LiveReading> | null = null;

  const degraded = (error: string): LiveReading =>
    lastGood
      ? { feedId: provider.id, label: provider.label, value: lastGood.value, status: "stale", fetchedAt: lastGood.at, error }
      : { feedId: provider.id, label: provider.label, value: options.fallback, status: "fallback", fetchedAt: null, error };

  async function refresh(): Promise<LiveReading> {
    try {
      const value = await withTimeout(provider.fetchRate, options.timeoutMs);
      if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        throw new Error(`invalid rate ${String(value)}`);
      }
      const at = now();
      lastGood = { value, at };
      lastFailure = null;
      dlog("[liveFeeds] fetched", { feed: provider.id, value });
      return { feedId: provider.id, label: provider.label, value, status: "live", fetchedAt: at };
    } catch (err) {
      const error = errorMessage(err);
      lastFailure = { at: now(), error };
      dwarn("[liveFeeds] lookup failed, degrading", { feed: provider.id, error });
      return degraded(error);
    }
  }

  return async () => {
    const t = now();
    if (lastGood && t - lastGood.at < options.ttlMs) {
      return { feedId: provider.id, label: provider.label, value: lastGood.value, status: "live", fetchedAt: lastGood.at };
    }
    if (lastFailure && t - lastFailure.at < options.retryAfterMs) {
      return degraded(lastFailure.error);
    }
    if (!inflight) {
      inflight = refresh().finally(() => {
        inflight = null;
      });
    }
    return inflight;
  };
}

// ---------- Providers ----------

type FetchLike = (input: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

const ForexResponseSchema = z.object({
  rates: z.object({ KES: z.number().positive() }),
});

const FuelPriceResponseSchema = z.object({
  price: z.number().positive(),
});

async function getJson(fetchImpl: FetchLike, url: string, signal: AbortSignal): Promise<unknown> {
  const res = await fetchImpl(url, { signal, headers: { Accept: "application/json" } });
  if (!res.ok) throw new Error(`HTTP ${res.status}`);
  return res.json();
}

/** KES per USD from an exchange-rate endpoint returning `{ rates: { KES } }`. */
export function createForexProvider(url: string, fetchImpl: FetchLike = fetch): LiveRateProvider {
  return {
    id: "forex",
    label: "Forex USD/KES",
    fetchRate: async (signal) => ForexResponseSchema.parse(await getJson(fetchImpl, url, signal)).rates.KES,
  };
}

/** Pump price (KES/litre) from an endpoint returning `{ price }`. Without a URL it always fails. */
export function createFuelPriceProvider(url: string | null, fetchImpl: FetchLike = fetch): LiveRateProvider {
  return {
    id: "fuel",
    label: "EPRA Fuel Price",
    fetchRate: async (signal) => {
      if (!url) throw new Error("fuel price feed not configured");
      return FuelPriceResponseSchema.parse(await getJson(fetchImpl, url, signal)).price;
    },
  };
}

// ---------- Server wiring ----------

export type LiveFeedReadings = {
  forex: LiveReading;
  fuel: LiveReading;
};

export type LiveFeedLookups = {
  forex: LiveLookup;
  fuel: LiveLookup;
};

export function createLiveFeedLookups(feeds: AppConfig["feeds"], fetchImpl: FetchLike = fetch): LiveFeedLookups {
  const timing = { timeoutMs: feeds.timeoutMs, ttlMs: feeds.ttlMs, retryAfterMs: feeds.retryAfterMs };
  return {
    forex: createLiveLookup(createForexProvider(feeds.forexUrl, fetchImpl), {
      ...timing,
      fallback: FOREX_FALLBACK_KES_PER_USD,
    }),
    fuel: createLiveLookup(createFuelPriceProvider(feeds.fuelPriceUrl, fetchImpl), {
      ...timing,
      fallback: FUEL_FALLBACK_KES,
    }),
  };
}

export async function readLiveFeeds(lookups: LiveFeedLookups): Promise<LiveFeedReadings> {
  const [forex, fuel] = await Promise.all([lookups.forex(), lookups.fuel()]);
  return { forex, fuel };
}

let serverLookups: LiveFeedLookups | null = null;

/** Process-wide lookups so the TTL cache is shared across requests. */
export function getServerLiveFeedLookups(feeds: AppConfig["feeds"]): LiveFeedLookups {
  if (!serverLookups) serverLookups = createLiveFeedLookups(feeds);
  return serverLookups;
}
