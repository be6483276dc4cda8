/**
 * Defaults for the display-only live lookups and the static dashboard indicators.
 * Fallback constants are what a tile shows when its live lookup is unavailable.
 */

/** KES per USD shown when the forex lookup fails or times out. */
export const FOREX_FALLBACK_KES_PER_USD = 129.0;

/** Pump price (KES/litre) shown when the fuel price lookup fails or times out. */
export const FUEL_FALLBACK_KES = 215;

export const DEFAULT_FOREX_API_URL = "https://open.er-api.com/v6/latest/USD";

export const feedTimingDefaults = {
  /** Per-request bound on each live lookup. */
  timeoutMs: 2_500,
  /** How long a successful reading is reused before the remote is asked again. */
  ttlMs: 10 * 60_000,
  /** How long a failed lookup waits before retrying (fallback/stale value served meanwhile). */
  retryAfterMs: 60_000,
} as const;

/** Fuel shock (KES) above which the intelligence feed raises a critical alert. */
export const FEED_ALERT_FUEL_SHOCK = 15;

/** Indicators without a live source; displayed verbatim. */
export const STATIC_INDICATORS = [
  { id: "maize", label: "Maize 2kg (KNBS)", value: "KES 230", delta: "+2.4%" },
  { id: "ndvi", label: "Drought Index (NDVI)", value: "0.45", delta: "-0.1 (Worsening)" },
] as const;

export type StaticIndicator = (typeof STATIC_INDICATORS)[number];

/** Status-panel entries for sources without a lookup of their own; displayed verbatim. */
export const STATIC_FEED_STATUS = [
  { id: "knbs", label: "KNBS Macro-Econ", severity: "success", text: "Connected" },
  { id: "sentinel-2", label: "Sentinel-2 Satellite", severity: "success", text: "Live" },
  { id: "social", label: "Social Sentiment", severity: "info", text: "Scraping X..." },
] as const;
