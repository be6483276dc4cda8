/**
 * Process configuration read from the environment (validated with zod).
 * Invalid values throw at first use so a misconfigured deployment fails loudly.
 */

import { z } from "zod";
import {
  DEFAULT_FOREX_API_URL,
  feedTimingDefaults,
} from "@/config/feedDefaults";
import { resolveRiskPolicy, type RiskPolicy, type RiskPolicyOverrides } from "@/config/riskPolicy";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

/** SENTINEL_DEBUG: 1/true forces dlog output on, 0/false forces it off, unset leaves it to NODE_ENV. */
export const DebugFlagSchema = z
  .preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["1", "true", "0", "false", ""]).optional()
  )
  .transform((v) => (v === "1" || v === "true" ? true : v === "0" || v === "false" ? false : null));

/** Lenient read for the logger; an unrecognised value is rejected by loadAppConfig instead. */
export function parseDebugFlag(raw: string | undefined): boolean | null {
  const parsed = DebugFlagSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

const EnvSchema = z.object({
  REGION_DATA_PATH: z.preprocess(blankToUndefined, z.string().default("data/regions.csv")),
  BASE_RISK_COLUMN: z.preprocess(blankToUndefined, z.string().default("Base_Risk")),
  FEED_TIMEOUT_MS: positiveInt(feedTimingDefaults.timeoutMs),
  FEED_TTL_MS: positiveInt(feedTimingDefaults.ttlMs),
  FEED_RETRY_MS: positiveInt(feedTimingDefaults.retryAfterMs),
  FOREX_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_FOREX_API_URL)),
  FUEL_PRICE_API_URL: optionalUrl,
  RISK_FUEL_T1: optionalNumber,
  RISK_FUEL_A1: optionalNumber,
  RISK_FUEL_T2: optionalNumber,
  RISK_FUEL_A2: optionalNumber,
  RISK_TAX_T3: optionalNumber,
  RISK_TAX_K: optionalNumber,
  RISK_SUBSIDY_S: optionalNumber,
  RISK_MAP_DIVISOR: optionalNumber,
  SENTINEL_DEBUG: DebugFlagSchema,
});

export type AppConfig = {
  dataPath: string;
  baseRiskColumn: string;
  policy: RiskPolicy;
  feeds: {
    timeoutMs: number;
    ttlMs: number;
    retryAfterMs: number;
    forexUrl: string;
    fuelPriceUrl: string | null;
  };
  debug: boolean | null;
};

type EnvSource = Record<string, string | undefined>;

export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  const overrides: RiskPolicyOverrides = {
    fuelShockThreshold1: e.RISK_FUEL_T1,
    fuelShockBonus1: e.RISK_FUEL_A1,
    fuelShockThreshold2: e.RISK_FUEL_T2,
    fuelShockBonus2: e.RISK_FUEL_A2,
    taxHikeThreshold: e.RISK_TAX_T3,
    taxHikeMultiplier: e.RISK_TAX_K,
    subsidyRelief: e.RISK_SUBSIDY_S,
    mapSizeDivisor: e.RISK_MAP_DIVISOR,
  };

  return {
    dataPath: e.REGION_DATA_PATH,
    baseRiskColumn: e.BASE_RISK_COLUMN,
    policy: resolveRiskPolicy(overrides),
    feeds: {
      timeoutMs: e.FEED_TIMEOUT_MS,
      ttlMs: e.FEED_TTL_MS,
      retryAfterMs: e.FEED_RETRY_MS,
      forexUrl: e.FOREX_API_URL,
      fuelPriceUrl: e.FUEL_PRICE_API_URL ?? null,
    },
    debug: e.SENTINEL_DEBUG,
  };
}

let cached: AppConfig | null = null;

/** Config for the running server, parsed once. */
export function getAppConfig(): AppConfig {
  if (!cached) cached = loadAppConfig();
  return cached;
}
