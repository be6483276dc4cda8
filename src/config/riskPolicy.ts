/**
 * Central policy config for the God Mode risk adjustment.
 * Every past release of the dashboard changed only these values, so they live here
 * as named, overridable constants rather than literals in the transform.
 */

import { z } from "zod";

export type RiskPolicy = {
  /** T1: fuel shock (KES) above which the first bonus applies. */
  fuelShockThreshold1: number;
  /** A1: risk added when fuel shock > T1. */
  fuelShockBonus1: number;
  /** T2: second fuel shock tier; must be greater than T1. */
  fuelShockThreshold2: number;
  /** A2: risk added on top of A1 when fuel shock > T2. */
  fuelShockBonus2: number;
  /** T3: VAT increase (%) above which the tax term applies. */
  taxHikeThreshold: number;
  /** K: risk per VAT percentage point once T3 is crossed. */
  taxHikeMultiplier: number;
  /** S: risk removed while the emergency subsidy is active. */
  subsidyRelief: number;
  /** Upper clamp for live risk. There is no lower clamp. */
  riskCap: number;
  /** D: display-only divisor turning Population into a marker size. */
  mapSizeDivisor: number;
};

export const DEFAULT_RISK_POLICY: RiskPolicy = {
  fuelShockThreshold1: 10,
  fuelShockBonus1: 15,
  fuelShockThreshold2: 25,
  fuelShockBonus2: 20,
  taxHikeThreshold: 2,
  taxHikeMultiplier: 1.5,
  subsidyRelief: 25,
  riskCap: 100,
  mapSizeDivisor: 1000,
};

/** Band thresholds: critical >= 75, warning 50–74.x, stable < 50. */
export const riskBandThresholds = {
  criticalMin: 75,
  warningMin: 50,
} as const;

export type RiskBandThresholds = {
  criticalMin: number;
  warningMin: number;
};

/** Map marker colours per band (red / amber / green). */
export const RISK_BAND_COLORS = {
  critical: "#FF0000",
  warning: "#FFA500",
  stable: "#00FF00",
} as const;

const finite = z.number().finite();

export const RiskPolicySchema = z
  .object({
    fuelShockThreshold1: finite,
    fuelShockBonus1: finite,
    fuelShockThreshold2: finite,
    fuelShockBonus2: finite,
    taxHikeThreshold: finite,
    taxHikeMultiplier: finite,
    subsidyRelief: finite,
    riskCap: finite,
    mapSizeDivisor: finite.positive(),
  })
  .refine((p) => p.fuelShockThreshold2 > p.fuelShockThreshold1, {
    message: "fuelShockThreshold2 must be greater than fuelShockThreshold1",
    path: ["fuelShockThreshold2"],
  });

export type RiskPolicyOverrides = Partial<RiskPolicy>;

/**
 * Merges overrides onto the defaults and validates the result.
 * Throws on an invalid combination (e.g. T2 <= T1, divisor <= 0).
 */
export function resolveRiskPolicy(
  overrides: RiskPolicyOverrides = {},
  base: RiskPolicy = DEFAULT_RISK_POLICY
): RiskPolicy {
  const merged: RiskPolicy = { ...base };
  for (const key of Object.keys(base) as (keyof RiskPolicy)[]) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  const parsed = RiskPolicySchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid risk policy: ${detail}`);
  }
  return Object.freeze(parsed.data);
}
