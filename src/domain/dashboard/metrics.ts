/**
 * Headline metric tiles (pure). Reads the transformed regions plus the live readings.
 */

import { STATIC_INDICATORS } from "@/config/feedDefaults";
import type { LiveRegion, RiskBand, SimulationParams } from "@/domain/region/region.schema";
import type { LiveFeedReadings, LiveReadingStatus } from "@/lib/liveFeeds";

const FOREX_STATUS_LABELS: Record<LiveReadingStatus, string> = {
  live: "Live",
  stale: "Cached",
  fallback: "Fallback",
};

export type MetricTile = {
  id: string;
  label: string;
  value: string;
  delta: string;
  /** For tiles backed by a live lookup. */
  source?: LiveReadingStatus;
};

export type BandCounts = Record<RiskBand, number>;

export type HeadlineMetrics = {
  regionCount: number;
  /** Mean live risk; null when no region survived validation. */
  averageRisk: number | null;
  /** 100 - averageRisk; null when there are no regions. */
  nationalStability: number | null;
  fuelPrice: number;
  /** Mean of Fuel_Price + fuelShock over regions that carry it; null otherwise. */
  regionalFuelAverage: number | null;
  forexRate: number;
  bandCounts: BandCounts;
  tiles: MetricTile[];
};

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function countBands(regions: LiveRegion[]): BandCounts {
  const counts: BandCounts = { critical: 0, warning: 0, stable: 0 };
  for (const r of regions) counts[r.band]++;
  return counts;
}

/** "-12 Impact" for a +12 shock; "0 Impact" when there is none. */
export function formatStabilityDelta(fuelShock: number): string {
  return `${fuelShock === 0 ? 0 : -fuelShock} Impact`;
}

export function computeHeadlineMetrics(
  regions: LiveRegion[],
  params: SimulationParams,
  readings: LiveFeedReadings
): HeadlineMetrics {
  const averageRisk = mean(regions.map((r) => r.liveRisk));
  const nationalStability = averageRisk == null ? null : 100 - averageRisk;
  const fuelPrice = readings.fuel.value + params.fuelShock;
  const regionalFuelAverage = mean(
    regions.flatMap((r) => (r.adjustedFuelPrice == null ? [] : [r.adjustedFuelPrice]))
  );
  const forexRate = readings.forex.value;

  const tiles: MetricTile[] = [
    {
      id: "stability",
      label: "National Stability",
      value: nationalStability == null ? "n/a" : `${nationalStability.toFixed(1)}%`,
      delta: formatStabilityDelta(params.fuelShock),
    },
    {
      id: "fuel",
      label: "Fuel Avg (EPRA)",
      value: `KES ${round1(fuelPrice)}`,
      delta: regionalFuelAverage == null ? "Real-time" : `Regional avg KES ${round1(regionalFuelAverage)}`,
      source: readings.fuel.status,
    },
    {
      id: "forex",
      label: "USD/KES",
      value: `KES ${readings.forex.value.toFixed(2)}`,
      delta: FOREX_STATUS_LABELS[readings.forex.status],
      source: readings.forex.status,
    },
    ...STATIC_INDICATORS.map((s) => ({ id: s.id, label: s.label, value: s.value, delta: s.delta })),
  ];

  return {
    regionCount: regions.length,
    averageRisk,
    nationalStability,
    fuelPrice,
    regionalFuelAverage,
    forexRate,
    bandCounts: countBands(regions),
    tiles,
  };
}
