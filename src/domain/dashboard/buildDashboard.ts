/**
 * One render pass: transform the loaded table under the current God Mode parameters and
 * derive everything the page shows. Pure; the caller supplies the table and live readings.
 */

import type { RiskPolicy } from "@/config/riskPolicy";
import { LAG_EFFECT_CAPTION, LAG_EFFECT_SERIES, type LagEffectPoint } from "@/data/lagEffect";
import { computeHeadlineMetrics, type HeadlineMetrics } from "@/domain/dashboard/metrics";
import {
  buildFeedStatus,
  buildIntelFeed,
  type FeedStatusEntry,
  type IntelFeed,
} from "@/domain/dashboard/intelFeed";
import type {
  DataMode,
  LiveRegion,
  RegionTable,
  RowError,
  SimulationParams,
} from "@/domain/region/region.schema";
import { transformRegions } from "@/domain/region/risk.transform";
import type { LiveFeedReadings } from "@/lib/liveFeeds";

export type DashboardView = {
  params: SimulationParams;
  baseRiskColumn: string;
  regions: LiveRegion[];
  rowErrors: RowError[];
  metrics: HeadlineMetrics;
  feed: IntelFeed;
  feedStatus: FeedStatusEntry[];
  chart: { series: readonly LagEffectPoint[]; caption: string };
  generatedAt: string;
};

export type BuildDashboardInput = {
  table: RegionTable;
  params: SimulationParams;
  policy: RiskPolicy;
  readings: LiveFeedReadings;
  now?: () => Date;
};

export function buildDashboard({ table, params, policy, readings, now = () => new Date() }: BuildDashboardInput): DashboardView {
  const { regions, rowErrors } = transformRegions(table, params, policy);
  return {
    params,
    baseRiskColumn: table.baseRiskColumn,
    regions,
    rowErrors,
    metrics: computeHeadlineMetrics(regions, params, readings),
    feed: buildIntelFeed(params),
    feedStatus: buildFeedStatus(readings, { regionCount: regions.length, rowErrorCount: rowErrors.length }),
    chart: { series: LAG_EFFECT_SERIES, caption: LAG_EFFECT_CAPTION },
    generatedAt: now().toISOString(),
  };
}

export const DATA_MODE_LABELS: Record<DataMode, { label: string; notice: string; severity: "success" | "warning" }> = {
  synthetic: {
    label: "Synthetic (Simulation)",
    notice: "PRIVACY SAFE: Using synthetic distributions.",
    severity: "success",
  },
  historical: {
    label: "Historical (Validation)",
    notice: "VALIDATION MODE: Using aggregated KNBS/ACLED baselines.",
    severity: "warning",
  },
};
