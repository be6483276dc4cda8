/**
 * Rule-based intelligence feed and data-feed status panel (pure functions).
 * First matching rule wins: fuel alert, then subsidy, then normal monitoring.
 */

import { FEED_ALERT_FUEL_SHOCK, STATIC_FEED_STATUS } from "@/config/feedDefaults";
import type { SimulationParams } from "@/domain/region/region.schema";
import type { LiveFeedReadings, LiveReading } from "@/lib/liveFeeds";

export type FeedSeverity = "critical" | "success" | "info" | "warning";

export type IntelFeed = {
  rule: "fuel-alert" | "stabilisation" | "normal";
  severity: FeedSeverity;
  headline: string;
  lines: string[];
  action?: { severity: FeedSeverity; text: string };
};

export function buildIntelFeed(
  params: SimulationParams,
  alertFuelShock: number = FEED_ALERT_FUEL_SHOCK
): IntelFeed {
  if (params.fuelShock > alertFuelShock) {
    return {
      rule: "fuel-alert",
      severity: "critical",
      headline: `CRITICAL ALERT: Fuel Shock > ${alertFuelShock} KES detected.`,
      lines: [
        "Predicted Consequence: Transport paralysis in Nairobi within 48 hours.",
        "Sentiment Analysis: Keywords 'Maandamano' & 'Matatu' trending +400%.",
      ],
      action: {
        severity: "warning",
        text: "RECOMMENDED ACTION: Deploy riot control units to CBD & Kondele.",
      },
    };
  }
  if (params.subsidyActive) {
    return {
      rule: "stabilisation",
      severity: "success",
      headline: "STABILIZATION EFFECT: Subsidy active.",
      lines: [
        "Risk levels dropping across Urban Centers. Market sentiment improving.",
        "Jua Kali liquidity stabilizing.",
      ],
    };
  }
  return {
    rule: "normal",
    severity: "info",
    headline: "SYSTEM STATUS: Normal Monitoring.",
    lines: [
      "No immediate anomalies in Informal Sector liquidity.",
      "Sentinel-2 Scan: Drought persistence in Turkana (Watch List).",
      "KNBS Feed: Inflation stable at 6.8%.",
    ],
  };
}

export type FeedStatusEntry = {
  id: string;
  label: string;
  severity: FeedSeverity;
  text: string;
};

function liveStatus(reading: LiveReading): FeedStatusEntry {
  switch (reading.status) {
    case "live":
      return { id: reading.feedId, label: reading.label, severity: "success", text: "Connected" };
    case "stale":
      return { id: reading.feedId, label: reading.label, severity: "warning", text: "Degraded (cached value)" };
    case "fallback":
      return { id: reading.feedId, label: reading.label, severity: "warning", text: "Offline (fallback value)" };
  }
}

/**
 * Status panel: dataset first, then one entry per live lookup, then the static sources.
 * rowErrorCount > 0 marks the dataset as partially usable.
 */
export function buildFeedStatus(
  readings: LiveFeedReadings,
  dataset: { regionCount: number; rowErrorCount: number }
): FeedStatusEntry[] {
  const datasetEntry: FeedStatusEntry =
    dataset.rowErrorCount > 0
      ? {
          id: "dataset",
          label: "Region snapshot",
          severity: "warning",
          text: `${dataset.regionCount} regions loaded, ${dataset.rowErrorCount} rows rejected`,
        }
      : {
          id: "dataset",
          label: "Region snapshot",
          severity: "success",
          text: `${dataset.regionCount} regions loaded`,
        };
  const staticEntries: FeedStatusEntry[] = STATIC_FEED_STATUS.map((e) => ({ ...e }));
  return [datasetEntry, ...buildLiveFeedStatus(readings), ...staticEntries];
}

export function buildLiveFeedStatus(readings: LiveFeedReadings): FeedStatusEntry[] {
  return [liveStatus(readings.forex), liveStatus(readings.fuel)];
}
