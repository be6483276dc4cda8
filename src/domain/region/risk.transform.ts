/**
 * God Mode risk transform (pure functions only).
 * No I/O, no rendering; the loader hands in a RegionTable and the dashboard reads the result.
 */

import {
  DEFAULT_RISK_POLICY,
  RISK_BAND_COLORS,
  riskBandThresholds,
  type RiskBandThresholds,
  type RiskPolicy,
} from "@/config/riskPolicy";
import { MissingFieldError } from "@/domain/errors";
import type {
  LiveRegion,
  RegionRecord,
  RegionTable,
  RiskBand,
  RowError,
  SimulationParams,
} from "@/domain/region/region.schema";

export const REGION_COLUMNS = {
  name: "Region",
  lat: "lat",
  lon: "lon",
  population: "Population",
  fuelPrice: "Fuel_Price",
} as const;

/**
 * Live risk for one region: base plus the God Mode adjustments, capped at policy.riskCap.
 * Thresholds are strict (a value equal to a threshold adds nothing); both fuel tiers stack.
 * No lower clamp: a large subsidy can push the score below zero.
 */
export function calculateLiveRisk(
  base: number,
  params: SimulationParams,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): number {
  if (typeof base !== "number" || !Number.isFinite(base)) {
    throw new MissingFieldError("baseRisk");
  }
  let risk = base;
  if (params.fuelShock > policy.fuelShockThreshold1) risk += policy.fuelShockBonus1;
  if (params.fuelShock > policy.fuelShockThreshold2) risk += policy.fuelShockBonus2;
  if (params.taxHike > policy.taxHikeThreshold) risk += params.taxHike * policy.taxHikeMultiplier;
  if (params.subsidyActive) risk -= policy.subsidyRelief;
  return Math.min(risk, policy.riskCap);
}

/** critical >= 75, warning >= 50, else stable. Lower edge of each band is inclusive. */
export function getRiskBand(
  risk: number,
  thresholds: RiskBandThresholds = riskBandThresholds
): RiskBand {
  if (risk >= thresholds.criticalMin) return "critical";
  if (risk >= thresholds.warningMin) return "warning";
  return "stable";
}

export function getMapSize(population: number, divisor: number = DEFAULT_RISK_POLICY.mapSizeDivisor): number {
  return population / divisor;
}

function readCell(row: Readonly<Record<string, unknown>>, column: string, rowNumber: number): number {
  const value = row[column];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    if (Number.isFinite(n)) return n;
  }
  throw new MissingFieldError(column, rowNumber);
}

function readOptionalCell(row: Readonly<Record<string, unknown>>, column: string): number | null {
  const value = row[column];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Validates one raw table row into a RegionRecord.
 * @param index 0-based row index; errors report the 1-based row number.
 */
export function toRegionRecord(
  row: Readonly<Record<string, unknown>>,
  index: number,
  table: Pick<RegionTable, "baseRiskColumn" | "hasFuelPrice">
): RegionRecord {
  const rowNumber = index + 1;
  const lat = readCell(row, REGION_COLUMNS.lat, rowNumber);
  const lon = readCell(row, REGION_COLUMNS.lon, rowNumber);
  const population = readCell(row, REGION_COLUMNS.population, rowNumber);
  if (population < 0) {
    throw new MissingFieldError(REGION_COLUMNS.population, rowNumber, "negative");
  }
  const baseRisk = readCell(row, table.baseRiskColumn, rowNumber);

  const rawName = row[REGION_COLUMNS.name];
  const name = typeof rawName === "string" && rawName.trim() !== "" ? rawName.trim() : `Region ${rowNumber}`;

  return {
    id: `region-${rowNumber}`,
    name,
    lat,
    lon,
    population,
    baseRisk,
    fuelPrice: table.hasFuelPrice ? readOptionalCell(row, REGION_COLUMNS.fuelPrice) : null,
  };
}

/** Derived fields for one validated record. */
export function applyGodMode(
  record: RegionRecord,
  params: SimulationParams,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): LiveRegion {
  const liveRisk = calculateLiveRisk(record.baseRisk, params, policy);
  const band = getRiskBand(liveRisk);
  return {
    ...record,
    liveRisk,
    band,
    color: RISK_BAND_COLORS[band],
    mapSize: getMapSize(record.population, policy.mapSizeDivisor),
    adjustedFuelPrice: record.fuelPrice == null ? null : record.fuelPrice + params.fuelShock,
  };
}

export function transformRegionRow(
  row: Readonly<Record<string, unknown>>,
  index: number,
  table: Pick<RegionTable, "baseRiskColumn" | "hasFuelPrice">,
  params: SimulationParams,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): LiveRegion {
  return applyGodMode(toRegionRecord(row, index, table), params, policy);
}

export type TransformResult = {
  regions: LiveRegion[];
  rowErrors: RowError[];
};

/**
 * Runs the transform over every row. Rows failing validation are excluded and listed in
 * rowErrors; they are never defaulted to zero. Anything other than MissingFieldError is rethrown.
 */
export function transformRegions(
  table: RegionTable,
  params: SimulationParams,
  policy: RiskPolicy = DEFAULT_RISK_POLICY
): TransformResult {
  const regions: LiveRegion[] = [];
  const rowErrors: RowError[] = [];
  table.rows.forEach((row, index) => {
    try {
      regions.push(transformRegionRow(row, index, table, params, policy));
    } catch (err) {
      if (!(err instanceof MissingFieldError)) throw err;
      rowErrors.push({ rowNumber: index + 1, field: err.field, message: err.message });
    }
  });
  return { regions, rowErrors };
}
