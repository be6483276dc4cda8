import { z } from "zod";
import { InvalidParamsError } from "@/domain/errors";

/**
 * Enums
 */
export const RiskBandSchema = z.enum(["critical", "warning", "stable"]);
export type RiskBand = z.infer<typeof RiskBandSchema>;

export const DataModeSchema = z.enum(["synthetic", "historical"]);
export type DataMode = z.infer<typeof DataModeSchema>;

/**
 * God Mode ranges (slider bounds).
 */
export const SIMULATION_RANGES = {
  fuelShock: { min: -10, max: 50 },
  taxHike: { min: 0, max: 10 },
} as const;

export const SimulationParamsSchema = z.object({
  /** KES adjustment to the pump price, integer in [-10, 50]. */
  fuelShock: z.number().int().min(SIMULATION_RANGES.fuelShock.min).max(SIMULATION_RANGES.fuelShock.max),
  /** VAT increase in percentage points, integer in [0, 10]. */
  taxHike: z.number().int().min(SIMULATION_RANGES.taxHike.min).max(SIMULATION_RANGES.taxHike.max),
  subsidyActive: z.boolean(),
});
export type SimulationParams = z.infer<typeof SimulationParamsSchema>;

export const DEFAULT_SIMULATION_PARAMS: SimulationParams = {
  fuelShock: 0,
  taxHike: 0,
  subsidyActive: false,
};

/**
 * A region row after validation (what the transform reads from the table).
 */
export type RegionRecord = {
  id: string;
  name: string;
  lat: number;
  lon: number;
  population: number;
  baseRisk: number;
  fuelPrice: number | null;
};

/**
 * A region with the derived God Mode fields. Recomputed on every parameter change.
 */
export type LiveRegion = RegionRecord & {
  liveRisk: number;
  band: RiskBand;
  /** Display colour for the band (hex). */
  color: string;
  mapSize: number;
  /** Fuel_Price + fuelShock when the dataset carries Fuel_Price. */
  adjustedFuelPrice: number | null;
};

/**
 * Parsed snapshot as handed out by the loader. Rows are raw cells keyed by header;
 * per-row validation happens in the transform so one bad row never fails the table.
 */
export type RegionTable = {
  sourcePath: string;
  columns: readonly string[];
  baseRiskColumn: string;
  hasFuelPrice: boolean;
  rows: ReadonlyArray<Readonly<Record<string, unknown>>>;
};

export type RowError = {
  rowNumber: number;
  field: string;
  message: string;
};

// ---------- Parameter parsing (query string / form values) ----------

const TRUE_VALUES = new Set(["true", "1", "on", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "off", "no", ""]);

function clampInt(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.round(n)));
}

function readNumber(raw: unknown, key: string, issues: string[]): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "string" && raw.trim() === "") return undefined;
  const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw.trim()) : NaN;
  if (!Number.isFinite(n)) {
    issues.push(`${key} must be a number`);
    return undefined;
  }
  return n;
}

function readBoolean(raw: unknown, key: string, issues: string[]): boolean | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "number" && (raw === 0 || raw === 1)) return raw === 1;
  if (typeof raw === "string") {
    const s = raw.trim().toLowerCase();
    if (TRUE_VALUES.has(s)) return true;
    if (FALSE_VALUES.has(s)) return false;
  }
  issues.push(`${key} must be a boolean`);
  return undefined;
}

/**
 * Reads God Mode parameters from plain scalars (query string, form state, JSON).
 * Numbers are rounded and clamped into their slider range; absent values take defaults.
 * Values that are present but unreadable are rejected with InvalidParamsError.
 * `subsidy` is accepted as an alias of `subsidyActive`.
 */
export function parseSimulationParams(input: unknown): SimulationParams {
  const src: Record<string, unknown> =
    input instanceof URLSearchParams
      ? Object.fromEntries(input.entries())
      : input != null && typeof input === "object"
        ? { ...input }
        : {};

  const issues: string[] = [];
  const fuelShock = readNumber(src.fuelShock, "fuelShock", issues);
  const taxHike = readNumber(src.taxHike, "taxHike", issues);
  const subsidyActive = readBoolean(src.subsidyActive ?? src.subsidy, "subsidyActive", issues);
  if (issues.length > 0) throw new InvalidParamsError(issues);

  const { fuelShock: fr, taxHike: tr } = SIMULATION_RANGES;
  return SimulationParamsSchema.parse({
    fuelShock: fuelShock === undefined ? DEFAULT_SIMULATION_PARAMS.fuelShock : clampInt(fuelShock, fr.min, fr.max),
    taxHike: taxHike === undefined ? DEFAULT_SIMULATION_PARAMS.taxHike : clampInt(taxHike, tr.min, tr.max),
    subsidyActive: subsidyActive ?? DEFAULT_SIMULATION_PARAMS.subsidyActive,
  });
}

/** Query string form of the parameters (inverse of parseSimulationParams). */
export function simulationParamsToQuery(params: SimulationParams): string {
  const q = new URLSearchParams({
    fuelShock: String(params.fuelShock),
    taxHike: String(params.taxHike),
    subsidy: params.subsidyActive ? "1" : "0",
  });
  return q.toString();
}
