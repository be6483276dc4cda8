/**
 * Region snapshot loader: delimited file (CSV) on local disk, first row = headers.
 * Parsing goes through SheetJS so the same loader reads .csv and .xlsx snapshots.
 * Any failure is a DataUnavailableError; no partial or default table is ever returned.
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { DataUnavailableError } from "@/domain/errors";
import type { RegionTable } from "@/domain/region/region.schema";
import { REGION_COLUMNS } from "@/domain/region/risk.transform";
import { dlog } from "@/lib/debug";

export type LoadRegionTableOptions = {
  /** Header holding the base risk (canonical: Base_Risk; older snapshots: ACLED_Conflict_Index). */
  baseRiskColumn?: string;
};

export const DEFAULT_BASE_RISK_COLUMN = "Base_Risk";

type CacheEntry = { mtimeMs: number; size: number; baseRiskColumn: string; table: RegionTable };

const cache = new Map<string, CacheEntry>();

const TEXT_EXTENSIONS = new Set([".csv", ".tsv", ".txt"]);

export function clearRegionTableCache(): void {
  cache.clear();
}

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parses snapshot contents into headers + rows. Throws (plain Error) on unreadable content;
 * loadRegionTable wraps that into DataUnavailableError.
 */
export function parseRegionSheet(data: Buffer | string): { headers: string[]; rows: Record<string, unknown>[] } {
  // raw: text cells stay strings ("5/10", "62%"), so the row transform decides what is numeric
  const workbook =
    typeof data === "string" ? XLSX.read(data, { type: "string", raw: true }) : XLSX.read(data, { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) throw new Error("snapshot has no sheets");
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) throw new Error("first sheet could not be read");

  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true });
  const headerRow = raw[0] ?? [];
  const headers = headerRow.map((h) => (h == null ? "" : String(h).trim()));
  if (headers.every((h) => h === "")) throw new Error("snapshot has no header row");

  const rows: Record<string, unknown>[] = [];
  for (let i = 1; i < raw.length; i++) {
    const cells = raw[i] ?? [];
    if (isRowEmpty(cells)) continue;
    const row: Record<string, unknown> = {};
    headers.forEach((h, j) => {
      if (h !== "") row[h] = cells[j] ?? null;
    });
    rows.push(row);
  }
  return { headers: headers.filter((h) => h !== ""), rows };
}

export function requiredColumns(baseRiskColumn: string): string[] {
  return [REGION_COLUMNS.lat, REGION_COLUMNS.lon, REGION_COLUMNS.population, baseRiskColumn];
}

/**
 * Loads and validates the snapshot. Cached per absolute path until the file's mtime or size
 * changes; failures are not cached.
 */
export async function loadRegionTable(
  filePath: string,
  options: LoadRegionTableOptions = {}
): Promise<RegionTable> {
  const baseRiskColumn = options.baseRiskColumn ?? DEFAULT_BASE_RISK_COLUMN;
  const sourcePath = path.resolve(filePath);

  let info: { mtimeMs: number; size: number };
  try {
    const s = await stat(sourcePath);
    if (!s.isFile()) throw new Error("not a regular file");
    info = { mtimeMs: s.mtimeMs, size: s.size };
  } catch (err) {
    throw new DataUnavailableError(sourcePath, errorMessage(err));
  }

  const hit = cache.get(sourcePath);
  if (hit && hit.mtimeMs === info.mtimeMs && hit.size === info.size && hit.baseRiskColumn === baseRiskColumn) {
    return hit.table;
  }

  let parsed: { headers: string[]; rows: Record<string, unknown>[] };
  try {
    const isText = TEXT_EXTENSIONS.has(path.extname(sourcePath).toLowerCase());
    const data = isText ? await readFile(sourcePath, "utf8") : await readFile(sourcePath);
    parsed = parseRegionSheet(data);
  } catch (err) {
    throw new DataUnavailableError(sourcePath, errorMessage(err));
  }

  const missing = requiredColumns(baseRiskColumn).filter((c) => !parsed.headers.includes(c));
  if (missing.length > 0) {
    throw new DataUnavailableError(sourcePath, `missing required column(s): ${missing.join(", ")}`);
  }

  const table: RegionTable = Object.freeze({
    sourcePath,
    columns: Object.freeze([...parsed.headers]),
    baseRiskColumn,
    hasFuelPrice: parsed.headers.includes(REGION_COLUMNS.fuelPrice),
    rows: Object.freeze(parsed.rows.map((r) => Object.freeze(r))),
  });
  cache.set(sourcePath, { ...info, baseRiskColumn, table });
  dlog("[regionData] loaded", { sourcePath, rows: table.rows.length, baseRiskColumn });
  return table;
}
