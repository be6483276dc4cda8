import { after, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DataUnavailableError } from "@/domain/errors";
import { transformRegions } from "@/domain/region/risk.transform";
import { clearRegionTableCache, loadRegionTable, parseRegionSheet } from "./regionData";

const HEADER = "Region,lat,lon,Population,Base_Risk,Fuel_Price";

let dir = "";

async function writeCsv(name: string, lines: string[]): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, lines.join("\n") + "\n", "utf8");
  return file;
}

async function expectUnavailable(promise: Promise<unknown>, reason: RegExp): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(err instanceof DataUnavailableError);
    assert.strictEqual(err.code, "DATA_UNAVAILABLE");
    assert.match(err.reason, reason);
    return true;
  });
}

describe("loadRegionTable", () => {
  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "regions-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    clearRegionTableCache();
  });

  it("loads rows keyed by header", async () => {
    const file = await writeCsv("ok.csv", [
      HEADER,
      "Nairobi,-1.2921,36.8219,4400000,62,217.4",
      "Nyeri,-0.4201,36.9476,759000,24,217.1",
    ]);
    const table = await loadRegionTable(file);
    assert.strictEqual(table.sourcePath, file);
    assert.deepStrictEqual([...table.columns], ["Region", "lat", "lon", "Population", "Base_Risk", "Fuel_Price"]);
    assert.strictEqual(table.baseRiskColumn, "Base_Risk");
    assert.strictEqual(table.hasFuelPrice, true);
    assert.strictEqual(table.rows.length, 2);

    const { regions, rowErrors } = transformRegions(table, { fuelShock: 0, taxHike: 0, subsidyActive: false });
    assert.deepStrictEqual(rowErrors, []);
    assert.strictEqual(regions[0].name, "Nairobi");
    assert.strictEqual(regions[0].lat, -1.2921);
    assert.strictEqual(regions[0].population, 4400000);
    assert.strictEqual(regions[0].baseRisk, 62);
    assert.strictEqual(regions[1].baseRisk, 24);
  });

  it("fails with data unavailable for a missing file", async () => {
    await expectUnavailable(loadRegionTable(path.join(dir, "does-not-exist.csv")), /ENOENT/);
  });

  it("fails with data unavailable for a directory", async () => {
    const sub = path.join(dir, "folder.csv");
    await mkdir(sub, { recursive: true });
    await expectUnavailable(loadRegionTable(sub), /not a regular file/);
  });

  it("fails when a required column is missing", async () => {
    const file = await writeCsv("no-risk.csv", ["Region,lat,lon,Population", "Nairobi,-1.29,36.82,4400000"]);
    await expectUnavailable(loadRegionTable(file), /^missing required column\(s\): Base_Risk$/);
  });

  it("fails for an empty file", async () => {
    const file = path.join(dir, "empty.csv");
    await writeFile(file, "", "utf8");
    await expectUnavailable(loadRegionTable(file), /./);
  });

  it("reads the configured base risk column", async () => {
    const file = await writeCsv("acled.csv", [
      "Region,lat,lon,Population,ACLED_Conflict_Index",
      "Turkana,3.1191,35.5973,926000,52",
    ]);
    const table = await loadRegionTable(file, { baseRiskColumn: "ACLED_Conflict_Index" });
    assert.strictEqual(table.baseRiskColumn, "ACLED_Conflict_Index");
    assert.strictEqual(table.hasFuelPrice, false);
    await expectUnavailable(loadRegionTable(file), /Base_Risk/);
  });

  it("skips empty rows and keeps rows with blank cells for the transform to reject", async () => {
    const file = await writeCsv("gaps.csv", [
      HEADER,
      "Nairobi,-1.2921,36.8219,4400000,62,217.4",
      ",,,,,",
      "Mombasa,-4.0435,39.6682,1210000,,214.1",
    ]);
    const table = await loadRegionTable(file);
    assert.strictEqual(table.rows.length, 2);
    const { regions, rowErrors } = transformRegions(table, { fuelShock: 0, taxHike: 0, subsidyActive: false });
    assert.strictEqual(regions.length, 1);
    assert.deepStrictEqual(rowErrors.map((e) => [e.rowNumber, e.field]), [[2, "Base_Risk"]]);
  });

  it("keeps date- and percent-like cells as text so the transform rejects them", async () => {
    const file = await writeCsv("formatted.csv", [
      HEADER,
      "A,-1.2921,36.8219,4400000,5/10,217.4",
      "B,-1.2921,36.8219,4400000,62%,217.4",
      "C,-1.2921,36.8219,4400000,Mar 3,217.4",
      "D,-1.2921,36.8219,10%,40,217.4",
      "E,-0.4201,36.9476,759000,24,217.1",
    ]);
    const table = await loadRegionTable(file);
    assert.deepStrictEqual(
      table.rows.map((r) => r.Base_Risk),
      ["5/10", "62%", "Mar 3", "40", "24"]
    );

    const { regions, rowErrors } = transformRegions(table, { fuelShock: 0, taxHike: 0, subsidyActive: false });
    assert.deepStrictEqual(regions.map((r) => [r.name, r.baseRisk]), [["E", 24]]);
    assert.deepStrictEqual(
      rowErrors.map((e) => [e.rowNumber, e.field]),
      [
        [1, "Base_Risk"],
        [2, "Base_Risk"],
        [3, "Base_Risk"],
        [4, "Population"],
      ]
    );
  });

  it("caches the parsed table until the file changes", async () => {
    const file = await writeCsv("cached.csv", [HEADER, "Nairobi,-1.2921,36.8219,4400000,62,217.4"]);
    const first = await loadRegionTable(file);
    const second = await loadRegionTable(file);
    assert.strictEqual(second, first);

    await writeCsv("cached.csv", [
      HEADER,
      "Nairobi,-1.2921,36.8219,4400000,62,217.4",
      "Nyeri,-0.4201,36.9476,759000,24,217.1",
    ]);
    const third = await loadRegionTable(file);
    assert.notStrictEqual(third, first);
    assert.strictEqual(third.rows.length, 2);
  });

  it("returns a frozen table", async () => {
    const file = await writeCsv("frozen.csv", [HEADER, "Nairobi,-1.2921,36.8219,4400000,62,217.4"]);
    const table = await loadRegionTable(file);
    assert.strictEqual(Object.isFrozen(table), true);
    assert.strictEqual(Object.isFrozen(table.rows), true);
    assert.strictEqual(Object.isFrozen(table.rows[0]), true);
  });
});

describe("parseRegionSheet", () => {
  it("drops blank header cells", () => {
    const { headers, rows } = parseRegionSheet("lat,,lon\n1,x,2\n");
    assert.deepStrictEqual(headers, ["lat", "lon"]);
    assert.deepStrictEqual(Object.keys(rows[0]), ["lat", "lon"]);
  });
});
