import { describe, it } from "node:test";
import assert from "node:assert";
import { loadAppConfig, parseDebugFlag } from "./appConfig";
import { DEFAULT_RISK_POLICY } from "./riskPolicy";

describe("loadAppConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadAppConfig({});
    assert.strictEqual(config.dataPath, "data/regions.csv");
    assert.strictEqual(config.baseRiskColumn, "Base_Risk");
    assert.deepStrictEqual({ ...config.policy }, DEFAULT_RISK_POLICY);
    assert.deepStrictEqual(config.feeds, {
      timeoutMs: 2500,
      ttlMs: 600000,
      retryAfterMs: 60000,
      forexUrl: "https://open.er-api.com/v6/latest/USD",
      fuelPriceUrl: null,
    });
  });

  it("reads policy overrides and the base risk column from the environment", () => {
    const config = loadAppConfig({
      BASE_RISK_COLUMN: "ACLED_Conflict_Index",
      RISK_FUEL_T1: "5",
      RISK_FUEL_A1: "10",
      RISK_FUEL_T2: "20",
      RISK_FUEL_A2: "25",
      RISK_TAX_K: "2",
      RISK_SUBSIDY_S: "20",
      RISK_MAP_DIVISOR: "30000",
      FUEL_PRICE_API_URL: "http://localhost:8080/fuel",
    });
    assert.strictEqual(config.baseRiskColumn, "ACLED_Conflict_Index");
    assert.strictEqual(config.policy.fuelShockThreshold1, 5);
    assert.strictEqual(config.policy.fuelShockBonus1, 10);
    assert.strictEqual(config.policy.fuelShockThreshold2, 20);
    assert.strictEqual(config.policy.fuelShockBonus2, 25);
    assert.strictEqual(config.policy.taxHikeMultiplier, 2);
    assert.strictEqual(config.policy.subsidyRelief, 20);
    assert.strictEqual(config.policy.mapSizeDivisor, 30000);
    assert.strictEqual(config.feeds.fuelPriceUrl, "http://localhost:8080/fuel");
  });

  it("treats blank values as unset", () => {
    const config = loadAppConfig({ RISK_FUEL_T1: "", FEED_TIMEOUT_MS: " ", REGION_DATA_PATH: "" });
    assert.strictEqual(config.policy.fuelShockThreshold1, 10);
    assert.strictEqual(config.feeds.timeoutMs, 2500);
    assert.strictEqual(config.dataPath, "data/regions.csv");
  });

  it("rejects a non-numeric timeout", () => {
    assert.throws(() => loadAppConfig({ FEED_TIMEOUT_MS: "soon" }), /Invalid configuration: FEED_TIMEOUT_MS/);
  });

  it("rejects an invalid fuel price URL", () => {
    assert.throws(() => loadAppConfig({ FUEL_PRICE_API_URL: "not a url" }), /Invalid configuration: FUEL_PRICE_API_URL/);
  });

  it("rejects overrides that break the policy", () => {
    assert.throws(() => loadAppConfig({ RISK_FUEL_T2: "5" }), /Invalid risk policy/);
  });

  it("reads SENTINEL_DEBUG as a tri-state flag", () => {
    assert.strictEqual(loadAppConfig({}).debug, null);
    assert.strictEqual(loadAppConfig({ SENTINEL_DEBUG: " TRUE " }).debug, true);
    assert.strictEqual(loadAppConfig({ SENTINEL_DEBUG: "0" }).debug, false);
    assert.strictEqual(loadAppConfig({ SENTINEL_DEBUG: "" }).debug, null);
  });

  it("rejects an unrecognised SENTINEL_DEBUG value", () => {
    assert.throws(() => loadAppConfig({ SENTINEL_DEBUG: "verbose" }), /Invalid configuration: SENTINEL_DEBUG/);
  });
});

describe("parseDebugFlag", () => {
  it("ignores values the config loader would reject", () => {
    assert.strictEqual(parseDebugFlag("1"), true);
    assert.strictEqual(parseDebugFlag("false"), false);
    assert.strictEqual(parseDebugFlag("verbose"), null);
    assert.strictEqual(parseDebugFlag(undefined), null);
  });
});
