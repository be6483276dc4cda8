import { describe, it } from "node:test";
import assert from "node:assert";
import {
  createForexProvider,
  createFuelPriceProvider,
  createLiveFeedLookups,
  createLiveLookup,
  readLiveFeeds,
  withTimeout,
  type LiveRateProvider,
} from "./liveFeeds";

type Step = number | Error | "hang";

/** Provider that replays scripted results and counts calls. */
function scriptedProvider(steps: Step[]): LiveRateProvider & { calls: number; signals: AbortSignal[] } {
  const provider = {
    id: "forex" as const,
    label: "Forex USD/KES",
    calls: 0,
    signals: [] as AbortSignal[],
    fetchRate: async (signal: AbortSignal): Promise<number> => {
      const step = steps[Math.min(provider.calls, steps.length - 1)];
      provider.calls++;
      provider.signals.push(signal);
      if (step === "hang") return new Promise<number>(() => {});
      if (step instanceof Error) throw step;
      return step;
    },
  };
  return provider;
}

function clock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

const TIMING = { timeoutMs: 50, ttlMs: 1_000, retryAfterMs: 200, fallback: 129 };

describe("createLiveLookup", () => {
  it("returns a live reading on success", async () => {
    const c = clock();
    const lookup = createLiveLookup(scriptedProvider([130.5]), { ...TIMING, now: c.now });
    assert.deepStrictEqual(await lookup(), {
      feedId: "forex",
      label: "Forex USD/KES",
      value: 130.5,
      status: "live",
      fetchedAt: 1_000,
    });
  });

  it("reuses a good reading within the TTL and refetches after it", async () => {
    const c = clock();
    const provider = scriptedProvider([130.5, 131]);
    const lookup = createLiveLookup(provider, { ...TIMING, now: c.now });
    await lookup();
    c.advance(999);
    const cached = await lookup();
    assert.strictEqual(provider.calls, 1);
    assert.strictEqual(cached.value, 130.5);
    assert.strictEqual(cached.status, "live");

    c.advance(1);
    const fresh = await lookup();
    assert.strictEqual(provider.calls, 2);
    assert.strictEqual(fresh.value, 131);
    assert.strictEqual(fresh.fetchedAt, 2_000);
  });

  it("falls back to the constant when the first fetch fails", async () => {
    const lookup = createLiveLookup(scriptedProvider([new Error("HTTP 502")]), TIMING);
    assert.deepStrictEqual(await lookup(), {
      feedId: "forex",
      label: "Forex USD/KES",
      value: 129,
      status: "fallback",
      fetchedAt: null,
      error: "HTTP 502",
    });
  });

  it("serves the last good value as stale after a later failure", async () => {
    const c = clock();
    const lookup = createLiveLookup(scriptedProvider([130.5, new Error("HTTP 500")]), { ...TIMING, now: c.now });
    await lookup();
    c.advance(1_000);
    const reading = await lookup();
    assert.strictEqual(reading.status, "stale");
    assert.strictEqual(reading.value, 130.5);
    assert.strictEqual(reading.fetchedAt, 1_000);
    assert.strictEqual(reading.error, "HTTP 500");
  });

  it("waits retryAfterMs before asking a failed remote again", async () => {
    const c = clock();
    const provider = scriptedProvider([new Error("down"), 131]);
    const lookup = createLiveLookup(provider, { ...TIMING, now: c.now });
    await lookup();
    c.advance(199);
    const during = await lookup();
    assert.strictEqual(provider.calls, 1);
    assert.strictEqual(during.status, "fallback");

    c.advance(1);
    const after = await lookup();
    assert.strictEqual(provider.calls, 2);
    assert.strictEqual(after.status, "live");
    assert.strictEqual(after.value, 131);
  });

  it("yields the fallback when the provider times out, and aborts its signal", async () => {
    const provider = scriptedProvider(["hang"]);
    const lookup = createLiveLookup(provider, { ...TIMING, timeoutMs: 20 });
    const reading = await lookup();
    assert.strictEqual(reading.status, "fallback");
    assert.strictEqual(reading.value, 129);
    assert.strictEqual(reading.error, "timed out after 20ms");
    assert.strictEqual(provider.signals[0].aborted, true);
  });

  it("rejects non-positive or non-finite rates", async () => {
    const zero = createLiveLookup(scriptedProvider([0]), TIMING);
    const nan = createLiveLookup(scriptedProvider([Number.NaN]), TIMING);
    assert.strictEqual((await zero()).status, "fallback");
    assert.strictEqual((await nan()).error, "invalid rate NaN");
  });

  it("shares one in-flight fetch between concurrent callers", async () => {
    const provider = scriptedProvider([130.5]);
    const lookup = createLiveLookup(provider, TIMING);
    const [a, b] = await Promise.all([lookup(), lookup()]);
    assert.strictEqual(provider.calls, 1);
    assert.strictEqual(a.value, 130.5);
    assert.strictEqual(b.value, 130.5);
  });
});

describe("withTimeout", () => {
  it("resolves with the callee's value when it finishes in time", async () => {
    assert.strictEqual(await withTimeout(async () => 7, 50), 7);
  });
});

function jsonFetch(status: number, body: unknown) {
  const urls: string[] = [];
  const fetchImpl = async (url: string) => {
    urls.push(url);
    return { ok: status >= 200 && status < 300, status, json: async () => body };
  };
  return { fetchImpl, urls };
}

describe("providers", () => {
  const signal = new AbortController().signal;

  it("reads KES from an exchange-rate payload", async () => {
    const { fetchImpl, urls } = jsonFetch(200, { result: "success", rates: { USD: 1, KES: 129.75 } });
    const provider = createForexProvider("http://localhost/rates", fetchImpl);
    assert.strictEqual(await provider.fetchRate(signal), 129.75);
    assert.deepStrictEqual(urls, ["http://localhost/rates"]);
  });

  it("rejects a non-2xx forex response", async () => {
    const { fetchImpl } = jsonFetch(503, {});
    await assert.rejects(createForexProvider("http://localhost/rates", fetchImpl).fetchRate(signal), /HTTP 503/);
  });

  it("rejects a forex payload without KES", async () => {
    const { fetchImpl } = jsonFetch(200, { rates: { USD: 1 } });
    await assert.rejects(createForexProvider("http://localhost/rates", fetchImpl).fetchRate(signal));
  });

  it("reads the pump price", async () => {
    const { fetchImpl } = jsonFetch(200, { price: 217.36 });
    assert.strictEqual(await createFuelPriceProvider("http://localhost/fuel", fetchImpl).fetchRate(signal), 217.36);
  });

  it("fails immediately when no fuel price URL is configured", async () => {
    const { fetchImpl, urls } = jsonFetch(200, { price: 1 });
    await assert.rejects(createFuelPriceProvider(null, fetchImpl).fetchRate(signal), /fuel price feed not configured/);
    assert.deepStrictEqual(urls, []);
  });
});

describe("readLiveFeeds", () => {
  it("degrades the unconfigured fuel feed to its fallback while forex stays live", async () => {
    const { fetchImpl } = jsonFetch(200, { rates: { KES: 130.1 } });
    const lookups = createLiveFeedLookups(
      { timeoutMs: 50, ttlMs: 1_000, retryAfterMs: 200, forexUrl: "http://localhost/rates", fuelPriceUrl: null },
      fetchImpl
    );
    const readings = await readLiveFeeds(lookups);
    assert.strictEqual(readings.forex.status, "live");
    assert.strictEqual(readings.forex.value, 130.1);
    assert.strictEqual(readings.fuel.status, "fallback");
    assert.strictEqual(readings.fuel.value, 215);
    assert.strictEqual(readings.fuel.error, "fuel price feed not configured");
  });
});
