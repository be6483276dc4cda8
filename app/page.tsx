"use client";

import { useEffect, useState } from "react";
import dynamic from "next/dynamic";
import { FeedStatusPanel } from "@/components/dashboard/FeedStatusPanel";
import { GodModePanel } from "@/components/dashboard/GodModePanel";
import { IntelFeedPanel } from "@/components/dashboard/IntelFeedPanel";
import { LagEffectChart } from "@/components/dashboard/LagEffectChart";
import { MetricTiles } from "@/components/dashboard/MetricTiles";
import { RiskBandBadge } from "@/components/dashboard/RiskBandBadge";
import { DATA_MODE_LABELS, type DashboardView } from "@/domain/dashboard/buildDashboard";
import {
  DEFAULT_SIMULATION_PARAMS,
  RiskBandSchema,
  simulationParamsToQuery,
  type DataMode,
  type SimulationParams,
} from "@/domain/region/region.schema";

// maplibre touches window on import
const RegionMap = dynamic(
  () => import("@/components/dashboard/RegionMap").then((m) => m.RegionMap),
  { ssr: false }
);

type LoadState =
  | { kind: "loading" }
  | { kind: "ready"; view: DashboardView }
  | { kind: "unavailable"; message: string }
  | { kind: "error"; message: string };

export default function DashboardPage() {
  const [params, setParams] = useState<SimulationParams>(DEFAULT_SIMULATION_PARAMS);
  const [dataMode, setDataMode] = useState<DataMode>("synthetic");
  const [state, setState] = useState<LoadState>({ kind: "loading" });

  useEffect(() => {
    const controller = new AbortController();

    async function load() {
      try {
        const res = await fetch(`/api/dashboard?${simulationParamsToQuery(params)}`, {
          signal: controller.signal,
        });
        const json = await res.json().catch(() => null);
        if (res.status === 503) {
          setState({ kind: "unavailable", message: json?.reason ?? "data unavailable" });
          return;
        }
        if (!res.ok || !json || !Array.isArray(json.regions)) {
          setState({ kind: "error", message: json?.error ?? `HTTP ${res.status}` });
          return;
        }
        setState({ kind: "ready", view: json as DashboardView });
      } catch (e) {
        if (controller.signal.aborted) return;
        setState({ kind: "error", message: e instanceof Error ? e.message : "Request failed" });
      }
    }

    void load();
    return () => controller.abort();
  }, [params]);

  return (
    <div style={{ display: "grid", gridTemplateColumns: "280px 1fr", minHeight: "100vh" }}>
      <div style={{ padding: 20, borderRight: "1px solid var(--border)" }}>
        <h1 style={{ fontSize: 18, fontWeight: 700, marginBottom: 2 }}>EconSentinel</h1>
        <p style={{ fontSize: 12, opacity: 0.7, marginBottom: 20 }}>Socio-Economic Threat Prediction Engine</p>
        <GodModePanel
          params={params}
          onChange={setParams}
          dataMode={dataMode}
          onDataModeChange={setDataMode}
        />
        {state.kind === "ready" && (
          <div style={{ marginTop: 24 }}>
            <FeedStatusPanel entries={state.view.feedStatus} />
          </div>
        )}
      </div>

      <main style={{ padding: 24, display: "flex", flexDirection: "column", gap: 24 }}>
        <header>
          <h1 style={{ fontSize: 24, fontWeight: 700 }}>EconSentinel Command Center</h1>
          <p style={{ fontSize: 14 }}>
            <strong>Status:</strong> Live Monitoring | <strong>Mode:</strong> {DATA_MODE_LABELS[dataMode].label}
          </p>
        </header>

        {state.kind === "loading" && <p>Loading…</p>}

        {state.kind === "unavailable" && (
          <div role="alert" style={{ padding: 16, borderRadius: 8, background: "rgba(239, 68, 68, 0.12)", color: "#b91c1c" }}>
            <strong>CRITICAL ERROR: Region data unavailable.</strong>
            <div style={{ fontSize: 13, marginTop: 4 }}>{state.message}</div>
          </div>
        )}

        {state.kind === "error" && (
          <div role="alert" style={{ color: "#b91c1c" }}>
            {state.message}
          </div>
        )}

        {state.kind === "ready" && (
          <>
            <MetricTiles tiles={state.view.metrics.tiles} />

            <div style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
              {RiskBandSchema.options.map((band) => (
                <RiskBandBadge key={band} band={band} count={state.view.metrics.bandCounts[band]} />
              ))}
            </div>

            {state.view.rowErrors.length > 0 && (
              <p style={{ fontSize: 12, color: "#b45309" }}>
                {state.view.rowErrors.length} row(s) excluded:{" "}
                {state.view.rowErrors.map((e) => e.message).join("; ")}
              </p>
            )}

            <div style={{ display: "grid", gridTemplateColumns: "2fr 1fr", gap: 24 }}>
              <RegionMap regions={state.view.regions} />
              <IntelFeedPanel feed={state.view.feed} />
            </div>

            <LagEffectChart series={state.view.chart.series} caption={state.view.chart.caption} />
          </>
        )}

        <footer style={{ textAlign: "center", fontSize: 12, opacity: 0.6, borderTop: "1px solid var(--border)", paddingTop: 12 }}>
          <b>COMPLIANCE NOTICE:</b> God Mode scenarios rely on synthetic data distributions to protect privacy.
          Historical baselines use open public data (KNBS/ACLED).
        </footer>
      </main>
    </div>
  );
}
