"use client";

import { DATA_MODE_LABELS } from "@/domain/dashboard/buildDashboard";
import {
  DataModeSchema,
  SIMULATION_RANGES,
  type DataMode,
  type SimulationParams,
} from "@/domain/region/region.schema";

type GodModePanelProps = {
  params: SimulationParams;
  onChange: (params: SimulationParams) => void;
  dataMode: DataMode;
  onDataModeChange: (mode: DataMode) => void;
};

const labelStyle: React.CSSProperties = { display: "block", fontSize: 13, fontWeight: 500, marginBottom: 4 };

export function GodModePanel({ params, onChange, dataMode, onDataModeChange }: GodModePanelProps) {
  const notice = DATA_MODE_LABELS[dataMode];

  return (
    <aside style={{ display: "flex", flexDirection: "column", gap: 20 }}>
      <fieldset style={{ border: "none", padding: 0, margin: 0 }}>
        <legend style={labelStyle}>Data Source Mode</legend>
        {DataModeSchema.options.map((mode) => (
          <label key={mode} style={{ display: "flex", alignItems: "center", gap: 6, fontSize: 13 }}>
            <input
              type="radio"
              name="data-mode"
              checked={dataMode === mode}
              onChange={() => onDataModeChange(mode)}
            />
            {DATA_MODE_LABELS[mode].label}
          </label>
        ))}
        <p style={{ fontSize: 12, marginTop: 6, color: notice.severity === "success" ? "#15803d" : "#b45309" }}>
          {notice.notice}
        </p>
      </fieldset>

      <div>
        <h2 style={{ fontSize: 16, fontWeight: 600 }}>GOD MODE: Simulator</h2>
        <p style={{ fontSize: 12, opacity: 0.75 }}>Simulate economic shocks to predict stability.</p>
      </div>

      <div>
        <label htmlFor="fuel-shock" style={labelStyle}>
          Fuel Price Adjustment (KES): {params.fuelShock}
        </label>
        <input
          id="fuel-shock"
          type="range"
          min={SIMULATION_RANGES.fuelShock.min}
          max={SIMULATION_RANGES.fuelShock.max}
          step={1}
          value={params.fuelShock}
          onChange={(e) => onChange({ ...params, fuelShock: Number(e.target.value) })}
          style={{ width: "100%" }}
        />
      </div>

      <div>
        <label htmlFor="tax-hike" style={labelStyle}>
          VAT Tax Rate Increase (%): {params.taxHike}
        </label>
        <input
          id="tax-hike"
          type="range"
          min={SIMULATION_RANGES.taxHike.min}
          max={SIMULATION_RANGES.taxHike.max}
          step={1}
          value={params.taxHike}
          onChange={(e) => onChange({ ...params, taxHike: Number(e.target.value) })}
          style={{ width: "100%" }}
        />
      </div>

      <label style={{ display: "flex", alignItems: "center", gap: 8, fontSize: 13, fontWeight: 500 }}>
        <input
          type="checkbox"
          checked={params.subsidyActive}
          onChange={(e) => onChange({ ...params, subsidyActive: e.target.checked })}
        />
        Activate Emergency Subsidy
      </label>
    </aside>
  );
}
