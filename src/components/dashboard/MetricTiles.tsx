"use client";

import type { MetricTile } from "@/domain/dashboard/metrics";

const SOURCE_COLOR: Record<NonNullable<MetricTile["source"]>, string> = {
  live: "#16a34a",
  stale: "#d97706",
  fallback: "#d97706",
};

export function MetricTiles({ tiles }: { tiles: MetricTile[] }) {
  return (
    <div
      style={{
        display: "grid",
        gridTemplateColumns: "repeat(auto-fit, minmax(180px, 1fr))",
        gap: 12,
      }}
    >
      {tiles.map((t) => (
        <div
          key={t.id}
          style={{
            padding: "12px 16px",
            borderRadius: 8,
            border: "1px solid var(--border, #e5e7eb)",
            background: "var(--card, transparent)",
          }}
        >
          <div style={{ fontSize: 12, opacity: 0.75 }}>{t.label}</div>
          <div style={{ fontSize: 24, fontWeight: 600, marginTop: 4 }}>{t.value}</div>
          <div style={{ fontSize: 12, marginTop: 2, color: t.source ? SOURCE_COLOR[t.source] : undefined }}>
            {t.delta}
          </div>
        </div>
      ))}
    </div>
  );
}
