"use client";

import type { RiskBand } from "@/domain/region/region.schema";

export const BAND_STYLES: Record<RiskBand, { bg: string; dot: string; text: string; label: string }> = {
  critical: { bg: "rgba(239, 68, 68, 0.12)", dot: "#dc2626", text: "#b91c1c", label: "Critical" },
  warning: { bg: "rgba(245, 158, 11, 0.14)", dot: "#d97706", text: "#b45309", label: "Warning" },
  stable: { bg: "rgba(34, 197, 94, 0.12)", dot: "#16a34a", text: "#15803d", label: "Stable" },
};

export function RiskBandBadge({ band, count }: { band: RiskBand; count?: number }) {
  const s = BAND_STYLES[band];

  return (
    <span
      style={{
        display: "inline-flex",
        alignItems: "center",
        gap: 5,
        padding: "2px 8px",
        borderRadius: 9999,
        fontSize: 12,
        fontWeight: 500,
        backgroundColor: s.bg,
        color: s.text,
      }}
    >
      <span style={{ width: 5, height: 5, borderRadius: "50%", backgroundColor: s.dot }} />
      {s.label}
      {count != null && <strong style={{ marginLeft: 2 }}>{count}</strong>}
    </span>
  );
}
