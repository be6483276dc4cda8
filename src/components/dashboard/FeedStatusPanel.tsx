"use client";

import type { FeedStatusEntry } from "@/domain/dashboard/intelFeed";
import { SEVERITY_STYLES } from "@/components/dashboard/IntelFeedPanel";

export function FeedStatusPanel({ entries }: { entries: FeedStatusEntry[] }) {
  return (
    <section>
      <h3 style={{ fontSize: 14, fontWeight: 600, marginBottom: 8 }}>Data Feed Status</h3>
      <ul style={{ listStyle: "none", padding: 0, margin: 0, display: "grid", gap: 6 }}>
        {entries.map((e) => (
          <li key={e.id} style={{ fontSize: 13, display: "flex", alignItems: "center", gap: 6 }}>
            <span
              style={{
                width: 8,
                height: 8,
                borderRadius: "50%",
                backgroundColor: SEVERITY_STYLES[e.severity].border,
              }}
            />
            <span style={{ fontWeight: 500 }}>{e.label}</span>
            <span style={{ opacity: 0.75 }}>({e.text})</span>
          </li>
        ))}
      </ul>
    </section>
  );
}
