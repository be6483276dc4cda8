"use client";

import type { FeedSeverity, IntelFeed } from "@/domain/dashboard/intelFeed";

export const SEVERITY_STYLES: Record<FeedSeverity, { bg: string; border: string; text: string }> = {
  critical: { bg: "rgba(239, 68, 68, 0.1)", border: "#dc2626", text: "#b91c1c" },
  warning: { bg: "rgba(245, 158, 11, 0.12)", border: "#d97706", text: "#b45309" },
  success: { bg: "rgba(34, 197, 94, 0.1)", border: "#16a34a", text: "#15803d" },
  info: { bg: "rgba(59, 130, 246, 0.1)", border: "#2563eb", text: "#1d4ed8" },
};

function Callout({ severity, children }: { severity: FeedSeverity; children: React.ReactNode }) {
  const s = SEVERITY_STYLES[severity];
  return (
    <div
      style={{
        padding: "8px 12px",
        borderRadius: 6,
        borderLeft: `3px solid ${s.border}`,
        backgroundColor: s.bg,
        color: s.text,
        fontWeight: 500,
      }}
    >
      {children}
    </div>
  );
}

export function IntelFeedPanel({ feed }: { feed: IntelFeed }) {
  return (
    <section style={{ display: "flex", flexDirection: "column", gap: 10 }}>
      <h2 style={{ fontSize: 16, fontWeight: 600 }}>Live Intelligence Feed</h2>
      <Callout severity={feed.severity}>{feed.headline}</Callout>
      {feed.lines.map((line) => (
        <p key={line} style={{ fontSize: 14, margin: 0 }}>
          {line}
        </p>
      ))}
      {feed.action && (
        <>
          <hr style={{ opacity: 0.2 }} />
          <Callout severity={feed.action.severity}>{feed.action.text}</Callout>
        </>
      )}
    </section>
  );
}
