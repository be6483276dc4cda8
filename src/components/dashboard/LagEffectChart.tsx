"use client";

import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { LagEffectPoint } from "@/data/lagEffect";

export function LagEffectChart({ series, caption }: { series: readonly LagEffectPoint[]; caption: string }) {
  return (
    <section>
      <h2 style={{ fontSize: 16, fontWeight: 600 }}>The &lsquo;Lag Effect&rsquo; Analysis</h2>
      <p style={{ fontSize: 13, opacity: 0.8 }}>
        Historical correlation between Price Shocks (Blue) and Security Incidents (Red).
      </p>
      <div style={{ width: "100%", height: 280 }}>
        <ResponsiveContainer>
          <LineChart data={[...series]} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
            <CartesianGrid strokeDasharray="3 3" strokeOpacity={0.3} />
            <XAxis dataKey="week" />
            <YAxis domain={[0, 100]} />
            <Tooltip />
            <Legend />
            <Line type="monotone" dataKey="economicStress" name="Economic Stress" stroke="#0000FF" strokeWidth={2} />
            <Line type="monotone" dataKey="securityIncidents" name="Security Incidents" stroke="#FF0000" strokeWidth={2} />
          </LineChart>
        </ResponsiveContainer>
      </div>
      <p style={{ fontSize: 12, opacity: 0.7 }}>{caption}</p>
    </section>
  );
}
