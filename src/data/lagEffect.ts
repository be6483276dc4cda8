/**
 * Historical "lag effect" series for the bottom chart: economic stress leads security
 * incidents by roughly two weeks. Static reference data, not recomputed.
 */

export type LagEffectPoint = {
  week: string;
  economicStress: number;
  securityIncidents: number;
};

export const LAG_EFFECT_SERIES: readonly LagEffectPoint[] = [
  { week: "W1", economicStress: 20, securityIncidents: 10 },
  { week: "W2", economicStress: 25, securityIncidents: 12 },
  { week: "W3", economicStress: 80, securityIncidents: 15 },
  { week: "W4", economicStress: 85, securityIncidents: 25 },
  { week: "W5", economicStress: 90, securityIncidents: 75 },
  { week: "W6", economicStress: 88, securityIncidents: 95 },
];

export const LAG_EFFECT_CAPTION =
  "Observation: Economic stress peaks at Week 3. Security incidents peak at Week 5. (14-Day Lead Time).";
