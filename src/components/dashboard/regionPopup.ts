/**
 * Popup body for a clicked region marker. Names come from the snapshot file,
 * so they are set as text, never parsed as markup.
 */
export function buildRegionPopup(doc: Document, region: { name: string; liveRisk: number | string }): HTMLElement {
  const body = doc.createElement("div");
  const title = doc.createElement("div");
  title.style.fontWeight = "600";
  title.textContent = region.name;
  const risk = doc.createElement("div");
  risk.textContent = `Live risk ${region.liveRisk}`;
  body.append(title, risk);
  return body;
}
