"use client";

import { useEffect, useRef } from "react";
import maplibregl, { GeoJSONSource, LngLatBounds, NavigationControl } from "maplibre-gl";
import type { FeatureCollection, Point } from "geojson";
import "maplibre-gl/dist/maplibre-gl.css";
import type { LiveRegion } from "@/domain/region/region.schema";
import { buildRegionPopup } from "@/components/dashboard/regionPopup";

const MAP_STYLE_URL = process.env.NEXT_PUBLIC_MAP_STYLE_URL || "https://demotiles.maplibre.org/style.json";
const SOURCE_ID = "regions";
const LAYER_ID = "regions-circles";

function toFeatureCollection(regions: LiveRegion[]): FeatureCollection<Point> {
  return {
    type: "FeatureCollection",
    features: regions.map((r) => ({
      type: "Feature",
      id: r.id,
      geometry: { type: "Point", coordinates: [r.lon, r.lat] },
      properties: {
        name: r.name,
        liveRisk: Math.round(r.liveRisk * 10) / 10,
        color: r.color,
        mapSize: r.mapSize,
      },
    })),
  };
}

export function RegionMap({ regions }: { regions: LiveRegion[] }) {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const mapRef = useRef<maplibregl.Map | null>(null);
  const regionsRef = useRef(regions);
  regionsRef.current = regions;

  useEffect(() => {
    if (!containerRef.current) return;
    const map = new maplibregl.Map({
      container: containerRef.current,
      style: MAP_STYLE_URL,
      center: [37.9, 0.2],
      zoom: 5,
      attributionControl: { compact: true },
    });
    map.addControl(new NavigationControl({}), "top-right");
    mapRef.current = map;

    map.on("load", () => {
      map.addSource(SOURCE_ID, { type: "geojson", data: toFeatureCollection(regionsRef.current) });
      map.addLayer({
        id: LAYER_ID,
        type: "circle",
        source: SOURCE_ID,
        paint: {
          "circle-color": ["get", "color"],
          "circle-opacity": 0.7,
          "circle-stroke-color": "#ffffff",
          "circle-stroke-width": 1,
          // mapSize is Population / divisor; sqrt keeps large counties from swamping the map
          "circle-radius": ["interpolate", ["linear"], ["sqrt", ["get", "mapSize"]], 0, 4, 100, 36],
        },
      });
      map.on("click", LAYER_ID, (e) => {
        const feature = e.features?.[0];
        if (!feature || feature.geometry.type !== "Point") return;
        const [lng, lat] = feature.geometry.coordinates;
        const props = feature.properties ?? {};
        new maplibregl.Popup({ offset: 8 })
          .setLngLat([lng, lat])
          .setDOMContent(buildRegionPopup(document, { name: String(props.name), liveRisk: String(props.liveRisk) }))
          .addTo(map);
      });

      const bounds = new LngLatBounds();
      regionsRef.current.forEach((r) => bounds.extend([r.lon, r.lat]));
      if (regionsRef.current.length > 1) map.fitBounds(bounds, { padding: 40, maxZoom: 8, duration: 0 });
    });

    return () => {
      map.remove();
      mapRef.current = null;
    };
  }, []);

  useEffect(() => {
    const source = mapRef.current?.getSource(SOURCE_ID);
    if (source instanceof GeoJSONSource) {
      source.setData(toFeatureCollection(regions));
    }
  }, [regions]);

  return (
    <section>
      <h2 style={{ fontSize: 16, fontWeight: 600, marginBottom: 8 }}>Geospatial Threat Heatmap</h2>
      <div ref={containerRef} style={{ height: 440, width: "100%", borderRadius: 8, overflow: "hidden" }} />
      <p style={{ fontSize: 12, opacity: 0.7, marginTop: 6 }}>
        Red: Critical Risk (Probability &gt; 75%) | Amber: Economic Stress | Green: Stable
      </p>
    </section>
  );
}
