import { NextResponse } from "next/server";
import { getAppConfig } from "@/config/appConfig";
import { buildDashboard } from "@/domain/dashboard/buildDashboard";
import { DataUnavailableError, InvalidParamsError } from "@/domain/errors";
import { parseSimulationParams } from "@/domain/region/region.schema";
import { derr, dlog } from "@/lib/debug";
import { getServerLiveFeedLookups, readLiveFeeds } from "@/lib/liveFeeds";
import { loadRegionTable } from "@/lib/regionData";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * GET: One render pass for the dashboard.
 * Query: fuelShock (int, -10..50), taxHike (int, 0..10), subsidy (bool). Out-of-range numbers are clamped.
 * 400 on unreadable params, 503 when the region snapshot is unavailable.
 */
export async function GET(req: Request) {
  try {
    const params = parseSimulationParams(new URL(req.url).searchParams);
    const config = getAppConfig();
    const table = await loadRegionTable(config.dataPath, { baseRiskColumn: config.baseRiskColumn });
    const readings = await readLiveFeeds(getServerLiveFeedLookups(config.feeds));
    const view = buildDashboard({ table, params, policy: config.policy, readings });
    dlog("[api/dashboard] pass", {
      params,
      regions: view.regions.length,
      rowErrors: view.rowErrors.length,
      forex: readings.forex.status,
      fuel: readings.fuel.status,
    });
    return NextResponse.json(view, { status: 200 });
  } catch (err) {
    if (err instanceof InvalidParamsError) {
      return NextResponse.json({ error: "Invalid parameters", issues: err.issues }, { status: 400 });
    }
    if (err instanceof DataUnavailableError) {
      derr("[api/dashboard] data unavailable", { sourcePath: err.sourcePath, reason: err.reason });
      return NextResponse.json(
        { error: "data unavailable", reason: err.reason },
        { status: 503 }
      );
    }
    derr("[api/dashboard] unexpected error", err);
    return NextResponse.json({ error: "Unexpected error" }, { status: 500 });
  }
}
