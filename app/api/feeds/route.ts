import { NextResponse } from "next/server";
import { getAppConfig } from "@/config/appConfig";
import { buildLiveFeedStatus } from "@/domain/dashboard/intelFeed";
import { getServerLiveFeedLookups, readLiveFeeds } from "@/lib/liveFeeds";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/** GET: current live readings (TTL-cached). Lookups degrade internally and never fail this route. */
export async function GET() {
  const config = getAppConfig();
  const readings = await readLiveFeeds(getServerLiveFeedLookups(config.feeds));
  const status = buildLiveFeedStatus(readings);
  return NextResponse.json({ readings, status }, { status: 200 });
}
