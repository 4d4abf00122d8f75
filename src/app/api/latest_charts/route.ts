/**
 * Latest Charts API Route - /api/latest_charts
 *
 * GET /api/latest_charts - Paths and timestamp of the latest comparison charts
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Latest Charts Route", ({ broker }) => broker.latestCharts());
}
