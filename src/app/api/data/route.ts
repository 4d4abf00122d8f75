/**
 * Data API Route - /api/data
 *
 * GET /api/data - Full per-agent detail incl. metrics series and config
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Data Route", ({ broker }) => broker.data());
}
