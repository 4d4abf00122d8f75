/**
 * Network API Route - /api/network
 *
 * GET /api/network - Intersection nodes and links for the map
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Network Route", ({ broker }) => broker.network());
}
