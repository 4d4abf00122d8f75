/**
 * Status API Route - /api/status
 *
 * GET /api/status - Aggregate counts and per-agent status
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Status Route", ({ broker }) => broker.status());
}
