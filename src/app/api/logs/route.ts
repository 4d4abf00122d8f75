/**
 * Logs API Route - /api/logs
 *
 * GET /api/logs - Recent server log lines
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Logs Route", ({ broker }) => broker.logs());
}
