/**
 * Comparison API Route - /api/comparison
 *
 * GET /api/comparison - All agents' metrics on a common episode axis
 */

import { respond } from "../respond";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return respond("Comparison Route", ({ broker }) => broker.comparison());
}
