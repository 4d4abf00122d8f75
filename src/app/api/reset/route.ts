/**
 * Reset API Route - /api/reset
 *
 * POST /api/reset - Clear every agent and its history
 */

import { respond } from "../respond";

export const runtime = "nodejs";

export async function POST() {
  return respond("Reset Route", ({ broker }) => broker.reset());
}
