/**
 * Register API Route - /api/register
 *
 * POST /api/register - Register or update an intersection agent
 *
 * Body: { agent_id, position: { latitude, longitude }, name?, orientation?,
 *         links?: string[], config?: {...}, cycle_length_s? }
 */

import { NextRequest } from "next/server";
import { readJson, respond } from "../respond";

export const runtime = "nodejs";

export async function POST(request: NextRequest) {
  return respond("Register Route", async ({ broker }) =>
    broker.register(await readJson(request))
  );
}
