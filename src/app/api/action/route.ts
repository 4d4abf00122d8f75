/**
 * Action API Route - /api/action
 *
 * POST /api/action - A sync agent posts the action it adjusted for an agent
 *
 * Body: { agent_id, adjusted_action, base_action?, source_agent_id?, offset_s? }
 */

import { NextRequest } from "next/server";
import { readJson, respond } from "../respond";

export const runtime = "nodejs";

export async function POST(request: NextRequest) {
  return respond("Action Route", async ({ broker }) =>
    broker.recordAction(await readJson(request))
  );
}
