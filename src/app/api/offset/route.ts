/**
 * Offset API Route - /api/offset
 *
 * GET  /api/offset?agent_id=x         - Offset from the nearest online neighbor
 * GET  /api/offset?agent_id=x&from=y  - Offset of the link y -> x
 * POST /api/offset                    - Same, with { agent_id, from? } in the body
 */

import { NextRequest } from "next/server";
import { readJson, respond } from "../respond";

export const runtime = "nodejs";

export async function GET(request: NextRequest) {
  const params = request.nextUrl.searchParams;
  return respond("Offset Route", ({ broker }) =>
    broker.offset({
      agent_id: params.get("agent_id") ?? undefined,
      from: params.get("from") ?? undefined,
    })
  );
}

export async function POST(request: NextRequest) {
  return respond("Offset Route", async ({ broker }) =>
    broker.offset(await readJson(request))
  );
}
