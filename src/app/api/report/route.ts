/**
 * Report API Route - /api/report
 *
 * POST /api/report - State/episode report from an intersection agent
 *
 * Body: { agent_id, status, episode?, reward?, queue_length? }
 */

import { NextRequest } from "next/server";
import { readJson, respond } from "../respond";

export const runtime = "nodejs";

export async function POST(request: NextRequest) {
  return respond("Report Route", async ({ broker }) =>
    broker.report(await readJson(request))
  );
}
