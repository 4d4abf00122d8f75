/**
 * Shared plumbing for the coordination API routes: turns a BrokerResult
 * into a JSON response and resolves every error at the request boundary.
 */

import { NextRequest, NextResponse } from "next/server";
import { BrokerResult } from "@/core/broker/broker-result";
import { CoordinationError, ValidationError } from "@/core/errors";
import { CoordinationSystem, getCoordinationSystem } from "@/core/coordination-system";

export async function respond<T>(
  scope: string,
  run: (system: CoordinationSystem) => Promise<BrokerResult<T>>
): Promise<NextResponse> {
  try {
    const result = await run(getCoordinationSystem());
    if (!result.success) {
      return NextResponse.json(
        { error: result.error, reason: result.reason, field: result.field },
        { status: result.status }
      );
    }
    return NextResponse.json(result.data);
  } catch (error) {
    if (error instanceof CoordinationError) {
      return NextResponse.json(
        { error: error.message, reason: error.code },
        { status: error.httpStatus }
      );
    }
    console.error(`[${scope}] Error:`, error);
    return NextResponse.json(
      {
        error: error instanceof Error ? error.message : "Internal error",
        reason: "INTERNAL_ERROR",
      },
      { status: 500 }
    );
  }
}

export async function readJson(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON", "body");
  }
}
