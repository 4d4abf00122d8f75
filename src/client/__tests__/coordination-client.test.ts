/**
 * CoordinationClient tests
 *
 * Runs against a stub fetch; no server is started.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { CoordinationClient, CoordinationRequestError, FetchLike } from "../coordination-client";
import { AgentStatus } from "@/core/models/agent";

interface Call {
  url: string;
  init: RequestInit;
}

function jsonResponse(status: number, body: unknown) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe("CoordinationClient", () => {
  let calls: Call[];
  let next: () => Promise<ReturnType<typeof jsonResponse>>;
  let client: CoordinationClient;

  beforeEach(() => {
    calls = [];
    next = async () => jsonResponse(200, {});
    const stub: FetchLike = async (url, init) => {
      calls.push({ url, init });
      return next();
    };
    client = new CoordinationClient("http://coordination.test/", { fetch: stub, timeoutMs: 50 });
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should post registrations as JSON", async () => {
    next = async () => jsonResponse(200, { agent_id: "agent1", registered: true });

    const result = await client.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } });

    expect(result).toEqual({ agent_id: "agent1", registered: true });
    expect(calls[0].url).toBe("http://coordination.test/api/register");
    expect(calls[0].init.method).toBe("POST");
    expect(calls[0].init.headers).toEqual({ "Content-Type": "application/json" });
    expect(calls[0].init.body).toBe(
      JSON.stringify({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } })
    );
  });

  it("should raise the server's error for a rejected report", async () => {
    next = async () =>
      jsonResponse(404, { error: "Agent not found: ghost", reason: "UNKNOWN_AGENT" });

    const attempt = client.report({ agent_id: "ghost", status: AgentStatus.TRAINING });

    await expect(attempt).rejects.toBeInstanceOf(CoordinationRequestError);
    await expect(attempt).rejects.toMatchObject({
      message: "Agent not found: ghost",
      status: 404,
      reason: "UNKNOWN_AGENT",
    });
  });

  describe("requestOffset", () => {
    it("should query by agent and optional upstream", async () => {
      next = async () => jsonResponse(200, { available: false, reason: "NO_LINK" });

      expect(await client.requestOffset("agent2", "agent1")).toEqual({ available: false, reason: "NO_LINK" });
      expect(calls[0].url).toBe("http://coordination.test/api/offset?agent_id=agent2&from=agent1");
      expect(calls[0].init.method).toBe("GET");
      expect(calls[0].init.body).toBeUndefined();
    });

    it("should answer unknown agent for a 404", async () => {
      next = async () => jsonResponse(404, { error: "Agent not found: ghost", reason: "UNKNOWN_AGENT" });

      expect(await client.requestOffset("ghost")).toEqual({ available: false, reason: "UNKNOWN_AGENT" });
    });

    it("should rethrow validation failures", async () => {
      next = async () => jsonResponse(400, { error: "Invalid agent_id", reason: "VALIDATION_ERROR" });

      await expect(client.requestOffset(" ")).rejects.toMatchObject({ status: 400 });
    });

    it("should fall back when the server errors", async () => {
      next = async () => jsonResponse(500, { error: "Internal server error", reason: "INTERNAL_ERROR" });

      expect(await client.requestOffset("agent2")).toEqual({ available: false, reason: "UNREACHABLE" });
    });

    it("should fall back when the network fails", async () => {
      next = async () => {
        throw new TypeError("fetch failed");
      };

      expect(await client.requestOffset("agent2")).toEqual({ available: false, reason: "UNREACHABLE" });
    });

    it("should fall back when the request times out", async () => {
      const hanging: FetchLike = (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        });
      const slow = new CoordinationClient("http://coordination.test", { fetch: hanging, timeoutMs: 10 });

      expect(await slow.requestOffset("agent2")).toEqual({ available: false, reason: "UNREACHABLE" });
    });
  });
});
