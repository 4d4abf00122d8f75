/**
 * CoordinationBroker tests
 *
 * Exercises the request/response surface directly with wire-shaped bodies.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { createCoordinationSystem, CoordinationSystem } from "../../coordination-system";
import { DEFAULT_CONFIG } from "../../config";
import { BrokerResult } from "../broker-result";

const START = new Date("2026-03-01T08:00:00.000Z");

function unwrap<T>(result: BrokerResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.status} ${result.reason}: ${result.error}`);
  }
  return result.data;
}

describe("CoordinationBroker", () => {
  let current: Date;
  let system: CoordinationSystem;

  const advance = (seconds: number) => {
    current = new Date(current.getTime() + seconds * 1000);
  };

  beforeEach(() => {
    current = START;
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    system = createCoordinationSystem(DEFAULT_CONFIG, { now: () => current });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("register", () => {
    it("should register an agent", async () => {
      const result = await system.broker.register({
        agent_id: "agent1",
        position: { latitude: 10, longitude: 106 },
        name: "Main St",
        config: { learning_rate: 0.001, green_duration: 15, yellow_duration: 4 },
      });

      expect(unwrap(result)).toEqual({ agent_id: "agent1", registered: true });
      expect((await system.registry.get("agent1"))?.cycleLengthS).toBe(38);
    });

    it("should answer 400 with the offending field for a bad position", async () => {
      const result = await system.broker.register({
        agent_id: "agent1",
        position: { latitude: 95, longitude: 106 },
      });

      expect(result).toEqual({
        success: false,
        status: 400,
        reason: "VALIDATION_ERROR",
        error: "Latitude out of range: 95",
        field: "position.latitude",
      });
      expect(await system.registry.list()).toEqual([]);
    });

    it("should trim the agent id and link ids", async () => {
      unwrap(
        await system.broker.register({
          agent_id: " agent1 ",
          position: { latitude: 10, longitude: 106 },
          links: [" agent2"],
        })
      );
      unwrap(await system.broker.register({ agent_id: "agent2", position: { latitude: 10.01, longitude: 106.01 } }));

      expect((await system.registry.get("agent1"))?.links).toEqual(["agent2"]);
      const offset = unwrap(await system.broker.offset({ agent_id: "agent2" }));
      expect(offset.available).toBe(true);
    });

    it("should reject a blank link id", async () => {
      const result = await system.broker.register({
        agent_id: "agent1",
        position: { latitude: 10, longitude: 106 },
        links: ["  "],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.field).toBe("links.0");
        expect(result.error).toBe("Invalid links.0: must not be empty");
      }
    });

    it("should answer 400 for a body that does not match the schema", async () => {
      const result = await system.broker.register({ agent_id: "agent1" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.status).toBe(400);
        expect(result.field).toBe("position");
      }
    });
  });

  describe("report", () => {
    beforeEach(async () => {
      unwrap(await system.broker.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } }));
    });

    it("should accept an episode report", async () => {
      const result = await system.broker.report({
        agent_id: "agent1",
        status: "training",
        episode: 1,
        reward: -12.5,
        queue_length: 7,
      });

      expect(unwrap(result)).toEqual({ accepted: true, out_of_order: false });
    });

    it("should flag an out-of-order episode without rejecting it", async () => {
      await system.broker.report({ agent_id: "agent1", status: "training", episode: 5, reward: 1, queue_length: 1 });
      const result = await system.broker.report({
        agent_id: "agent1",
        status: "training",
        episode: 3,
        reward: 1,
        queue_length: 1,
      });

      expect(unwrap(result)).toEqual({ accepted: true, out_of_order: true });
    });

    it("should answer 404 for an unknown agent", async () => {
      const result = await system.broker.report({ agent_id: "ghost", status: "training" });

      expect(result).toEqual({
        success: false,
        status: 404,
        reason: "UNKNOWN_AGENT",
        error: "Agent not found: ghost",
        field: undefined,
      });
    });

    it("should reject the offline status from agents", async () => {
      const result = await system.broker.report({ agent_id: "agent1", status: "offline" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.status).toBe(400);
        expect(result.field).toBe("status");
      }
    });

    it("should require reward and queue length alongside an episode", async () => {
      const result = await system.broker.report({ agent_id: "agent1", status: "training", episode: 1, reward: 2 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.field).toBe("queue_length");
      }
    });
  });

  describe("offset", () => {
    beforeEach(async () => {
      await system.broker.register({
        agent_id: "agent1",
        position: { latitude: 10.0, longitude: 106.0 },
        links: ["agent2"],
      });
      await system.broker.register({
        agent_id: "agent2",
        position: { latitude: 10.01, longitude: 106.01 },
        config: { cycle_length: 40 },
      });
    });

    it("should return the nearest online neighbor's offset", async () => {
      const data = unwrap(await system.broker.offset({ agent_id: "agent2" }));

      expect(data.available).toBe(true);
      if (data.available) {
        expect(data.source_agent_id).toBe("agent1");
        expect(data.target_agent_id).toBe("agent2");
        expect(data.cycle_length_s).toBe(40);
        expect(data.offset_s).toBeCloseTo(20.456, 2);
        expect(data.out_of_range).toBe(true);
      }
    });

    it("should compute a specific link when the upstream is given", async () => {
      const data = unwrap(await system.broker.offset({ agent_id: "agent1", from: "agent2" }));

      expect(data.available).toBe(true);
      if (data.available) {
        expect(data.source_agent_id).toBe("agent2");
        expect(data.cycle_length_s).toBe(38);
        expect(data.offset_s).toBeCloseTo(26.456, 2);
      }
    });

    it("should answer not available once the neighbor goes offline", async () => {
      advance(61);
      await system.broker.report({ agent_id: "agent2", status: "training" });
      await system.monitor.sweep();

      expect(unwrap(await system.broker.offset({ agent_id: "agent2" }))).toEqual({
        available: false,
        reason: "NO_COORDINATION_AVAILABLE",
      });
    });

    it("should answer not available when the given upstream is offline", async () => {
      advance(61);
      await system.broker.report({ agent_id: "agent2", status: "training" });
      await system.monitor.sweep();

      expect(unwrap(await system.broker.offset({ agent_id: "agent2", from: "agent1" }))).toEqual({
        available: false,
        reason: "NO_COORDINATION_AVAILABLE",
      });
    });

    it("should answer not available for unlinked agents", async () => {
      await system.broker.register({ agent_id: "agent3", position: { latitude: 10.02, longitude: 106.02 } });

      expect(unwrap(await system.broker.offset({ agent_id: "agent3", from: "agent1" }))).toEqual({
        available: false,
        reason: "NO_LINK",
      });
    });

    it("should answer 404 for an unknown requester", async () => {
      const result = await system.broker.offset({ agent_id: "ghost" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.status).toBe(404);
        expect(result.reason).toBe("UNKNOWN_AGENT");
      }
    });
  });

  describe("recordAction", () => {
    it("should store the adjustment and expose it in the data view", async () => {
      await system.broker.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 }, links: ["agent2"] });
      await system.broker.register({ agent_id: "agent2", position: { latitude: 10.01, longitude: 106.01 } });

      const accepted = unwrap(
        await system.broker.recordAction({
          agent_id: "agent2",
          source_agent_id: "agent1",
          base_action: 0,
          adjusted_action: 1,
          offset_s: 20.5,
        })
      );
      const data = unwrap(await system.broker.data());

      expect(accepted.accepted).toBe(true);
      expect(data.agent2.last_adjustment).toEqual({
        id: accepted.adjustment_id,
        source_agent_id: "agent1",
        base_action: 0,
        adjusted_action: 1,
        offset_s: 20.5,
        recorded_at: START.toISOString(),
      });
      expect(data.agent1.last_adjustment).toBeNull();
    });

    it("should answer 404 for an unknown source agent", async () => {
      await system.broker.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } });

      const result = await system.broker.recordAction({
        agent_id: "agent1",
        source_agent_id: "ghost",
        adjusted_action: 2,
      });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.status).toBe(404);
    });
  });

  describe("dashboard views", () => {
    beforeEach(async () => {
      await system.broker.register({
        agent_id: "agent1",
        position: { latitude: 10, longitude: 106 },
        name: "North",
        orientation: "north-south",
        links: ["agent2"],
      });
      await system.broker.register({ agent_id: "agent2", position: { latitude: 10.01, longitude: 106.01 } });
      await system.broker.report({ agent_id: "agent1", status: "training", episode: 1, reward: -4, queue_length: 6 });
      await system.broker.report({ agent_id: "agent1", status: "training", episode: 2, reward: -3, queue_length: 5 });
      await system.broker.report({ agent_id: "agent1", status: "training", episode: 1, reward: -9, queue_length: 9 });
    });

    it("should summarize liveness in the status view", async () => {
      const status = unwrap(await system.broker.status());

      expect(status.total_agents).toBe(2);
      expect(status.online_agents).toBe(2);
      expect(status.agents.agent1).toEqual({
        name: "North",
        online: true,
        status: "training",
        last_seen: START.toISOString(),
        last_episode: 2,
        data_points: 3,
      });
      expect(status.agents.agent2.last_episode).toBe(-1);
    });

    it("should not count terminated agents as online", async () => {
      await system.broker.report({ agent_id: "agent2", status: "terminated" });
      advance(3600);
      await system.monitor.sweep();

      const status = unwrap(await system.broker.status());
      expect(status.total_agents).toBe(2);
      expect(status.online_agents).toBe(0);
      expect(status.agents.agent2).toMatchObject({ online: false, status: "terminated" });
      expect(status.agents.agent1).toMatchObject({ online: false, status: "offline" });
    });

    it("should project in-order series in the data view", async () => {
      const data = unwrap(await system.broker.data());

      expect(data.agent1).toMatchObject({
        name: "North",
        orientation: "north-south",
        position: { latitude: 10, longitude: 106 },
        links: ["agent2"],
        cycle_length_s: 38,
        episodes: [1, 2],
        rewards: [-4, -3],
        queue_lengths: [6, 5],
        out_of_order_samples: 1,
      });
      expect(data.agent2.episodes).toEqual([]);
    });

    it("should derive the series and the out-of-order count from one record", async () => {
      const data = unwrap(await system.broker.data());
      const status = unwrap(await system.broker.status());

      expect(data.agent1.episodes.length + data.agent1.out_of_order_samples).toBe(
        status.agents.agent1.data_points
      );
      expect(data.agent2.out_of_order_samples).toBe(0);
    });

    it("should list links in both directions in the network view", async () => {
      const network = unwrap(await system.broker.network());

      expect(network.nodes.map((n) => n.id)).toEqual(["agent1", "agent2"]);
      expect(network.links.map((l) => [l.from_id, l.to_id])).toEqual([
        ["agent1", "agent2"],
        ["agent2", "agent1"],
      ]);
    });

    it("should version chart paths by the newest sample", async () => {
      const charts = unwrap(await system.broker.latestCharts());
      const seconds = Math.floor(START.getTime() / 1000);

      expect(charts).toEqual({
        rewards_chart: `/static/rewards_comparison.png?t=${seconds}`,
        queue_chart: `/static/queue_comparison.png?t=${seconds}`,
        timestamp: START.toISOString(),
      });
    });

    it("should expose the comparison on a shared episode axis", async () => {
      const comparison = unwrap(await system.broker.comparison());
      expect(comparison.points.map((p) => p.rewards)).toEqual([
        { agent1: -4, agent2: null },
        { agent1: -3, agent2: null },
      ]);
    });

    it("should return recent log lines", async () => {
      const { logs } = unwrap(await system.broker.logs());

      expect(logs[0]).toBe("[2026-03-01 08:00:00] New agent registered: agent1");
      expect(logs).toContain("[2026-03-01 08:00:00] Update from agent1, Episode: 2, Status: training, Reward: -3.00");
      expect(logs).toContain("[2026-03-01 08:00:00] Out-of-order sample from agent1: episode 1 after 2");
    });
  });

  describe("reset", () => {
    it("should clear every agent", async () => {
      await system.broker.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } });

      expect(unwrap(await system.broker.reset())).toEqual({ reset: true });
      expect(unwrap(await system.broker.status())).toEqual({ total_agents: 0, online_agents: 0, agents: {} });
      expect(unwrap(await system.broker.logs()).logs.at(-1)).toBe(
        "[2026-03-01 08:00:00] Server data has been reset"
      );
    });
  });
});
