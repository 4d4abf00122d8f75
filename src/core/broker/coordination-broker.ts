/**
 * CoordinationBroker - the request/response surface of the server.
 *
 * Operations:
 *   register      - register or update an intersection agent
 *   report        - state/episode report from an intersection agent
 *   offset        - green-wave offset for a sync agent
 *   recordAction  - adjusted action posted back by a sync agent
 *   status        - counts and per-agent liveness for the dashboard
 *   data          - full per-agent detail incl. metrics series
 *   comparison    - all agents on a common episode axis
 *   latestCharts  - where the comparison chart images live
 *   network       - nodes and links for the intersection map
 *   logs          - recent server log lines
 *   reset         - clear all agents
 *
 * Every call carries its full context; the broker keeps no per-client state.
 * Read views are pure projections of the registry.
 */

import { ActionAdjustment, Agent, isOnline } from "../models/agent";
import { LinkOffset } from "../models/link";
import { AgentRegistry } from "../store/agent-registry";
import { TopologyGraph } from "../topology/topology-graph";
import { ComparisonView, MetricsAggregator } from "../metrics/metrics-aggregator";
import { ServerLog } from "../logging/server-log";
import {
  CoordinationError,
  NoCoordinationAvailableError,
  NoLinkError,
} from "../errors";
import { BrokerResult, errorResult, successResult } from "./broker-result";
import {
  actionSchema,
  offsetSchema,
  parseRequest,
  registerSchema,
  reportSchema,
} from "./schemas";

// ─── Response shapes ────────────────────────────────────────────────────

export interface RegisterResponse {
  agent_id: string;
  registered: true;
}

export interface ReportResponse {
  accepted: true;
  out_of_order: boolean;
}

export interface LinkOffsetView {
  from_id: string;
  to_id: string;
  distance_m: number;
  travel_time_s: number;
  cycle_length_s: number;
  offset_s: number;
  out_of_range: boolean;
}

export type OffsetResponse =
  | {
      available: true;
      offset_s: number;
      source_agent_id: string;
      target_agent_id: string;
      distance_m: number;
      travel_time_s: number;
      cycle_length_s: number;
      out_of_range: boolean;
    }
  | { available: false; reason: "NO_LINK" | "NO_COORDINATION_AVAILABLE" };

export interface ActionResponse {
  accepted: true;
  adjustment_id: string;
}

export interface AgentStatusView {
  name: string;
  online: boolean;
  status: string;
  last_seen: string;
  last_episode: number;
  data_points: number;
}

export interface StatusResponse {
  total_agents: number;
  online_agents: number;
  agents: Record<string, AgentStatusView>;
}

export interface AdjustmentView {
  id: string;
  source_agent_id: string | null;
  base_action: number | null;
  adjusted_action: number;
  offset_s: number | null;
  recorded_at: string;
}

export interface AgentDataView {
  name: string;
  orientation: string;
  position: { latitude: number; longitude: number };
  links: string[];
  config: Record<string, string | number>;
  cycle_length_s: number;
  status: string;
  last_seen: string;
  last_episode: number;
  episodes: number[];
  rewards: number[];
  queue_lengths: number[];
  out_of_order_samples: number;
  last_adjustment: AdjustmentView | null;
}

export type DataResponse = Record<string, AgentDataView>;

export interface ChartsResponse {
  rewards_chart: string;
  queue_chart: string;
  timestamp: string | null;
}

export interface NetworkResponse {
  nodes: Array<{ id: string; name: string; latitude: number; longitude: number; online: boolean }>;
  links: LinkOffsetView[];
}

export function toLinkOffsetView(link: LinkOffset): LinkOffsetView {
  return {
    from_id: link.fromId,
    to_id: link.toId,
    distance_m: link.distanceM,
    travel_time_s: link.travelTimeS,
    cycle_length_s: link.cycleLengthS,
    offset_s: link.offsetS,
    out_of_range: link.outOfRange,
  };
}

function toAdjustmentView(adjustment: ActionAdjustment): AdjustmentView {
  return {
    id: adjustment.id,
    source_agent_id: adjustment.sourceAgentId ?? null,
    base_action: adjustment.baseAction ?? null,
    adjusted_action: adjustment.adjustedAction,
    offset_s: adjustment.offsetS ?? null,
    recorded_at: adjustment.recordedAt,
  };
}

export class CoordinationBroker {
  constructor(
    private registry: AgentRegistry,
    private topology: TopologyGraph,
    private metrics: MetricsAggregator,
    private log: ServerLog
  ) {}

  // ─── Intersection agents ─────────────────────────────────────────────

  async register(input: unknown): Promise<BrokerResult<RegisterResponse>> {
    return this.handle(async (): Promise<RegisterResponse> => {
      const body = parseRequest(registerSchema, input);
      const agent = await this.registry.register({
        id: body.agent_id,
        position: body.position,
        name: body.name,
        orientation: body.orientation,
        links: body.links,
        config: body.config,
        cycleLengthS: body.cycle_length_s,
      });
      return { agent_id: agent.id, registered: true };
    });
  }

  async report(input: unknown): Promise<BrokerResult<ReportResponse>> {
    return this.handle(async (): Promise<ReportResponse> => {
      const body = parseRequest(reportSchema, input);
      const { sample } = await this.registry.reportState({
        agentId: body.agent_id,
        status: body.status,
        episode: body.episode,
        reward: body.reward,
        queueLength: body.queue_length,
      });
      return { accepted: true, out_of_order: sample?.outOfOrder ?? false };
    });
  }

  // ─── Sync agents ─────────────────────────────────────────────────────

  /**
   * With `from`, the offset of that specific link; otherwise the nearest
   * online linked agent. "Not available" is a normal answer, not an error.
   */
  async offset(input: unknown): Promise<BrokerResult<OffsetResponse>> {
    return this.handle(async (): Promise<OffsetResponse> => {
      const body = parseRequest(offsetSchema, input);

      let link: LinkOffset;
      try {
        link = body.from
          ? await this.topology.computeOffset(body.from, body.agent_id)
          : await this.topology.resolveCoordination(body.agent_id);
      } catch (err) {
        if (err instanceof NoLinkError || err instanceof NoCoordinationAvailableError) {
          return { available: false, reason: err.code === "NO_LINK" ? "NO_LINK" : "NO_COORDINATION_AVAILABLE" };
        }
        throw err;
      }

      return {
        available: true,
        offset_s: link.offsetS,
        source_agent_id: link.fromId,
        target_agent_id: link.toId,
        distance_m: link.distanceM,
        travel_time_s: link.travelTimeS,
        cycle_length_s: link.cycleLengthS,
        out_of_range: link.outOfRange,
      };
    });
  }

  async recordAction(input: unknown): Promise<BrokerResult<ActionResponse>> {
    return this.handle(async (): Promise<ActionResponse> => {
      const body = parseRequest(actionSchema, input);
      const adjustment = await this.registry.recordAdjustment(body.agent_id, {
        sourceAgentId: body.source_agent_id,
        baseAction: body.base_action,
        adjustedAction: body.adjusted_action,
        offsetS: body.offset_s,
      });
      return { accepted: true, adjustment_id: adjustment.id };
    });
  }

  // ─── Dashboard views ─────────────────────────────────────────────────

  async status(): Promise<BrokerResult<StatusResponse>> {
    return this.handle(async () => {
      const agents = await this.registry.list();
      const view: StatusResponse = { total_agents: agents.length, online_agents: 0, agents: {} };

      for (const agent of agents) {
        const online = isOnline(agent);
        if (online) view.online_agents += 1;
        view.agents[agent.id] = {
          name: agent.name,
          online,
          status: agent.status,
          last_seen: agent.lastSeen,
          last_episode: agent.lastEpisode,
          data_points: agent.metrics.length,
        };
      }
      return view;
    });
  }

  async data(): Promise<BrokerResult<DataResponse>> {
    return this.handle(async () => {
      const agents = await this.registry.list();
      const view: DataResponse = {};
      for (const agent of agents) {
        view[agent.id] = this.agentData(agent);
      }
      return view;
    });
  }

  async comparison(): Promise<BrokerResult<ComparisonView>> {
    return this.handle(() => this.metrics.comparison());
  }

  async latestCharts(): Promise<BrokerResult<ChartsResponse>> {
    return this.handle(async (): Promise<ChartsResponse> => {
      const charts = await this.metrics.latestCharts();
      return {
        rewards_chart: charts.rewardsChart,
        queue_chart: charts.queueChart,
        timestamp: charts.timestamp,
      };
    });
  }

  async network(): Promise<BrokerResult<NetworkResponse>> {
    return this.handle(async (): Promise<NetworkResponse> => {
      const view = await this.topology.network();
      return { nodes: view.nodes, links: view.links.map(toLinkOffsetView) };
    });
  }

  async logs(): Promise<BrokerResult<{ logs: string[] }>> {
    return this.handle(async () => ({ logs: this.log.recent() }));
  }

  async reset(): Promise<BrokerResult<{ reset: true }>> {
    return this.handle(async (): Promise<{ reset: true }> => {
      await this.registry.reset();
      return { reset: true };
    });
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private agentData(agent: Agent): AgentDataView {
    const samples = agent.metrics.filter((s) => !s.outOfOrder);
    return {
      name: agent.name,
      orientation: agent.orientation,
      position: { ...agent.position },
      links: [...agent.links],
      config: { ...agent.config },
      cycle_length_s: agent.cycleLengthS,
      status: agent.status,
      last_seen: agent.lastSeen,
      last_episode: agent.lastEpisode,
      episodes: samples.map((s) => s.episode),
      rewards: samples.map((s) => s.reward),
      queue_lengths: samples.map((s) => s.queueLength),
      out_of_order_samples: agent.metrics.length - samples.length,
      last_adjustment: agent.lastAdjustment ? toAdjustmentView(agent.lastAdjustment) : null,
    };
  }

  private async handle<T>(run: () => Promise<T>): Promise<BrokerResult<T>> {
    try {
      return successResult(await run());
    } catch (err) {
      if (err instanceof CoordinationError) {
        if (err.httpStatus >= 500) {
          this.log.error("Broker", err.message);
        }
        return errorResult(err);
      }
      throw err;
    }
  }
}
