/**
 * MetricsAggregator - read views over each agent's capped metrics series.
 *
 * Samples flagged out of order stay in the raw series but are left out of
 * `latest()`, the comparison view and the chart timestamp.
 */

import { MetricSample } from "../models/agent";
import { AgentRegistry } from "../store/agent-registry";

export interface SeriesOptions {
  includeOutOfOrder?: boolean;
}

export interface ComparisonPoint {
  episode: number;
  rewards: Record<string, number | null>;
  queueLengths: Record<string, number | null>;
}

export interface ComparisonView {
  agentIds: string[];
  points: ComparisonPoint[];
}

export interface ChartInfo {
  rewardsChart: string;
  queueChart: string;
  /** When the comparison data last changed; null before any sample */
  timestamp: string | null;
}

export const REWARDS_CHART_FILE = "rewards_comparison.png";
export const QUEUE_CHART_FILE = "queue_comparison.png";

export class MetricsAggregator {
  constructor(
    private registry: AgentRegistry,
    private options: { chartBasePath: string }
  ) {}

  async latest(agentId: string): Promise<MetricSample | undefined> {
    const agent = await this.registry.get(agentId);
    if (!agent) return undefined;

    for (let i = agent.metrics.length - 1; i >= 0; i--) {
      if (!agent.metrics[i].outOfOrder) return agent.metrics[i];
    }
    return undefined;
  }

  /**
   * Samples in arrival order, oldest first, keeping the newest `limit`.
   */
  async series(
    agentId: string,
    limit?: number,
    options: SeriesOptions = {}
  ): Promise<MetricSample[]> {
    const agent = await this.registry.get(agentId);
    if (!agent) return [];

    const includeOutOfOrder = options.includeOutOfOrder ?? true;
    const samples = includeOutOfOrder
      ? [...agent.metrics]
      : agent.metrics.filter((s) => !s.outOfOrder);

    if (limit === undefined) return samples;
    if (limit <= 0) return [];
    return samples.slice(-limit);
  }

  /**
   * All agents merged on a common episode axis. An agent without a sample
   * for an episode gets `null`; repeated episodes keep the newest value.
   */
  async comparison(): Promise<ComparisonView> {
    const agents = await this.registry.list();
    const byEpisode = new Map<number, ComparisonPoint>();

    for (const agent of agents) {
      for (const sample of agent.metrics) {
        if (sample.outOfOrder) continue;

        let point = byEpisode.get(sample.episode);
        if (!point) {
          point = { episode: sample.episode, rewards: {}, queueLengths: {} };
          for (const a of agents) {
            point.rewards[a.id] = null;
            point.queueLengths[a.id] = null;
          }
          byEpisode.set(sample.episode, point);
        }
        point.rewards[agent.id] = sample.reward;
        point.queueLengths[agent.id] = sample.queueLength;
      }
    }

    return {
      agentIds: agents.map((a) => a.id),
      points: Array.from(byEpisode.values()).sort((a, b) => a.episode - b.episode),
    };
  }

  async latestCharts(): Promise<ChartInfo> {
    const agents = await this.registry.list();
    let newest: number | undefined;
    for (const agent of agents) {
      for (const sample of agent.metrics) {
        if (sample.outOfOrder) continue;
        const ts = Date.parse(sample.timestamp);
        if (newest === undefined || ts > newest) newest = ts;
      }
    }

    const base = this.options.chartBasePath;
    const query = newest === undefined ? "" : `?t=${Math.floor(newest / 1000)}`;
    return {
      rewardsChart: `${base}/${REWARDS_CHART_FILE}${query}`,
      queueChart: `${base}/${QUEUE_CHART_FILE}${query}`,
      timestamp: newest === undefined ? null : new Date(newest).toISOString(),
    };
  }
}
