/**
 * AgentRegistry - authoritative record of every known intersection agent.
 *
 * Writes are serialized per agent id; each write builds a new frozen record
 * and swaps it into the map, so readers only ever see complete records.
 * Agents are never removed except by `reset()`.
 */

import { v4 as uuidv4 } from "uuid";
import {
  ActionAdjustment,
  Agent,
  AgentStatus,
  MetricSample,
  REPORTABLE_STATUSES,
  RegisterParams,
  ReportableStatus,
  createAgent,
  freezeAgent,
} from "../models/agent";
import { CoordinationEventType, EventBus } from "../events/event-bus";
import { UnknownAgentError, ValidationError } from "../errors";

export interface ReportParams {
  agentId: string;
  status: ReportableStatus;
  /** Omitted for a plain heartbeat without a metrics sample */
  episode?: number;
  reward?: number;
  queueLength?: number;
}

export interface ReportOutcome {
  agent: Agent;
  sample?: MetricSample;
}

export interface AdjustmentParams {
  sourceAgentId?: string;
  baseAction?: number;
  adjustedAction: number;
  offsetS?: number;
}

export interface AgentRegistry {
  register(params: RegisterParams): Promise<Agent>;
  reportState(params: ReportParams): Promise<ReportOutcome>;
  get(agentId: string): Promise<Agent | undefined>;
  /** Registration order */
  list(): Promise<Agent[]>;
  /** Mark offline if the agent has not been seen since `staleBefore` */
  markOffline(agentId: string, staleBefore: Date): Promise<boolean>;
  recordAdjustment(agentId: string, params: AdjustmentParams): Promise<ActionAdjustment>;
  /** Bumped whenever a position, link, config or status changes */
  revision(): number;
  reset(): Promise<void>;
}

export interface InMemoryAgentRegistryOptions {
  historyLimit: number;
  defaultCycleLengthS: number;
  eventBus?: EventBus;
  now?: () => Date;
}

export function validatePosition(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError(`Latitude out of range: ${latitude}`, "position.latitude");
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError(`Longitude out of range: ${longitude}`, "position.longitude");
  }
}

function positiveNumber(value: string | number | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Cycle length: explicit value, then `cycle_length`, then
 * `(green_duration + yellow_duration) * 2` from the config, then the default.
 */
export function resolveCycleLength(params: RegisterParams, fallback: number): number {
  if (params.cycleLengthS !== undefined) return params.cycleLengthS;

  const config = params.config ?? {};
  const explicit = positiveNumber(config.cycle_length);
  if (explicit !== undefined) return explicit;

  const green = positiveNumber(config.green_duration);
  const yellow = positiveNumber(config.yellow_duration);
  if (green !== undefined && yellow !== undefined) return (green + yellow) * 2;

  return fallback;
}

export class InMemoryAgentRegistry implements AgentRegistry {
  private agents = new Map<string, Agent>();
  private locks = new Map<string, Promise<void>>();
  private rev = 0;
  private historyLimit: number;
  private defaultCycleLengthS: number;
  private eventBus?: EventBus;
  private now: () => Date;

  constructor(options: InMemoryAgentRegistryOptions) {
    this.historyLimit = options.historyLimit;
    this.defaultCycleLengthS = options.defaultCycleLengthS;
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => new Date());
  }

  async register(params: RegisterParams): Promise<Agent> {
    const id = params.id.trim();
    if (!id) {
      throw new ValidationError("agent_id must not be empty", "agent_id");
    }
    validatePosition(params.position.latitude, params.position.longitude);
    if (params.links?.includes(id)) {
      throw new ValidationError(`Agent ${id} cannot link to itself`, "links");
    }
    if (
      params.cycleLengthS !== undefined &&
      !(Number.isFinite(params.cycleLengthS) && params.cycleLengthS > 0)
    ) {
      throw new ValidationError("cycle_length_s must be a positive number", "cycle_length_s");
    }

    const cycleLengthS = resolveCycleLength(params, this.defaultCycleLengthS);

    return this.withLock(id, () => {
      const now = this.now();
      const existing = this.agents.get(id);
      const fresh = createAgent({ ...params, id, cycleLengthS }, now);

      const agent = existing
        ? freezeAgent({
            ...fresh,
            status: existing.status === AgentStatus.OFFLINE ? AgentStatus.IDLE : existing.status,
            registeredAt: existing.registeredAt,
            lastEpisode: existing.lastEpisode,
            metrics: existing.metrics,
            lastAdjustment: existing.lastAdjustment,
          })
        : fresh;

      this.agents.set(id, agent);
      this.rev += 1;

      this.eventBus?.emit({
        type: CoordinationEventType.AGENT_REGISTERED,
        agentId: id,
        data: { created: existing === undefined, name: agent.name },
        timestamp: now,
      });

      return agent;
    });
  }

  async reportState(params: ReportParams): Promise<ReportOutcome> {
    const { agentId, status, episode, reward, queueLength } = params;

    if (!this.agents.has(agentId)) {
      throw new UnknownAgentError(agentId);
    }
    if (!REPORTABLE_STATUSES.some((s) => s === status)) {
      throw new ValidationError(`Status cannot be reported: ${status}`, "status");
    }
    if (episode !== undefined) {
      if (!Number.isInteger(episode) || episode < 0) {
        throw new ValidationError("episode must be a non-negative integer", "episode");
      }
      if (reward === undefined || !Number.isFinite(reward)) {
        throw new ValidationError("reward is required with an episode", "reward");
      }
      if (queueLength === undefined || !Number.isFinite(queueLength)) {
        throw new ValidationError("queue_length is required with an episode", "queue_length");
      }
    }

    return this.withLock(agentId, () => {
      const current = this.agents.get(agentId);
      if (!current) {
        throw new UnknownAgentError(agentId);
      }

      const now = this.now();
      let sample: MetricSample | undefined;
      let metrics = current.metrics;
      let lastEpisode = current.lastEpisode;

      if (episode !== undefined && reward !== undefined && queueLength !== undefined) {
        const outOfOrder = episode < current.lastEpisode;
        sample = Object.freeze({
          episode,
          reward,
          queueLength,
          timestamp: now.toISOString(),
          outOfOrder,
        });
        metrics = [...current.metrics, sample].slice(-this.historyLimit);
        if (!outOfOrder) {
          lastEpisode = episode;
        } else {
          this.eventBus?.emit({
            type: CoordinationEventType.OUT_OF_ORDER_SAMPLE,
            agentId,
            data: { episode, lastEpisode: current.lastEpisode },
            timestamp: now,
          });
        }
      }

      const agent = freezeAgent({
        ...current,
        status,
        lastSeen: now.toISOString(),
        lastEpisode,
        metrics,
      });
      this.agents.set(agentId, agent);
      if (current.status !== status) {
        this.rev += 1;
      }

      this.eventBus?.emit({
        type: CoordinationEventType.STATE_REPORTED,
        agentId,
        data: { status, episode, reward },
        timestamp: now,
      });

      return { agent, sample };
    });
  }

  async get(agentId: string): Promise<Agent | undefined> {
    return this.agents.get(agentId);
  }

  async list(): Promise<Agent[]> {
    return Array.from(this.agents.values());
  }

  async markOffline(agentId: string, staleBefore: Date): Promise<boolean> {
    return this.withLock(agentId, () => {
      const current = this.agents.get(agentId);
      if (
        !current ||
        current.status === AgentStatus.OFFLINE ||
        current.status === AgentStatus.TERMINATED ||
        Date.parse(current.lastSeen) >= staleBefore.getTime()
      ) {
        return false;
      }

      this.agents.set(agentId, freezeAgent({ ...current, status: AgentStatus.OFFLINE }));
      this.rev += 1;

      this.eventBus?.emit({
        type: CoordinationEventType.AGENT_OFFLINE,
        agentId,
        data: { lastSeen: current.lastSeen, previousStatus: current.status },
        timestamp: this.now(),
      });
      return true;
    });
  }

  async recordAdjustment(agentId: string, params: AdjustmentParams): Promise<ActionAdjustment> {
    if (params.sourceAgentId !== undefined && !this.agents.has(params.sourceAgentId)) {
      throw new UnknownAgentError(params.sourceAgentId);
    }

    return this.withLock(agentId, () => {
      const current = this.agents.get(agentId);
      if (!current) {
        throw new UnknownAgentError(agentId);
      }

      const now = this.now();
      const adjustment: ActionAdjustment = Object.freeze({
        id: uuidv4(),
        sourceAgentId: params.sourceAgentId,
        baseAction: params.baseAction,
        adjustedAction: params.adjustedAction,
        offsetS: params.offsetS,
        recordedAt: now.toISOString(),
      });
      this.agents.set(agentId, freezeAgent({ ...current, lastAdjustment: adjustment }));

      this.eventBus?.emit({
        type: CoordinationEventType.ADJUSTMENT_RECORDED,
        agentId,
        data: { adjustedAction: params.adjustedAction, sourceAgentId: params.sourceAgentId },
        timestamp: now,
      });
      return adjustment;
    });
  }

  revision(): number {
    return this.rev;
  }

  async reset(): Promise<void> {
    this.agents.clear();
    this.rev += 1;
    this.eventBus?.emit({
      type: CoordinationEventType.REGISTRY_RESET,
      timestamp: this.now(),
    });
  }

  private withLock<T>(agentId: string, fn: () => T): Promise<T> {
    const previous = this.locks.get(agentId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(agentId, tail);
    void tail.then(() => {
      if (this.locks.get(agentId) === tail) {
        this.locks.delete(agentId);
      }
    });
    return run;
  }
}
