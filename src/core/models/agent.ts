/**
 * Agent model
 *
 * Represents one intersection controller known to the coordination server.
 * Records are immutable: every write produces a new frozen record that
 * replaces the previous one in the registry.
 */

export enum AgentStatus {
  IDLE = "idle",
  TRAINING = "training",
  SIMULATING = "simulating",
  TERMINATED = "terminated",
  /** Set by the liveness monitor, never reported by an agent */
  OFFLINE = "offline",
}

/** Statuses an agent may report about itself */
export const REPORTABLE_STATUSES = [
  AgentStatus.IDLE,
  AgentStatus.TRAINING,
  AgentStatus.SIMULATING,
  AgentStatus.TERMINATED,
] as const;

export type ReportableStatus = (typeof REPORTABLE_STATUSES)[number];

export interface GeoPosition {
  latitude: number;
  longitude: number;
}

/**
 * Display-only configuration reported at registration.
 *
 * Known keys: learning_rate, episodes, batch_size, gamma, green_duration,
 * yellow_duration, cycle_length. Unknown keys pass through.
 */
export type AgentConfig = Readonly<Record<string, string | number>>;

export interface MetricSample {
  readonly episode: number;
  readonly reward: number;
  readonly queueLength: number;
  readonly timestamp: string;
  /** Episode regressed below the agent's last recorded episode */
  readonly outOfOrder: boolean;
}

export interface ActionAdjustment {
  readonly id: string;
  readonly sourceAgentId?: string;
  readonly baseAction?: number;
  readonly adjustedAction: number;
  readonly offsetS?: number;
  readonly recordedAt: string;
}

export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly orientation: string;
  readonly position: GeoPosition;
  readonly links: readonly string[];
  readonly config: AgentConfig;
  readonly cycleLengthS: number;
  readonly status: AgentStatus;
  readonly registeredAt: string;
  readonly lastSeen: string;
  /** -1 until the first metrics sample */
  readonly lastEpisode: number;
  readonly metrics: readonly MetricSample[];
  readonly lastAdjustment?: ActionAdjustment;
}

export interface RegisterParams {
  id: string;
  position: GeoPosition;
  name?: string;
  orientation?: string;
  links?: string[];
  config?: Record<string, string | number>;
  cycleLengthS?: number;
}

export function createAgent(
  params: RegisterParams & { cycleLengthS: number },
  now: Date
): Agent {
  return freezeAgent({
    id: params.id,
    name: params.name ?? `Intersection ${params.id}`,
    orientation: params.orientation ?? "",
    position: { ...params.position },
    links: dedupeLinks(params.links ?? []),
    config: { ...(params.config ?? {}) },
    cycleLengthS: params.cycleLengthS,
    status: AgentStatus.IDLE,
    registeredAt: now.toISOString(),
    lastSeen: now.toISOString(),
    lastEpisode: -1,
    metrics: [],
  });
}

export function freezeAgent(agent: Agent): Agent {
  Object.freeze(agent.position);
  Object.freeze(agent.links);
  Object.freeze(agent.config);
  Object.freeze(agent.metrics);
  return Object.freeze(agent);
}

export function dedupeLinks(links: readonly string[]): string[] {
  return Array.from(new Set(links));
}

/**
 * Online agents count in the status view and can serve as coordination
 * targets. A terminated agent has exited and is never online again until
 * it reports a new status.
 */
export function isOnline(agent: Agent): boolean {
  return (
    agent.status !== AgentStatus.OFFLINE &&
    agent.status !== AgentStatus.TERMINATED
  );
}
