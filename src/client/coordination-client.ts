/**
 * Coordination Client
 *
 * Typed HTTP client for the coordination server, used by intersection
 * agents, sync agents and the dashboard.
 *
 * Usage:
 *   const client = new CoordinationClient("http://localhost:3000");
 *   await client.register({ agent_id: "agent1", position: { latitude: 10, longitude: 106 } });
 *   await client.report({ agent_id: "agent1", status: AgentStatus.TRAINING, episode: 1, reward: -3.2, queue_length: 4 });
 *   const offset = await client.requestOffset("agent1");
 *   if (!offset.available) {
 *     // fall back to the unsynchronized action
 *   }
 *
 * `requestOffset` never throws for transport failures or timeouts: an
 * unreachable server is answered as "no coordination available".
 */

import type {
  ActionResponse,
  ChartsResponse,
  DataResponse,
  OffsetResponse,
  RegisterResponse,
  ReportResponse,
  StatusResponse,
} from "@/core/broker/coordination-broker";
import type { ActionRequest, RegisterRequest, ReportRequest } from "@/core/broker/schemas";

export type ClientOffsetResult =
  | OffsetResponse
  | { available: false; reason: "UNREACHABLE" | "UNKNOWN_AGENT" };

export class CoordinationRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly reason?: string
  ) {
    super(message);
    this.name = "CoordinationRequestError";
  }
}

/** The part of the fetch API the client relies on */
export type FetchLike = (
  url: string,
  init: RequestInit
) => Promise<Pick<Response, "ok" | "status" | "json">>;

export interface CoordinationClientOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class CoordinationClient {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(baseUrl: string = "", options: CoordinationClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async register(body: RegisterRequest): Promise<RegisterResponse> {
    return this.request<RegisterResponse>("/api/register", { method: "POST", body });
  }

  async report(body: ReportRequest): Promise<ReportResponse> {
    return this.request<ReportResponse>("/api/report", { method: "POST", body });
  }

  /**
   * Offset for `agentId`, from `fromId` if given or else the nearest
   * online neighbor.
   */
  async requestOffset(agentId: string, fromId?: string): Promise<ClientOffsetResult> {
    const params = new URLSearchParams({ agent_id: agentId });
    if (fromId) params.set("from", fromId);

    try {
      return await this.request<OffsetResponse>(`/api/offset?${params.toString()}`, { method: "GET" });
    } catch (err) {
      if (err instanceof CoordinationRequestError && err.status === 404) {
        return { available: false, reason: "UNKNOWN_AGENT" };
      }
      if (err instanceof CoordinationRequestError && err.status < 500) {
        throw err;
      }
      console.warn("[CoordinationClient] Offset request failed, falling back:", err);
      return { available: false, reason: "UNREACHABLE" };
    }
  }

  async postAction(body: ActionRequest): Promise<ActionResponse> {
    return this.request<ActionResponse>("/api/action", { method: "POST", body });
  }

  async status(): Promise<StatusResponse> {
    return this.request<StatusResponse>("/api/status", { method: "GET" });
  }

  async data(): Promise<DataResponse> {
    return this.request<DataResponse>("/api/data", { method: "GET" });
  }

  async latestCharts(): Promise<ChartsResponse> {
    return this.request<ChartsResponse>("/api/latest_charts", { method: "GET" });
  }

  private async request<T>(
    path: string,
    options: { method: "GET" | "POST"; body?: unknown }
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: options.method,
        headers: options.body !== undefined ? { "Content-Type": "application/json" } : undefined,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      const payload: unknown = await response.json();
      if (!response.ok) {
        const { error, reason } = (payload ?? {}) as { error?: string; reason?: string };
        throw new CoordinationRequestError(
          error ?? `Request to ${path} failed with ${response.status}`,
          response.status,
          reason
        );
      }
      return payload as T;
    } finally {
      clearTimeout(timer);
    }
  }
}
