/**
 * ServerLog - recent server activity for the dashboard.
 *
 * Writes to the console with a bracketed scope and keeps the most recent
 * lines in memory for `/api/logs`.
 */

import { CoordinationEvent, CoordinationEventType, EventBus } from "../events/event-bus";

export type LogLevel = "info" | "warn" | "error";

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

export class ServerLog {
  private lines: string[] = [];

  constructor(
    private capacity: number,
    private now: () => Date = () => new Date()
  ) {}

  info(scope: string, message: string): void {
    this.write("info", scope, message);
  }

  warn(scope: string, message: string): void {
    this.write("warn", scope, message);
  }

  error(scope: string, message: string, err?: unknown): void {
    const detail = err instanceof Error ? `: ${err.message}` : err !== undefined ? `: ${String(err)}` : "";
    this.write("error", scope, `${message}${detail}`);
  }

  /**
   * Most recent lines, oldest first.
   */
  recent(): string[] {
    return [...this.lines];
  }

  /**
   * Record coordination events published on the bus.
   * @returns Unsubscribe function
   */
  attach(eventBus: EventBus): () => void {
    return eventBus.subscribe((event) => this.record(event));
  }

  private record(event: CoordinationEvent): void {
    const data = event.data ?? {};
    switch (event.type) {
      case CoordinationEventType.AGENT_REGISTERED:
        this.info(
          "Registry",
          data.created ? `New agent registered: ${event.agentId}` : `Agent re-registered: ${event.agentId}`
        );
        break;
      case CoordinationEventType.STATE_REPORTED: {
        let message = `Update from ${event.agentId}`;
        if (typeof data.episode === "number") message += `, Episode: ${data.episode}`;
        if (typeof data.status === "string") message += `, Status: ${data.status}`;
        if (typeof data.reward === "number") message += `, Reward: ${data.reward.toFixed(2)}`;
        this.info("Registry", message);
        break;
      }
      case CoordinationEventType.OUT_OF_ORDER_SAMPLE:
        this.warn(
          "Registry",
          `Out-of-order sample from ${event.agentId}: episode ${String(data.episode)} after ${String(data.lastEpisode)}`
        );
        break;
      case CoordinationEventType.AGENT_OFFLINE:
        this.warn("Liveness", `WARNING: Agent ${event.agentId} appears to be offline`);
        break;
      case CoordinationEventType.ADJUSTMENT_RECORDED:
        this.info("Broker", `Sync adjustment for ${event.agentId}: action ${String(data.adjustedAction)}`);
        break;
      case CoordinationEventType.REGISTRY_RESET:
        this.info("Registry", "Server data has been reset");
        break;
    }
  }

  private write(level: LogLevel, scope: string, message: string): void {
    this.lines.push(`[${formatTimestamp(this.now())}] ${message}`);
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }

    const line = `[${scope}] ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }
}
