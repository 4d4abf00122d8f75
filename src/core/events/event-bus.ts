/**
 * EventBus
 *
 * Publish/subscribe channel for coordination events. The registry and the
 * liveness monitor publish; the server log and any observers subscribe.
 */

import { v4 as uuidv4 } from "uuid";

export enum CoordinationEventType {
  AGENT_REGISTERED = "AGENT_REGISTERED",
  STATE_REPORTED = "STATE_REPORTED",
  OUT_OF_ORDER_SAMPLE = "OUT_OF_ORDER_SAMPLE",
  AGENT_OFFLINE = "AGENT_OFFLINE",
  ADJUSTMENT_RECORDED = "ADJUSTMENT_RECORDED",
  REGISTRY_RESET = "REGISTRY_RESET",
}

export interface CoordinationEvent {
  type: CoordinationEventType;
  agentId?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

type EventHandler = (event: CoordinationEvent) => void | Promise<void>;

export class EventBus {
  private handlers = new Map<string, EventHandler>();

  /**
   * Subscribe to events with a handler function
   * @returns Unsubscribe function
   */
  subscribe(handler: EventHandler): () => void {
    const key = `handler-${uuidv4()}`;
    this.handlers.set(key, handler);
    return () => {
      this.handlers.delete(key);
    };
  }

  /**
   * Publish an event to all subscribed handlers
   */
  emit(event: CoordinationEvent): void {
    for (const handler of this.handlers.values()) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            console.error("[EventBus] Async handler error:", err);
          });
        }
      } catch (err) {
        console.error("[EventBus] Handler error:", err);
      }
    }
  }

  get handlerCount(): number {
    return this.handlers.size;
  }
}
