/**
 * LivenessMonitor - marks agents offline once their reports go stale.
 *
 * Runs on a fixed interval. A failure while evaluating one agent is logged
 * and the sweep moves on to the rest; `sweep()` never rejects.
 */

import { AgentRegistry } from "../store/agent-registry";
import { Agent } from "../models/agent";
import { ServerLog } from "../logging/server-log";

export interface LivenessMonitorOptions {
  stalenessThresholdS: number;
  sweepIntervalS: number;
  log: ServerLog;
  now?: () => Date;
}

export class LivenessMonitor {
  private timer?: NodeJS.Timeout;
  private inFlight = false;
  private now: () => Date;

  constructor(
    private registry: AgentRegistry,
    private options: LivenessMonitorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = true;
      void this.sweep().finally(() => {
        this.inFlight = false;
      });
    }, this.options.sweepIntervalS * 1000);
    // Never keep the process alive just for the sweep
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Evaluate every agent once.
   * @returns Ids transitioned to offline by this sweep
   */
  async sweep(now: Date = this.now()): Promise<string[]> {
    const staleBefore = new Date(now.getTime() - this.options.stalenessThresholdS * 1000);

    let agents: Agent[];
    try {
      agents = await this.registry.list();
    } catch (err) {
      this.options.log.error("Liveness", "Failed to list agents", err);
      return [];
    }

    const marked: string[] = [];
    for (const agent of agents) {
      try {
        if (await this.registry.markOffline(agent.id, staleBefore)) {
          marked.push(agent.id);
        }
      } catch (err) {
        this.options.log.error("Liveness", `Failed to evaluate agent ${agent.id}`, err);
      }
    }
    return marked;
  }
}
