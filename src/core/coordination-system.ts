/**
 * CoordinationSystem
 *
 * Central object that owns the registry, topology graph, metrics views,
 * liveness monitor and broker, wired to one event bus and server log.
 */

import { CoordinationConfig, DEFAULT_CONFIG, loadConfig } from "./config";
import { EventBus } from "./events/event-bus";
import { ServerLog } from "./logging/server-log";
import { AgentRegistry, InMemoryAgentRegistry } from "./store";
import { TopologyGraph } from "./topology/topology-graph";
import { MetricsAggregator } from "./metrics/metrics-aggregator";
import { LivenessMonitor } from "./monitor/liveness-monitor";
import { CoordinationBroker } from "./broker/coordination-broker";

export interface CoordinationSystem {
  config: CoordinationConfig;
  eventBus: EventBus;
  log: ServerLog;
  registry: AgentRegistry;
  topology: TopologyGraph;
  metrics: MetricsAggregator;
  monitor: LivenessMonitor;
  broker: CoordinationBroker;
}

export interface CreateSystemOptions {
  /** Clock shared by every component */
  now?: () => Date;
}

/**
 * Create an in-memory system. The liveness monitor is not started.
 */
export function createCoordinationSystem(
  config: CoordinationConfig = DEFAULT_CONFIG,
  options: CreateSystemOptions = {}
): CoordinationSystem {
  const now = options.now ?? (() => new Date());
  const eventBus = new EventBus();
  const log = new ServerLog(config.logHistory, now);
  log.attach(eventBus);

  const registry = new InMemoryAgentRegistry({
    historyLimit: config.metricsHistory,
    defaultCycleLengthS: config.defaultCycleLengthS,
    eventBus,
    now,
  });
  const topology = new TopologyGraph(registry, {
    assumedSpeedKmh: config.assumedSpeedKmh,
    connectionDistanceM: config.connectionDistanceM,
  });
  const metrics = new MetricsAggregator(registry, {
    chartBasePath: config.chartBasePath,
  });
  const monitor = new LivenessMonitor(registry, {
    stalenessThresholdS: config.stalenessThresholdS,
    sweepIntervalS: config.sweepIntervalS,
    log,
    now,
  });
  const broker = new CoordinationBroker(registry, topology, metrics, log);

  return { config, eventBus, log, registry, topology, metrics, monitor, broker };
}

// ─── Singleton for the Next.js server ──────────────────────────────────

let _instance: CoordinationSystem | undefined;

/**
 * The process-wide system, created from the environment on first use with
 * its liveness monitor running. Throws if the configuration is invalid.
 */
export function getCoordinationSystem(): CoordinationSystem {
  if (!_instance) {
    const system = createCoordinationSystem(loadConfig());
    system.monitor.start();
    system.log.info(
      "System",
      `Coordination server started (staleness ${system.config.stalenessThresholdS}s, speed ${system.config.assumedSpeedKmh} km/h)`
    );
    _instance = system;
  }
  return _instance;
}
