export {
  type AgentRegistry,
  type AdjustmentParams,
  type ReportOutcome,
  type ReportParams,
  InMemoryAgentRegistry,
  resolveCycleLength,
  validatePosition,
} from "./agent-registry";
