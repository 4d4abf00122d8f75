export {
  CoordinationClient,
  CoordinationRequestError,
  type ClientOffsetResult,
  type CoordinationClientOptions,
  type FetchLike,
} from "./coordination-client";
export { useDashboard } from "./hooks/use-dashboard";
