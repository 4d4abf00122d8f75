/**
 * CoordinationConfig - server settings read from the environment.
 *
 *   COORD_STALENESS_THRESHOLD_S   seconds without a report before an agent is offline (60)
 *   COORD_SWEEP_INTERVAL_S        liveness sweep interval (5)
 *   COORD_ASSUMED_SPEED_KMH       vehicle speed for green-wave travel time (40)
 *   COORD_CONNECTION_DISTANCE_M   links farther apart are flagged out of range (1500)
 *   COORD_DEFAULT_CYCLE_LENGTH_S  cycle length when an agent reports none (38)
 *   COORD_METRICS_HISTORY         samples retained per agent (500)
 *   COORD_LOG_HISTORY             server log lines retained (100)
 *   COORD_CHART_BASE_PATH         where the comparison chart images are served (/static)
 */

import { z } from "zod";
import { ValidationError } from "./errors";

export interface CoordinationConfig {
  stalenessThresholdS: number;
  sweepIntervalS: number;
  assumedSpeedKmh: number;
  connectionDistanceM: number;
  defaultCycleLengthS: number;
  metricsHistory: number;
  logHistory: number;
  chartBasePath: string;
}

export const DEFAULT_CONFIG: CoordinationConfig = {
  stalenessThresholdS: 60,
  sweepIntervalS: 5,
  assumedSpeedKmh: 40,
  connectionDistanceM: 1500,
  defaultCycleLengthS: 38,
  metricsHistory: 500,
  logHistory: 100,
  chartBasePath: "/static",
};

const envSchema = z.object({
  COORD_STALENESS_THRESHOLD_S: z.coerce.number().positive().default(DEFAULT_CONFIG.stalenessThresholdS),
  COORD_SWEEP_INTERVAL_S: z.coerce.number().positive().default(DEFAULT_CONFIG.sweepIntervalS),
  COORD_ASSUMED_SPEED_KMH: z.coerce.number().positive().default(DEFAULT_CONFIG.assumedSpeedKmh),
  COORD_CONNECTION_DISTANCE_M: z.coerce.number().positive().default(DEFAULT_CONFIG.connectionDistanceM),
  COORD_DEFAULT_CYCLE_LENGTH_S: z.coerce.number().positive().default(DEFAULT_CONFIG.defaultCycleLengthS),
  COORD_METRICS_HISTORY: z.coerce.number().int().positive().default(DEFAULT_CONFIG.metricsHistory),
  COORD_LOG_HISTORY: z.coerce.number().int().positive().default(DEFAULT_CONFIG.logHistory),
  COORD_CHART_BASE_PATH: z.string().min(1).default(DEFAULT_CONFIG.chartBasePath),
});

/**
 * Parse the configuration, throwing ValidationError on the first bad variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): CoordinationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(`Invalid configuration ${field}: ${issue.message}`, field);
  }

  const vars = parsed.data;
  return {
    stalenessThresholdS: vars.COORD_STALENESS_THRESHOLD_S,
    sweepIntervalS: vars.COORD_SWEEP_INTERVAL_S,
    assumedSpeedKmh: vars.COORD_ASSUMED_SPEED_KMH,
    connectionDistanceM: vars.COORD_CONNECTION_DISTANCE_M,
    defaultCycleLengthS: vars.COORD_DEFAULT_CYCLE_LENGTH_S,
    metricsHistory: vars.COORD_METRICS_HISTORY,
    logHistory: vars.COORD_LOG_HISTORY,
    chartBasePath: vars.COORD_CHART_BASE_PATH.replace(/\/+$/, ""),
  };
}
