/**
 * Request schemas for the HTTP surface. Field names are snake_case on the
 * wire, matching what the intersection and sync agents send.
 */

import { z } from "zod";
import { AgentStatus, REPORTABLE_STATUSES, ReportableStatus } from "../models/agent";
import { ValidationError } from "../errors";

const agentId = z.string().trim().min(1, "must not be empty");

export const registerSchema = z.object({
  agent_id: agentId,
  position: z.object({
    latitude: z.number(),
    longitude: z.number(),
  }),
  name: z.string().optional(),
  orientation: z.string().optional(),
  links: z.array(agentId).optional(),
  config: z.record(z.union([z.string(), z.number()])).optional(),
  cycle_length_s: z.number().optional(),
});

export const reportSchema = z.object({
  agent_id: agentId,
  status: z
    .nativeEnum(AgentStatus)
    .refine((s): s is ReportableStatus => REPORTABLE_STATUSES.some((r) => r === s), {
      message: `status must be one of: ${REPORTABLE_STATUSES.join(", ")}`,
    }),
  episode: z.number().int().nonnegative().optional(),
  reward: z.number().optional(),
  queue_length: z.number().nonnegative().optional(),
});

export const offsetSchema = z.object({
  agent_id: agentId,
  /** Upstream agent; omitted to let the broker pick the nearest online neighbor */
  from: agentId.optional(),
});

export const actionSchema = z.object({
  agent_id: agentId,
  source_agent_id: agentId.optional(),
  base_action: z.number().optional(),
  adjusted_action: z.number(),
  offset_s: z.number().nonnegative().optional(),
});

export type RegisterRequest = z.infer<typeof registerSchema>;
export type ReportRequest = z.infer<typeof reportSchema>;
export type OffsetRequest = z.infer<typeof offsetSchema>;
export type ActionRequest = z.infer<typeof actionSchema>;

/**
 * Parse `input`, throwing ValidationError for the first issue.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    throw new ValidationError(`Invalid ${field}: ${issue.message}`, field);
  }
  return parsed.data;
}
