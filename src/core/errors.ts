/**
 * Error types for the coordination server.
 *
 * Every error carries a machine-readable `code` and the HTTP status the
 * broker answers with.
 */

export type CoordinationErrorCode =
  | "VALIDATION_ERROR"
  | "UNKNOWN_AGENT"
  | "NO_LINK"
  | "NO_COORDINATION_AVAILABLE"
  | "INTERNAL_ERROR";

/**
 * Base error class for all coordination errors.
 */
export class CoordinationError extends Error {
  readonly code: CoordinationErrorCode;
  readonly httpStatus: number;

  constructor(message: string, code: CoordinationErrorCode = "INTERNAL_ERROR", httpStatus = 500) {
    super(message);
    this.name = "CoordinationError";
    this.code = code;
    this.httpStatus = httpStatus;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed registration, report or request input. No state was changed.
 */
export class ValidationError extends CoordinationError {
  /** The field that failed validation */
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Operation on an agent id that was never registered.
 */
export class UnknownAgentError extends CoordinationError {
  readonly agentId: string;

  constructor(agentId: string) {
    super(`Agent not found: ${agentId}`, "UNKNOWN_AGENT", 404);
    this.name = "UnknownAgentError";
    this.agentId = agentId;
  }
}

/**
 * Neither agent declares a link to the other.
 *
 * A legitimate negative result: callers fall back to unsynchronized control.
 */
export class NoLinkError extends CoordinationError {
  readonly fromId: string;
  readonly toId: string;

  constructor(fromId: string, toId: string) {
    super(`No link between ${fromId} and ${toId}`, "NO_LINK", 200);
    this.name = "NoLinkError";
    this.fromId = fromId;
    this.toId = toId;
  }
}

/**
 * No linked agent is currently online.
 */
export class NoCoordinationAvailableError extends CoordinationError {
  readonly agentId: string;

  constructor(agentId: string) {
    super(`No online linked agent for ${agentId}`, "NO_COORDINATION_AVAILABLE", 200);
    this.name = "NoCoordinationAvailableError";
    this.agentId = agentId;
  }
}
