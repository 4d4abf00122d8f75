/**
 * BrokerResult - standard result type for every broker operation.
 */

import { CoordinationError, CoordinationErrorCode, ValidationError } from "../errors";

export interface BrokerSuccess<T> {
  success: true;
  data: T;
}

export interface BrokerFailure {
  success: false;
  status: number;
  reason: CoordinationErrorCode;
  error: string;
  field?: string;
}

export type BrokerResult<T> = BrokerSuccess<T> | BrokerFailure;

export function successResult<T>(data: T): BrokerSuccess<T> {
  return { success: true, data };
}

export function errorResult(error: CoordinationError): BrokerFailure {
  return {
    success: false,
    status: error.httpStatus,
    reason: error.code,
    error: error.message,
    field: error instanceof ValidationError ? error.field : undefined,
  };
}
