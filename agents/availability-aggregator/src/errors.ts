/**
 * Availability Aggregator Agent - Errors
 */

import type { ErrorCode } from '../contracts/schemas.js';

export interface AggregationErrorContext {
  entity?: string;
  exporter?: string;
  cause?: unknown;
}

export class AggregationError extends Error {
  readonly code: ErrorCode;
  readonly entity?: string;
  readonly exporter?: string;

  constructor(code: ErrorCode, message: string, context: AggregationErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = 'AggregationError';
    this.code = code;
    this.entity = context.entity;
    this.exporter = context.exporter;
  }
}

export function isAggregationError(error: unknown): error is AggregationError {
  return error instanceof AggregationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
