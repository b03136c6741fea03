/**
 * Error handling utilities with standardized error payloads
 */

import type { ErrorPayload } from "../../types.js";

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  ARTICLE_NOT_FOUND = "ARTICLE_NOT_FOUND",
  SOURCE_ERROR = "SOURCE_ERROR",
  SINK_ERROR = "SINK_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Create a standardized error payload
 */
export function createError(
  code: ErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
  retryable: boolean = false
): ErrorPayload {
  return {
    code,
    message,
    details,
    retryable,
  };
}

/**
 * Error thrown when a payload has to travel up through ordinary control flow
 */
export class PipelineError extends Error {
  readonly payload: ErrorPayload;

  constructor(payload: ErrorPayload) {
    super(payload.message);
    this.name = "PipelineError";
    this.payload = payload;
  }
}

/**
 * Fatal misconfiguration: bad chunking parameters or environment values.
 * Raised before any work starts and never clamped.
 */
export class ConfigurationError extends PipelineError {
  constructor(setting: string, value: unknown, reason: string) {
    super(configurationError(setting, value, reason));
    this.name = "ConfigurationError";
  }
}

/**
 * Create an error for invalid input
 */
export function invalidInputError(
  field: string,
  value: unknown,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.INVALID_INPUT,
    `Invalid input for ${field}: ${String(value)}${reason ? ` (${reason})` : ""}`,
    { field, value, reason },
    false
  );
}

/**
 * Create an error for a rejected configuration value
 */
export function configurationError(
  setting: string,
  value: unknown,
  reason: string
): ErrorPayload {
  return createError(
    ErrorCode.CONFIGURATION_ERROR,
    `Invalid configuration for ${setting}: ${String(value)} (${reason})`,
    { setting, value, reason },
    false
  );
}

/**
 * Create an error for an article that does not exist in the source
 */
export function articleNotFoundError(
  slug: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.ARTICLE_NOT_FOUND,
    `Article not found: ${slug}`,
    {
      slug,
      ...details,
    },
    false
  );
}

/**
 * Create an error for article source failures
 */
export function sourceError(
  source: string,
  reason?: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.SOURCE_ERROR,
    `Source error (${source})${reason ? `: ${reason}` : ""}`,
    {
      source,
      reason,
      ...details,
    },
    true
  );
}

/**
 * Create an error for passage sink failures
 */
export function sinkError(
  sink: string,
  reason?: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.SINK_ERROR,
    `Sink error (${sink})${reason ? `: ${reason}` : ""}`,
    {
      sink,
      reason,
      ...details,
    },
    true
  );
}

/**
 * Create an error for internal/unexpected errors
 */
export function internalError(
  message: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.INTERNAL_ERROR,
    `Internal error: ${message}`,
    details,
    false
  );
}

/**
 * Check whether a tool result is an error payload
 */
export function isErrorPayload(value: unknown): value is ErrorPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "code" in value &&
    "message" in value &&
    typeof value.code === "string" &&
    typeof value.message === "string"
  );
}

/**
 * Convert an Error object to a standardized error payload
 */
export function errorToPayload(error: unknown, context?: Record<string, unknown>): ErrorPayload {
  if (error instanceof PipelineError) {
    return context
      ? { ...error.payload, details: { ...error.payload.details, ...context } }
      : error.payload;
  }

  if (error instanceof Error) {
    return createError(
      ErrorCode.INTERNAL_ERROR,
      error.message,
      {
        name: error.name,
        stack: error.stack,
        ...context,
      },
      false
    );
  }

  return createError(
    ErrorCode.INTERNAL_ERROR,
    String(error),
    context,
    false
  );
}

/**
 * Render an unknown thrown value as a message string
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
