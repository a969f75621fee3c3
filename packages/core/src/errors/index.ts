/**
 * Custom Error Classes
 */

import type { LinkStatus } from '../types/link.js';

/**
 * Base error class for all linkgarden errors
 */
export class LinkGardenError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LinkGardenError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unreadable or invalid persisted configuration
 */
export class ConfigurationError extends LinkGardenError {
  constructor(filePath: string, message: string, cause?: unknown) {
    super(
      `Invalid configuration in ${filePath}: ${message}`,
      'CONFIGURATION_ERROR',
      { filePath },
      { cause }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Persistence read/write failure
 */
export class StoreIOError extends LinkGardenError {
  constructor(
    operation: 'read' | 'write',
    filePath: string,
    cause?: unknown
  ) {
    super(
      `Failed to ${operation} ${filePath}`,
      'STORE_IO_ERROR',
      { operation, filePath },
      { cause }
    );
    this.name = 'StoreIOError';
  }
}

/**
 * State transition error for invalid status changes
 */
export class StateTransitionError extends LinkGardenError {
  constructor(
    linkId: string,
    fromStatus: LinkStatus,
    toStatus: LinkStatus,
    message?: string
  ) {
    super(
      message ?? `Invalid status transition from ${fromStatus} to ${toStatus}`,
      'STATE_TRANSITION_ERROR',
      { linkId, fromStatus, toStatus }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends LinkGardenError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends LinkGardenError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * External tool could not be started
 */
export class ToolInvocationError extends LinkGardenError {
  constructor(
    command: string,
    message: string,
    cause?: unknown
  ) {
    super(
      `Failed to run ${command}: ${message}`,
      'TOOL_INVOCATION_ERROR',
      { command },
      { cause }
    );
    this.name = 'ToolInvocationError';
  }
}

/**
 * Malformed pattern in a filter rule
 */
export class PatternError extends LinkGardenError {
  constructor(pattern: string, cause?: unknown) {
    super(
      `Invalid regex pattern: ${pattern}`,
      'PATTERN_ERROR',
      { pattern },
      { cause }
    );
    this.name = 'PatternError';
  }
}

/**
 * A registered observer callback threw
 */
export class ObserverError extends LinkGardenError {
  constructor(kind: string, cause?: unknown) {
    super(
      `Error in ${kind} observer`,
      'OBSERVER_ERROR',
      { kind },
      { cause }
    );
    this.name = 'ObserverError';
  }
}
