/**
 * Custom Error Classes
 */

import type { AssemblyState } from '../stateMachine.js';

/**
 * Base error class for all jarsmith errors
 */
export class JarsmithError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'JarsmithError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required input missing or invalid: template not found, template without
 * a manifest, malformed file-set pattern, invalid build descriptor
 */
export class ConfigurationError extends JarsmithError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 2, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Reading a source or writing the output archive failed
 */
export class IoFailureError extends JarsmithError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'IO_FAILURE', 3, details, cause);
    this.name = 'IoFailureError';
  }
}

/**
 * The archive was written but could not be registered with the build
 */
export class AttachmentError extends JarsmithError {
  constructor(file: string, classifier: string, cause?: unknown) {
    super(
      `Failed to attach ${file} with classifier "${classifier}"`,
      'ATTACHMENT_FAILURE',
      4,
      { file, classifier },
      cause
    );
    this.name = 'AttachmentError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends JarsmithError {
  constructor(
    runId: string,
    fromState: AssemblyState,
    toState: AssemblyState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      1,
      { runId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Describe an unknown thrown value in one line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pass taxonomy errors through untouched; wrap anything else as an I/O failure
 */
export function toJarsmithError(error: unknown, context: string): JarsmithError {
  if (error instanceof JarsmithError) {
    return error;
  }
  return new IoFailureError(`${context}: ${describeError(error)}`, undefined, error);
}
