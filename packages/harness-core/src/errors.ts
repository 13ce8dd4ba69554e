/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Error types for the fixture harness.
 *
 * All harness errors extend HarnessError, allowing callers to catch all of
 * them with `if (err instanceof HarnessError)` or specific errors with their
 * class. None of them is ever recorded as a test failure: they abort the run
 * (or surface from it) instead.
 */

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all harness errors */
export class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * A test case or suite is misconfigured, or used in a way the harness does
 * not support. Raised before any test executes.
 */
export class UsageError extends HarnessError {}

// =============================================================================
// Resource Errors
// =============================================================================

/**
 * How a generator fixture broke the yield-exactly-once protocol.
 */
export type ContractViolation = 'no-yield' | 'extra-yield';

/**
 * A generator fixture yielded no value, or more than one.
 */
export class ContractViolationError extends HarnessError {
  constructor(
    public readonly resource: string,
    public readonly violation: ContractViolation,
    options?: ErrorOptions
  ) {
    super(
      violation === 'no-yield'
        ? `${resource} factory finished without yielding a value; a generator fixture must yield exactly once`
        : `${resource} factory yielded a second value; a generator fixture must yield exactly once`,
      options
    );
  }
}

/**
 * A factory produced something that is not the resource it was declared to
 * build.
 */
export class ResourceTypeError extends HarnessError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    options?: ErrorOptions
  ) {
    super(`Expected factory to produce ${expected}, got ${actual}`, options);
  }
}

// =============================================================================
// Live Endpoint Errors
// =============================================================================

/**
 * The live server never accepted a connection within the readiness timeout.
 */
export class ReadinessTimeoutError extends HarnessError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    public readonly timeout: number
  ) {
    super(`Server at ${host}:${port} did not accept connections within ${timeout}ms`);
  }
}
