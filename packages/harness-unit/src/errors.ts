/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { AssertionError } from 'node:assert';

/**
 * Thrown by `TestCase.skipTest()`; recorded as a skip instead of a failure.
 */
export class SkipTest extends Error {
  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'SkipTest';
  }
}

/**
 * Whether a thrown value is a failed expectation rather than an unexpected error.
 *
 * Matches `node:assert` failures and anything else that names itself
 * `AssertionError`, so assertions from other libraries are classified the
 * same way.
 */
export function isAssertionFailure(err: unknown): boolean {
  if (err instanceof AssertionError) {
    return true;
  }
  return err instanceof Error && err.name === 'AssertionError';
}

/**
 * Render a thrown value for reports.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  return String(err);
}
