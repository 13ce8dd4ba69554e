/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * A small xUnit test framework: class-based test cases with setUp/tearDown,
 * suites, a result sink, a loader, a text runner and a CLI entry point.
 */

export { TestCase, type Awaitable, type Cleanup, type RejectionMatcher } from './case.js';
export { TestResult, type TestOutcome, type SkipOutcome } from './result.js';
export { TestSuite, type Test, type SuiteMember } from './suite.js';
export { TestLoader, type TestCaseClass, type LoaderOptions } from './loader.js';
export { TextTestRunner, TextTestResult, type RunnerOptions, type OutputStream } from './runner.js';
export { main, type ProgramOptions } from './program.js';
export { SkipTest, isAssertionFailure, formatError } from './errors.js';
