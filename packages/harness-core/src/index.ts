/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Resource-injecting test cases for application tests.
 *
 * Test methods receive a fresh application, a client, or both as
 * parameters; live suites serve the application on a real socket.
 */

export {
  ResourceTestCase,
  AppTestCase,
  ClientTestCase,
  AppClientTestCase,
  LiveTestCase,
  openClient,
  type AppFactoryResult,
  type LiveEndpoint,
} from './case.js';
export { LiveTestSuite } from './suite.js';
export { LiveTestLoader } from './loader.js';
export { mainLive, type LiveProgramOptions } from './program.js';
export { MethodOverrideScope, scopePhase, type Acquired, type ScopePhase } from './scope.js';
export {
  provision,
  resourceShape,
  describeValue,
  Provision,
  type ResourceFactory,
  type ResourceShape,
} from './provision.js';
export {
  resolveSuiteConfig,
  serverUrl,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_READINESS_TIMEOUT,
  DEFAULT_POLL_INTERVAL,
  READINESS_TIMEOUT_ENV,
  type LiveSuiteOptions,
  type SuiteConfig,
} from './config.js';
export { waitForPort, type ProbeOptions } from './probe.js';
export {
  isApplication,
  isClientHandle,
  isDetachable,
  type Application,
  type ClientHandle,
  type ClientOptions,
  type Detachable,
  type RunOptions,
} from './types.js';
export {
  HarnessError,
  UsageError,
  ContractViolationError,
  ResourceTypeError,
  ReadinessTimeoutError,
  type ContractViolation,
} from './errors.js';
