/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { main, type ProgramOptions, type TestResult } from '@unit-harness/unit';
import type { LiveSuiteOptions } from './config.js';
import { LiveTestLoader } from './loader.js';
import type { Application } from './types.js';

export interface LiveProgramOptions extends Omit<ProgramOptions, 'createLoader'> {
  /** Endpoint and readiness options for the live suites */
  suite?: LiveSuiteOptions;
}

/**
 * Like `main()`, but every loaded suite serves `app` on a real socket first.
 *
 * @example
 * ```typescript
 * await mainLive(createApplication(buildApp(), { PORT: 5055 }), {
 *   tests: [HealthTests, AuthTests],
 * });
 * ```
 */
export function mainLive(app: Application, options: LiveProgramOptions): Promise<TestResult> {
  const { suite, ...rest } = options;
  return main({
    ...rest,
    createLoader: (loaderOptions) => new LiveTestLoader(app, suite, loaderOptions),
  });
}
