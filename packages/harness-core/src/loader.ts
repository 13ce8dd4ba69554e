/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { TestLoader, type LoaderOptions, type Test } from '@unit-harness/unit';
import type { LiveSuiteOptions } from './config.js';
import { LiveTestSuite } from './suite.js';
import type { Application } from './types.js';

/**
 * Loads TestCase classes into LiveTestSuites serving one application.
 */
export class LiveTestLoader<A extends Application = Application> extends TestLoader {
  constructor(
    private readonly app: A,
    private readonly suiteOptions: LiveSuiteOptions = {},
    loaderOptions: LoaderOptions = {}
  ) {
    super(loaderOptions);
  }

  createSuite(tests: Test[]): LiveTestSuite<A> {
    return new LiveTestSuite(this.app, this.suiteOptions, tests);
  }
}
