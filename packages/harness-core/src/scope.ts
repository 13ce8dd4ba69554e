/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Per-invocation method overrides.
 *
 * For the duration of one test, `setUp`, the test method and `tearDown` are
 * shadowed by own properties that call the originals with the provisioned
 * resources as leading arguments. The host keeps calling them with no
 * arguments and never notices. Afterwards the resources are released and
 * the original bindings restored, whatever happened in between.
 *
 * A test case is idle or active; only one test may be active per instance.
 */

import type { TestCase } from '@unit-harness/unit';
import { UsageError } from './errors.js';
import type { Provision } from './provision.js';

/**
 * Resources acquired for one test, and the provisions that release them.
 *
 * Provisions are released in reverse order.
 */
export interface Acquired<R extends readonly unknown[]> {
  resources: R;
  provisions: readonly Provision<unknown>[];
}

export type ScopePhase = 'idle' | 'active';

/**
 * A captured binding: what the name resolved to, and the own property (if
 * any) that must be put back.
 */
interface SavedBinding {
  name: string;
  original: Function;
  descriptor: PropertyDescriptor | undefined;
}

const activeCases = new WeakSet<TestCase>();

/**
 * Whether a test case currently has a test in flight.
 */
export function scopePhase(testCase: TestCase): ScopePhase {
  return activeCases.has(testCase) ? 'active' : 'idle';
}

export class MethodOverrideScope {
  constructor(private readonly testCase: TestCase) {}

  /**
   * Run one test with resources injected.
   *
   * @param acquire - Provisions the resources; a failure here propagates
   *   before anything is rebound
   * @param execute - The host's execution primitive (`run(result)` or
   *   `debug()`), called exactly once
   *
   * @throws {UsageError} If the case already has a test in flight
   * @throws The first release error, after bindings are restored; an
   *   AggregateError if `execute` and a release both failed
   */
  async run<R extends readonly unknown[]>(
    acquire: () => Promise<Acquired<R>>,
    execute: () => Promise<unknown>
  ): Promise<void> {
    if (activeCases.has(this.testCase)) {
      throw new UsageError(`${this.testCase.id()} already has a test in flight`);
    }

    activeCases.add(this.testCase);
    let saved: SavedBinding[];
    let acquired: Acquired<R>;
    try {
      saved = this.capture();
      acquired = await acquire();
    } catch (err) {
      activeCases.delete(this.testCase);
      throw err;
    }

    const { resources, provisions } = acquired;
    let failures: unknown[] = [];
    try {
      this.rebind(saved, resources);
      await execute();
    } catch (err) {
      failures.push(err);
    } finally {
      failures = failures.concat(await release(provisions));
      this.restore(saved);
      activeCases.delete(this.testCase);
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${this.testCase.id()}: test and resource release both failed`);
    }
  }

  private capture(): SavedBinding[] {
    const names = [...new Set(['setUp', this.testCase.methodName, 'tearDown'])];
    return names.map((name) => {
      const original: unknown = Reflect.get(this.testCase, name);
      if (typeof original !== 'function') {
        throw new UsageError(`${this.testCase.constructor.name}.${name} is not a method`);
      }
      return {
        name,
        original,
        descriptor: Object.getOwnPropertyDescriptor(this.testCase, name),
      };
    });
  }

  private rebind(saved: SavedBinding[], resources: readonly unknown[]): void {
    const testCase = this.testCase;
    for (const { name, original } of saved) {
      Object.defineProperty(testCase, name, {
        configurable: true,
        enumerable: false,
        writable: true,
        value: (..._ignored: unknown[]): unknown => Reflect.apply(original, testCase, resources),
      });
    }
  }

  private restore(saved: SavedBinding[]): void {
    for (const { name, descriptor } of saved) {
      if (descriptor) {
        Object.defineProperty(this.testCase, name, descriptor);
      } else {
        Reflect.deleteProperty(this.testCase, name);
      }
    }
  }
}

/**
 * Release provisions in reverse order, running every one of them.
 *
 * @returns The errors raised, in the order they were raised
 */
async function release(provisions: readonly Provision<unknown>[]): Promise<unknown[]> {
  const errors: unknown[] = [];
  for (const provision of [...provisions].reverse()) {
    try {
      await provision.dispose();
    } catch (err) {
      errors.push(err);
    }
  }
  return errors;
}
