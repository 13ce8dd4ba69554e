/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Resource provisioning.
 *
 * A factory either returns its resource (directly or as a promise), or is a
 * generator that yields the resource exactly once and runs its cleanup when
 * resumed. Both become a two-phase Provision: the resource is acquired when
 * the factory is provisioned and released by `dispose()`.
 *
 * @example
 * ```typescript
 * // Plain factory: nothing to release
 * const createApp = () => buildApp();
 *
 * // Generator factory: cleanup runs on dispose()
 * async function* createApp() {
 *   const dir = await mkdtemp(join(tmpdir(), 'app-'));
 *   yield buildApp({ dataDir: dir });
 *   await rm(dir, { recursive: true });
 * }
 * ```
 */

import type { Awaitable } from '@unit-harness/unit';
import { ContractViolationError, ResourceTypeError, UsageError } from './errors.js';

/**
 * A nullary resource constructor, plain or generator-shaped.
 */
export type ResourceFactory<T> = () =>
  | T
  | Promise<T>
  | Generator<T, void, undefined>
  | AsyncGenerator<T, void, undefined>;

/**
 * Describes the resource a factory is expected to build.
 */
export interface ResourceShape<T> {
  /** Name used in error messages (e.g. "application") */
  name: string;
  /** Checks the produced value has the expected capabilities */
  guard: (value: unknown) => value is T;
  /** Resource-specific teardown, used for plain factories only */
  release?: (resource: T) => Awaitable<void>;
}

/**
 * Build a ResourceShape from a capability check.
 */
export function resourceShape<T>(
  name: string,
  check: (value: unknown) => boolean,
  release?: (resource: T) => Awaitable<void>
): ResourceShape<T> {
  const guard = (value: unknown): value is T => check(value);
  return release ? { name, guard, release } : { name, guard };
}

/**
 * An acquired resource and its pending release.
 */
export class Provision<T> {
  private state: 'held' | 'released' = 'held';

  constructor(
    public readonly name: string,
    public readonly resource: T,
    private readonly releaser: () => Promise<void>
  ) {}

  get released(): boolean {
    return this.state === 'released';
  }

  /**
   * Release the resource. Succeeds once; a second call is a UsageError.
   *
   * @throws {ContractViolationError} If a generator factory yields again
   */
  async dispose(): Promise<void> {
    if (this.state === 'released') {
      throw new UsageError(`${this.name} was already released`);
    }
    this.state = 'released';
    await this.releaser();
  }
}

/**
 * Acquire a resource from a factory.
 *
 * @param factory - Plain or generator-shaped constructor
 * @param shape - What the factory is expected to produce
 * @returns The held resource; call `dispose()` exactly once to release it
 *
 * @throws {ResourceTypeError} If the produced value fails `shape.guard`
 * @throws {ContractViolationError} If a generator factory finishes without yielding
 */
export async function provision<T>(factory: ResourceFactory<T>, shape: ResourceShape<T>): Promise<Provision<T>> {
  const produced: unknown = await factory();

  if (isFixtureGenerator(produced)) {
    return acquireFromGenerator(produced, shape);
  }

  const resource = checkShape(produced, shape);
  const release = shape.release;
  return new Provision(shape.name, resource, async () => {
    if (release) {
      await release(resource);
    }
  });
}

// =============================================================================
// Generator fixtures
// =============================================================================

/**
 * The part of a sync or async generator the provisioner drives.
 */
interface FixtureGenerator {
  next(): Awaitable<IteratorResult<unknown, unknown>>;
  return(value: undefined): Awaitable<IteratorResult<unknown, unknown>>;
}

function isFixtureGenerator(value: unknown): value is FixtureGenerator {
  const tag = Object.prototype.toString.call(value);
  return tag === '[object Generator]' || tag === '[object AsyncGenerator]';
}

async function acquireFromGenerator<T>(generator: FixtureGenerator, shape: ResourceShape<T>): Promise<Provision<T>> {
  const first = await generator.next();
  if (first.done) {
    throw new ContractViolationError(shape.name, 'no-yield');
  }

  const value = first.value;
  if (!shape.guard(value)) {
    throw new ResourceTypeError(shape.name, describeValue(value), await closeFixture(generator));
  }
  const resource = value;

  return new Provision(shape.name, resource, async () => {
    const step = await generator.next();
    if (!step.done) {
      throw new ContractViolationError(shape.name, 'extra-yield', await closeFixture(generator));
    }
  });
}

/**
 * Close a generator so its finally blocks run. A failure there is returned
 * as the cause for the error being raised.
 */
async function closeFixture(generator: FixtureGenerator): Promise<ErrorOptions | undefined> {
  try {
    await generator.return(undefined);
    return undefined;
  } catch (cause) {
    return { cause };
  }
}

// =============================================================================
// Shape checks
// =============================================================================

function checkShape<T>(value: unknown, shape: ResourceShape<T>): T {
  if (!shape.guard(value)) {
    throw new ResourceTypeError(shape.name, describeValue(value));
  }
  return value;
}

/**
 * Describe a value's shape for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'function') {
    return 'a function';
  }
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    if (typeof ctor === 'function' && ctor.name && ctor !== Object) {
      return `an instance of ${ctor.name}`;
    }
    return 'a plain object';
  }
  return `a ${typeof value}`;
}
