import type { ServiceDependency, ServiceResolver } from '../domain/types.js';

type LazyState<T> = { settled: false; thunk: () => T } | { settled: true; value: T };

/**
 * Defers one resolution until `value` is first read, then memoizes the result.
 * Memoization only moves the call; the lifetime of the resolved instance is still
 * decided by its descriptor.
 *
 * @example
 * ```typescript
 * class ReportJob {
 *   constructor(private readonly mailer: Lazy<Mailer>) {}
 *   finish() { this.mailer.value.send(this.summary()); } // resolved here, once
 * }
 * ```
 */
export class Lazy<T> {
  private state: LazyState<T>;

  constructor(thunk: () => T) {
    this.state = { settled: false, thunk };
  }

  /** A settled wrapper for an optional dependency that is absent. */
  static missing<T>(): Lazy<T | undefined> {
    return Lazy.of<T | undefined>(undefined);
  }

  /** A settled wrapper for a multi-instance dependency with no registrations. */
  static empty<T>(): Lazy<T[]> {
    return Lazy.of<T[]>([]);
  }

  private static of<T>(value: T): Lazy<T> {
    const lazy = new Lazy(() => value);
    lazy.state = { settled: true, value };
    return lazy;
  }

  /** Whether the value has been produced. */
  get isValueCreated(): boolean {
    return this.state.settled;
  }

  get value(): T {
    if (!this.state.settled) {
      this.state = { settled: true, value: this.state.thunk() };
    }
    return this.state.value;
  }
}

/**
 * Binds a dependency declaration to a resolver without resolving it yet.
 * The cardinality picks the call made on first access:
 * `exactly-one` → `getRequired`, `zero-or-one` → `get`, `zero-or-more` → `getAll`.
 *
 * @example
 * ```typescript
 * transient(ReportJob)
 *   .dependsOn(exactlyOne(Mailer))
 *   .from((r) => new ReportJob(lazy(exactlyOne(Mailer), r)));
 * ```
 */
export function lazy<T>(dependency: ServiceDependency<T, 'exactly-one'>, resolver: ServiceResolver): Lazy<T>;
export function lazy<T>(dependency: ServiceDependency<T, 'zero-or-one'>, resolver: ServiceResolver): Lazy<T | undefined>;
export function lazy<T>(dependency: ServiceDependency<T, 'zero-or-more'>, resolver: ServiceResolver): Lazy<T[]>;
export function lazy<T>(
  dependency: ServiceDependency<T>,
  resolver: ServiceResolver,
): Lazy<T> | Lazy<T | undefined> | Lazy<T[]> {
  const { contract } = dependency;
  switch (dependency.cardinality) {
    case 'exactly-one':
      return new Lazy(() => resolver.getRequired(contract));
    case 'zero-or-one':
      return new Lazy(() => resolver.get(contract));
    case 'zero-or-more':
      return new Lazy(() => resolver.getAll(contract));
  }
}
