/**
 * Base class for all container errors.
 * Every error includes a human-readable `hint` and structured `details`
 * so that tools and developers can act on the failure.
 *
 * @example
 * ```typescript
 * try { services.build(); }
 * catch (e) {
 *   if (e instanceof ContainerError) {
 *     console.log(e.hint);    // actionable fix
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * A declared `exactly-one` dependency targets a contract nobody registered.
 *
 * @example
 * ```typescript
 * // UnregisteredDependencyIssue: 'UserService' depends on 'UserRepo', which is not registered.
 * ```
 */
export class UnregisteredDependencyIssue {
  readonly type = 'unregistered_dependency' as const;
  readonly message: string;
  readonly hint: string;
  readonly details: { consumer: string; dependency: string };

  constructor(consumer: string, dependency: string) {
    this.message = `'${consumer}' depends on '${dependency}', which is not registered.`;
    this.hint = [
      'To fix:',
      `  1. Register a descriptor for '${dependency}': services.add(singleton(${dependency}).from(...))`,
      `  2. Declare it with zeroOrOne(${dependency}) if '${consumer}' can work without it`,
    ].join('\n');
    this.details = { consumer, dependency };
  }
}

/**
 * Declared dependencies form a cycle.
 * `path` starts and ends with the same contract.
 *
 * @example
 * ```typescript
 * // CircularDependencyIssue: Circular dependency: AuthService -> UserService -> AuthService
 * ```
 */
export class CircularDependencyIssue {
  readonly type = 'circular_dependency' as const;
  readonly message: string;
  readonly hint: string;
  readonly details: { path: string[] };

  constructor(path: string[]) {
    this.message = `Circular dependency: ${path.join(' -> ')}`;
    this.hint = [
      'To fix:',
      '  1. Extract shared logic into a new service both can use',
      "  2. Restructure so one doesn't depend on the other",
      '  3. Depend on a Lazy wrapper and resolve it after construction',
    ].join('\n');
    this.details = { path: [...path] };
  }
}

/**
 * A singleton depends on a scoped service, directly or through other singletons.
 * The scoped instance would be frozen inside the singleton and reused across scopes.
 *
 * @example
 * ```typescript
 * // CapturedDependencyIssue: Singleton 'Cache' captures scoped 'RequestContext'.
 * ```
 */
export class CapturedDependencyIssue {
  readonly type = 'captured_dependency' as const;
  readonly message: string;
  readonly hint: string;
  readonly details: { singleton: string; scoped: string };

  constructor(singleton: string, scoped: string) {
    this.message = `Singleton '${singleton}' captures scoped '${scoped}'.`;
    this.hint = [
      'A singleton outlives every scope, so it would keep the first scoped instance forever.',
      '',
      'To fix:',
      `  1. Make '${singleton}' scoped too`,
      `  2. Make '${scoped}' a singleton if it holds no per-scope state`,
      `  3. Pass the scope to '${singleton}' at call time instead of at construction`,
      '',
      'Only chains of singletons are followed. A singleton that keeps a transient which',
      'holds a scoped service captures it too, and is not reported.',
    ].join('\n');
    this.details = { singleton, scoped };
  }
}

export type ValidationIssue =
  | UnregisteredDependencyIssue
  | CircularDependencyIssue
  | CapturedDependencyIssue;

/**
 * Every problem found in one validation pass.
 * Thrown by `build()` and returned by `validate()`; nothing has been constructed.
 *
 * @example
 * ```typescript
 * // ValidationError: 2 issues found in the service configuration:
 * //   - 'UserService' depends on 'UserRepo', which is not registered.
 * //   - Singleton 'Cache' captures scoped 'RequestContext'.
 * ```
 */
export class ValidationError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const noun = issues.length === 1 ? 'issue' : 'issues';
    super(
      `${issues.length} ${noun} found in the service configuration:\n${issues.map((i) => `  - ${i.message}`).join('\n')}`,
    );
    this.issues = Object.freeze([...issues]);
    this.hint = 'Fix every listed issue, then build again. Each issue carries its own hint.';
    this.details = { issues: issues.map((i) => ({ type: i.type, ...i.details })) };
  }
}

/**
 * Thrown by `getRequired` when no descriptor targets the contract.
 * Includes fuzzy suggestion if a similarly named contract is registered.
 *
 * @example
 * ```typescript
 * provider.getRequired(UserRepo);
 * // MissingRequiredServiceError: No service is registered for 'UserRepo'.
 * // hint: "Did you mean 'UserRepository'?"
 * ```
 */
export class MissingRequiredServiceError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(contract: string, chain: string[], registered: string[], suggestion?: string) {
    const chainStr =
      chain.length > 0
        ? `\n\nResolution chain: ${[...chain, `${contract} (not registered)`].join(' -> ')}`
        : '';
    const suggestionStr = suggestion ? `\n\nDid you mean '${suggestion}'?` : '';
    super(`No service is registered for '${contract}'.${chainStr}${suggestionStr}`);

    const register = `services.add(singleton(${contract}).from((r) => /* instance */));`;
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Or register it before building:\n  ${register}`
      : `Register it before building:\n  ${register}`;
    this.details = { contract, chain, registered, suggestion };
  }
}

/**
 * Thrown when resolution re-enters a descriptor that is still being built.
 * Only reachable through dependencies that were not declared, since declared cycles fail validation.
 * A scoped descriptor only counts as re-entered within the same scope.
 *
 * @example
 * ```typescript
 * // CircularResolutionError: Circular resolution of 'A'.
 * // Cycle: A -> B -> A
 * ```
 */
export class CircularResolutionError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(contract: string, chain: string[]) {
    const cycle = [...chain, contract];
    super(`Circular resolution of '${contract}'.\n\nCycle: ${cycle.join(' -> ')}`);
    this.hint =
      'Declare the dependencies of these descriptors so validation reports the cycle at build time, then break it.';
    this.details = { contract, chain, cycle };
  }
}

/**
 * Thrown when a factory function returns `undefined`.
 * `undefined` is reserved for "not registered" in `get()`.
 *
 * @example
 * ```typescript
 * // UndefinedReturnError: Factory for 'Database' returned undefined.
 * ```
 */
export class UndefinedReturnError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(contract: string, chain: string[]) {
    const chainStr = chain.length > 1 ? `\n\nResolution chain: ${chain.join(' -> ')}` : '';
    super(`Factory for '${contract}' returned undefined.${chainStr}`);
    this.hint =
      'Your factory function returned undefined. Did you forget a return statement? Return null for an intentionally empty value.';
    this.details = { contract, chain };
  }
}

/**
 * Thrown when a factory function throws during resolution.
 * Wraps the original error with resolution context.
 *
 * @example
 * ```typescript
 * // FactoryError: Factory for 'Database' threw an error: "Connection refused"
 * ```
 */
export class FactoryError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;
  readonly originalError: unknown;

  constructor(contract: string, chain: string[], originalError: unknown) {
    const origMessage = originalError instanceof Error ? originalError.message : String(originalError);
    const chainStr =
      chain.length > 1
        ? `\n\nResolution chain: ${[...chain.slice(0, -1), `${contract} (factory threw)`].join(' -> ')}`
        : '';
    super(`Factory for '${contract}' threw an error: "${origMessage}"${chainStr}`, { cause: originalError });
    this.hint = `Check the factory registered for '${contract}'. The error occurred during instantiation.`;
    this.details = { contract, chain, originalError: origMessage };
    this.originalError = originalError;
  }
}

/**
 * Thrown when resolving through a scope or provider after `dispose()`.
 */
export class ScopeDisposedError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(scope: string, contract: string) {
    super(`Cannot resolve '${contract}': ${scope} has been disposed.`);
    this.hint = 'Create a new scope with createScope() instead of reusing a disposed one.';
    this.details = { scope, contract };
  }
}
