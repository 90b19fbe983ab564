import type { Contract } from './contract.js';

/**
 * Instance caching policy of a descriptor.
 * - `transient`: a new instance on every resolution, never cached.
 * - `singleton`: one instance per provider, shared by every scope.
 * - `scoped`: one instance per scope; the provider acts as its own root scope.
 *
 * A singleton must not keep a scoped instance, directly or through a transient it
 * holds on to. Validation reports the direct and singleton-chain cases only.
 */
export type Lifetime = 'transient' | 'singleton' | 'scoped';

/** How many instances a dependency declaration expects. */
export type Cardinality = 'exactly-one' | 'zero-or-one' | 'zero-or-more';

/**
 * A declared dependency of a descriptor, used only by the validator.
 * Descriptors that declare nothing are not validated.
 */
export interface ServiceDependency<T = unknown, C extends Cardinality = Cardinality> {
  readonly contract: Contract<T>;
  readonly cardinality: C;
}

/**
 * A factory receives the resolution context explicitly and returns an instance.
 * Singleton factories always receive the provider; scoped factories the scope
 * that caches them; transient factories the context they were requested from.
 *
 * @example
 * ```typescript
 * const factory: Factory<UserService> = (r) => new UserService(r.getRequired(UserRepo));
 * ```
 */
export type Factory<T> = (resolver: ServiceResolver) => T;

/**
 * Options for creating a scope.
 */
export interface ScopeOptions {
  /**
   * Optional name for the scope, useful for debugging and introspection.
   * If provided, `String(scope)` starts with `ServiceScope(name)`.
   */
  name?: string;
}

/**
 * Resolution operations shared by the provider and every scope.
 */
export interface ServiceResolver {
  /**
   * Resolves the last descriptor registered for the contract,
   * or returns `undefined` when nothing is registered.
   */
  get<T>(contract: Contract<T>): T | undefined;

  /**
   * Like `get`, but a missing registration is a usage error.
   *
   * @throws MissingRequiredServiceError when no descriptor targets the contract.
   */
  getRequired<T>(contract: Contract<T>): T;

  /**
   * Resolves every descriptor registered for the contract, in registration order.
   * Each descriptor follows its own lifetime.
   */
  getAll<T>(contract: Contract<T>): T[];

  /**
   * Creates an independent scope bound to the same provider.
   * Scoped instances are never shared between scopes, nor with the provider's own root scope.
   */
  createScope(options?: ScopeOptions): IServiceScope;
}

/**
 * A bounded resolution context with its own cache of scoped instances.
 */
export interface IServiceScope extends ServiceResolver {
  /** Optional scope name, from `ScopeOptions`. */
  readonly name: string | undefined;

  /** Whether `dispose()` has been called. */
  readonly disposed: boolean;

  /**
   * Calls `onDestroy()` on every scoped instance created by this scope,
   * in reverse creation order, then releases them.
   */
  dispose(): Promise<void>;
}

/**
 * Serializable view of a provider or scope.
 */
export interface ScopeGraph {
  /** Optional name of the scope. */
  name?: string;
  /** One entry per descriptor, in registration order. */
  services: ServiceInfo[];
}

/**
 * Metadata about a single descriptor as seen from one resolution context.
 */
export interface ServiceInfo {
  /** Name of the contract the descriptor targets. */
  contract: string;
  /** Name of the implementation. */
  implementation: string;
  lifetime: Lifetime;
  /** Declared dependencies, as `Contract (cardinality)` pairs. */
  dependencies: { contract: string; cardinality: Cardinality }[];
  /** Whether an instance is cached for this descriptor in this context. Always false for transients. */
  resolved: boolean;
}
