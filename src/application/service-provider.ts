import type { Contract } from '../domain/contract.js';
import type { ServiceRegistry } from '../domain/registry.js';
import type { ScopeGraph, ScopeOptions, ServiceResolver } from '../domain/types.js';
import { Resolver } from '../infrastructure/resolver.js';
import { Disposer } from './disposer.js';
import { Introspection } from './introspection.js';
import { ServiceScope } from './service-scope.js';

/**
 * Resolves services from a validated registry.
 * Owns the singleton cache and acts as its own root scope for scoped services;
 * scopes created from it never share scoped instances with it.
 *
 * @example
 * ```typescript
 * const provider = services.build();
 *
 * provider.getRequired(Logger);   // singleton, same instance every time
 * provider.getAll(Plugin);        // every Plugin, in registration order
 *
 * await provider.withScope((scope) => scope.getRequired(RequestHandler).handle(req));
 * ```
 */
export class ServiceProvider implements ServiceResolver {
  private readonly resolver: Resolver;
  private readonly introspection: Introspection;

  constructor(registry: ServiceRegistry) {
    this.resolver = new Resolver({ registry, context: this, label: 'ServiceProvider' });
    this.introspection = new Introspection(this.resolver);
  }

  get disposed(): boolean {
    return this.resolver.isDisposed;
  }

  get<T>(contract: Contract<T>): T | undefined {
    return this.resolver.get(contract);
  }

  getRequired<T>(contract: Contract<T>): T {
    return this.resolver.getRequired(contract);
  }

  getAll<T>(contract: Contract<T>): T[] {
    return this.resolver.getAll(contract);
  }

  createScope(options?: ScopeOptions): ServiceScope {
    return new ServiceScope(this.resolver, options);
  }

  /**
   * Runs `fn` inside a fresh scope and disposes the scope once `fn` settles,
   * whether it returned or threw.
   * If `fn` throws and disposal fails too, rejects with an `AggregateError`
   * whose `errors` are `[fnError, disposeError]`.
   */
  async withScope<R>(fn: (scope: ServiceScope) => R | Promise<R>, options?: ScopeOptions): Promise<R> {
    const scope = this.createScope(options);
    let result: R;
    try {
      result = await fn(scope);
    } catch (error) {
      try {
        await scope.dispose();
      } catch (disposeError) {
        throw new AggregateError(
          [error, disposeError],
          'withScope() callback failed and its scope could not be disposed',
        );
      }
      throw error;
    }
    await scope.dispose();
    return result;
  }

  /**
   * Returns the registered services and which of them the provider has cached.
   */
  inspect(): ScopeGraph {
    return this.introspection.inspect();
  }

  /**
   * Disposes the provider's root-scope instances, then its singletons,
   * calling `onDestroy()` on each in reverse creation order.
   * Scopes created from the provider must be disposed on their own.
   * Resilient: continues calling other hooks even if one fails.
   */
  async dispose(): Promise<void> {
    if (this.resolver.isDisposed) return;
    this.resolver.markDisposed();
    await new Disposer(this.resolver.ownedCaches()).dispose();
  }

  toString(): string {
    return this.introspection.toString();
  }
}
