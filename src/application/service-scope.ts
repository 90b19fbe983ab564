import type { Contract } from '../domain/contract.js';
import type { IServiceScope, ScopeGraph, ScopeOptions } from '../domain/types.js';
import { Resolver } from '../infrastructure/resolver.js';
import { Disposer } from './disposer.js';
import { Introspection } from './introspection.js';

/**
 * A bounded resolution context with its own cache of scoped instances.
 * Singletons still come from the provider it was created from.
 *
 * @example
 * ```typescript
 * const scope = provider.createScope({ name: 'request' });
 * try {
 *   scope.getRequired(UnitOfWork); // one per scope
 * } finally {
 *   await scope.dispose();
 * }
 * ```
 */
export class ServiceScope implements IServiceScope {
  readonly name: string | undefined;

  private readonly resolver: Resolver;
  private readonly introspection: Introspection;

  /** @internal Use `provider.createScope()`. */
  constructor(parent: Resolver, options?: ScopeOptions) {
    this.name = options?.name;
    this.resolver = new Resolver({
      registry: parent.registry,
      context: this,
      label: this.name ? `ServiceScope(${this.name})` : 'ServiceScope',
      parent,
    });
    this.introspection = new Introspection(this.resolver, this.name);
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

  /** Creates a sibling scope bound to the same provider. Nothing scoped is shared with this one. */
  createScope(options?: ScopeOptions): ServiceScope {
    return new ServiceScope(this.resolver.root, options);
  }

  inspect(): ScopeGraph {
    return this.introspection.inspect();
  }

  async dispose(): Promise<void> {
    if (this.resolver.isDisposed) return;
    this.resolver.markDisposed();
    await new Disposer(this.resolver.ownedCaches()).dispose();
  }

  toString(): string {
    return this.introspection.toString();
  }
}
