import type { ScopeGraph, ServiceInfo } from '../domain/types.js';
import type { Resolver } from '../infrastructure/resolver.js';

/**
 * Builds introspection data from a Resolver instance.
 * Provides `inspect()` and `toString()` for the provider and its scopes.
 */
export class Introspection {
  constructor(
    private readonly resolver: Resolver,
    private readonly name?: string,
  ) {}

  /**
   * Returns every registered descriptor as a serializable JSON object,
   * with its resolution state as seen from this context.
   */
  inspect(): ScopeGraph {
    const services: ServiceInfo[] = [];
    for (const descriptor of this.resolver.registry) {
      services.push({
        contract: descriptor.contract.name,
        implementation: descriptor.implementation,
        lifetime: descriptor.lifetime,
        dependencies: descriptor.dependencies.map((d) => ({
          contract: d.contract.name,
          cardinality: d.cardinality,
        })),
        resolved: this.resolver.isResolved(descriptor),
      });
    }
    return this.name ? { name: this.name, services } : { services };
  }

  /**
   * Returns a human-readable representation, e.g.
   * `ServiceScope(request) { Logger (singleton, resolved), Handler -> [Logger] (scoped, pending) }`.
   */
  toString(): string {
    const parts: string[] = [];
    for (const service of this.inspect().services) {
      const deps = service.dependencies.map((d) => d.contract);
      const depsStr = deps.length > 0 ? ` -> [${deps.join(', ')}]` : '';
      const status = service.resolved ? 'resolved' : 'pending';
      parts.push(`${service.contract}${depsStr} (${service.lifetime}, ${status})`);
    }
    return `${this.resolver.label} { ${parts.join(', ')} }`;
  }
}
