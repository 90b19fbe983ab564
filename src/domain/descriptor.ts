import type { Contract } from './contract.js';
import type { Factory, Lifetime, ServiceDependency } from './types.js';

/**
 * Everything needed to build a descriptor.
 * `implementation` defaults to the contract name.
 */
export interface ServiceDescriptorInit<T> {
  contract: Contract<T>;
  lifetime: Lifetime;
  factory: Factory<T>;
  implementation?: string;
  dependencies?: readonly ServiceDependency[];
}

/**
 * Immutable registration record: which contract it satisfies, how long
 * instances live, how to build one, and what it declares it needs.
 *
 * @example
 * ```typescript
 * const descriptor = new ServiceDescriptor({
 *   contract: Bar,
 *   implementation: 'BarImpl',
 *   lifetime: 'transient',
 *   factory: (r) => new BarImpl(r.getRequired(Foo)),
 *   dependencies: [exactlyOne(Foo)],
 * });
 * ```
 */
export class ServiceDescriptor<T = unknown> {
  readonly contract: Contract<T>;
  readonly implementation: string;
  readonly lifetime: Lifetime;
  readonly factory: Factory<T>;
  readonly dependencies: readonly ServiceDependency[];

  constructor(init: ServiceDescriptorInit<T>) {
    this.contract = init.contract;
    this.implementation = init.implementation ?? init.contract.name;
    this.lifetime = init.lifetime;
    this.factory = init.factory;
    this.dependencies = Object.freeze([...(init.dependencies ?? [])]);
    Object.freeze(this);
  }

  toString(): string {
    return this.implementation === this.contract.name
      ? `${this.contract.name} (${this.lifetime})`
      : `${this.contract.name} as ${this.implementation} (${this.lifetime})`;
  }
}
