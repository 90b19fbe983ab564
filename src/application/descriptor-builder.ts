import type { Contract } from '../domain/contract.js';
import { ServiceDescriptor } from '../domain/descriptor.js';
import type { Factory, Lifetime, ServiceDependency } from '../domain/types.js';

/**
 * Fluent helper that accumulates the parts of a descriptor and finishes with `from()`.
 * Each call returns a new builder, so a partially configured builder can be reused.
 */
export class DescriptorBuilder<T> {
  constructor(
    private readonly contract: Contract<T>,
    private readonly lifetime: Lifetime,
    private readonly implementation?: string,
    private readonly dependencies: readonly ServiceDependency[] = [],
  ) {}

  /** Names the implementation, e.g. `'PgUserRepository'`. Defaults to the contract name. */
  as(implementation: string): DescriptorBuilder<T> {
    return new DescriptorBuilder(this.contract, this.lifetime, implementation, this.dependencies);
  }

  /** Declares dependencies so the validator can check them at build time. */
  dependsOn(...dependencies: ServiceDependency[]): DescriptorBuilder<T> {
    return new DescriptorBuilder(this.contract, this.lifetime, this.implementation, [
      ...this.dependencies,
      ...dependencies,
    ]);
  }

  /** Finishes the descriptor with the factory that builds instances. */
  from(factory: Factory<T>): ServiceDescriptor<T> {
    return new ServiceDescriptor({
      contract: this.contract,
      lifetime: this.lifetime,
      implementation: this.implementation,
      dependencies: this.dependencies,
      factory,
    });
  }
}

/**
 * Starts a singleton descriptor: one instance per provider.
 *
 * @example
 * ```typescript
 * services.add(singleton(Logger).as('ConsoleLogger').from(() => new ConsoleLogger()));
 * ```
 */
export function singleton<T>(contract: Contract<T>): DescriptorBuilder<T> {
  return new DescriptorBuilder(contract, 'singleton');
}

/** Starts a scoped descriptor: one instance per scope. */
export function scoped<T>(contract: Contract<T>): DescriptorBuilder<T> {
  return new DescriptorBuilder(contract, 'scoped');
}

/** Starts a transient descriptor: a new instance on every resolution. */
export function transient<T>(contract: Contract<T>): DescriptorBuilder<T> {
  return new DescriptorBuilder(contract, 'transient');
}

/**
 * Registers an instance built outside the container as a singleton.
 *
 * @example
 * ```typescript
 * services.add(existing(Config, loadConfig()));
 * ```
 */
export function existing<T>(contract: Contract<T>, instance: T): ServiceDescriptor<T> {
  return singleton(contract).from(() => instance);
}
