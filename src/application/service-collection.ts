import type { Contract } from '../domain/contract.js';
import type { ServiceDescriptor } from '../domain/descriptor.js';
import { ServiceRegistry } from '../domain/registry.js';
import { validate } from '../domain/validation.js';
import { ServiceProvider } from './service-provider.js';

/**
 * Ordered, mutable list of descriptors used while configuring an application.
 * Registration order matters: `getAll` follows it, and single-instance lookups
 * use the last descriptor registered for a contract.
 *
 * @example
 * ```typescript
 * const provider = new ServiceCollection()
 *   .add(singleton(Logger).from(() => new ConsoleLogger()))
 *   .add(scoped(UnitOfWork).dependsOn(exactlyOne(Logger)).from((r) => new UnitOfWork(r.getRequired(Logger))))
 *   .build();
 * ```
 */
export class ServiceCollection implements Iterable<ServiceDescriptor> {
  private descriptors: ServiceDescriptor[] = [];

  get size(): number {
    return this.descriptors.length;
  }

  /** Appends the descriptor, even if its contract is already registered. */
  add<T>(descriptor: ServiceDescriptor<T>): this {
    this.descriptors.push(descriptor);
    return this;
  }

  /** Appends the descriptor only if no descriptor targets its contract yet. */
  tryAdd<T>(descriptor: ServiceDescriptor<T>): this {
    if (!this.has(descriptor.contract)) this.descriptors.push(descriptor);
    return this;
  }

  /**
   * Appends the descriptor unless one with the same contract and implementation exists.
   * Use it to contribute one more implementation of a multi-registration contract.
   */
  tryAddToAll<T>(descriptor: ServiceDescriptor<T>): this {
    const exists = this.descriptors.some(
      (d) => d.contract === descriptor.contract && d.implementation === descriptor.implementation,
    );
    if (!exists) this.descriptors.push(descriptor);
    return this;
  }

  /** Removes every descriptor for the contract, then appends this one. */
  replace<T>(descriptor: ServiceDescriptor<T>): this {
    return this.remove(descriptor.contract).add(descriptor);
  }

  /** Removes every descriptor for the contract. */
  remove(contract: Contract<unknown>): this {
    this.descriptors = this.descriptors.filter((d) => d.contract !== contract);
    return this;
  }

  has(contract: Contract<unknown>): boolean {
    return this.descriptors.some((d) => d.contract === contract);
  }

  /** Descriptors registered for the contract, in registration order. */
  descriptorsOf<T>(contract: Contract<T>): ServiceDescriptor<T>[] {
    return new ServiceRegistry(this.descriptors).descriptorsOf(contract).slice();
  }

  /**
   * Validates the declared dependency graph and returns a provider over a
   * snapshot of the current descriptors. Nothing is constructed here.
   *
   * @throws ValidationError listing every issue found, when validation fails.
   */
  build(): ServiceProvider {
    const registry = new ServiceRegistry(this.descriptors);
    const error = validate(registry);
    if (error) throw error;
    return new ServiceProvider(registry);
  }

  [Symbol.iterator](): Iterator<ServiceDescriptor> {
    return this.descriptors[Symbol.iterator]();
  }
}
