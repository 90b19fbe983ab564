import type { Contract } from './contract.js';
import type { ServiceDescriptor } from './descriptor.js';

const NONE: readonly ServiceDescriptor[] = Object.freeze([]);

/**
 * Read-only, insertion-ordered snapshot of descriptors with a per-contract index.
 * Built once from a collection; later changes to the collection do not reach it.
 */
export class ServiceRegistry implements Iterable<ServiceDescriptor> {
  private readonly descriptors: readonly ServiceDescriptor[];
  private readonly index = new Map<Contract<unknown>, ServiceDescriptor[]>();

  constructor(descriptors: Iterable<ServiceDescriptor>) {
    this.descriptors = Object.freeze([...descriptors]);
    for (const descriptor of this.descriptors) {
      const list = this.index.get(descriptor.contract);
      if (list) list.push(descriptor);
      else this.index.set(descriptor.contract, [descriptor]);
    }
  }

  has(contract: Contract<unknown>): boolean {
    return this.index.has(contract);
  }

  /** Descriptors registered for the contract, in registration order. */
  descriptorsOf<T>(contract: Contract<T>): readonly ServiceDescriptor<T>[] {
    // Entries are indexed by their own contract, so every descriptor under `contract` is a ServiceDescriptor<T>.
    return (this.index.get(contract) ?? NONE) as readonly ServiceDescriptor<T>[];
  }

  /** The last descriptor registered for the contract: the one single-instance lookups use. */
  lastOf<T>(contract: Contract<T>): ServiceDescriptor<T> | undefined {
    const list = this.descriptorsOf(contract);
    return list[list.length - 1];
  }

  /** Distinct contracts in first-registration order. */
  contracts(): Contract<unknown>[] {
    return [...this.index.keys()];
  }

  [Symbol.iterator](): Iterator<ServiceDescriptor> {
    return this.descriptors[Symbol.iterator]();
  }
}
