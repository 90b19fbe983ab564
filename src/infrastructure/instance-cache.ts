import type { ServiceDescriptor } from '../domain/descriptor.js';

/**
 * Insertion-ordered store of constructed instances, one entry per descriptor.
 * Entries are only added, never replaced, until `clear()`.
 */
export class InstanceCache {
  private readonly entries = new Map<ServiceDescriptor, unknown>();

  has(descriptor: ServiceDescriptor): boolean {
    return this.entries.has(descriptor);
  }

  /**
   * Returns the cached instance for the descriptor, or stores and returns `create()`.
   * If an entry appeared while `create` ran, that entry wins and the new value is dropped.
   */
  getOrCreate<T>(descriptor: ServiceDescriptor<T>, create: () => T): T {
    // Only `getOrCreate` writes, keyed by the descriptor that produced the value.
    if (this.entries.has(descriptor)) return this.entries.get(descriptor) as T;

    const instance = create();
    if (this.entries.has(descriptor)) return this.entries.get(descriptor) as T;

    this.entries.set(descriptor, instance);
    return instance;
  }

  /** Cached instances in creation order. */
  values(): unknown[] {
    return [...this.entries.values()];
  }

  clear(): void {
    this.entries.clear();
  }
}
