import { hasOnDestroy } from '../domain/lifecycle.js';
import type { InstanceCache } from '../infrastructure/instance-cache.js';

/**
 * Use Case: dispose cached instances, each cache in reverse creation order.
 * Calls onDestroy() on each, collects errors, clears every cache.
 */
export class Disposer {
  constructor(private readonly caches: readonly InstanceCache[]) {}

  async dispose(): Promise<void> {
    const errors: unknown[] = [];

    for (const cache of this.caches) {
      const instances = cache.values().reverse();
      for (const instance of instances) {
        if (hasOnDestroy(instance)) {
          try {
            await instance.onDestroy();
          } catch (error) {
            errors.push(error);
          }
        }
      }
      cache.clear();
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `dispose() encountered ${errors.length} errors`);
    }
  }
}
