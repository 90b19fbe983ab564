import type { ServiceDescriptor } from '../domain/descriptor.js';

interface Frame {
  readonly descriptor: ServiceDescriptor;
  readonly owner: object;
}

/**
 * Tracks which descriptors are currently being constructed, in call order.
 * One detector is shared by a provider and all of its scopes, since resolution
 * is synchronous and a single call chain can cross from a scope into the provider.
 *
 * A frame is keyed by descriptor and owner: the context whose cache receives the
 * instance. Resolving a scoped descriptor again in another scope is not a cycle.
 * enter/leave must be balanced (use try/finally).
 */
export class CycleDetector {
  private readonly resolving: Frame[] = [];

  enter(descriptor: ServiceDescriptor, owner: object): void {
    this.resolving.push({ descriptor, owner });
  }

  leave(descriptor: ServiceDescriptor, owner: object): void {
    const index = this.indexOf(descriptor, owner);
    if (index !== -1) this.resolving.splice(index, 1);
  }

  isResolving(descriptor: ServiceDescriptor, owner: object): boolean {
    return this.indexOf(descriptor, owner) !== -1;
  }

  /** Contract names of the descriptors under construction, outermost first. */
  chain(): string[] {
    return this.resolving.map((f) => f.descriptor.contract.name);
  }

  private indexOf(descriptor: ServiceDescriptor, owner: object): number {
    for (let i = this.resolving.length - 1; i >= 0; i--) {
      const frame = this.resolving[i];
      if (frame.descriptor === descriptor && frame.owner === owner) return i;
    }
    return -1;
  }
}
