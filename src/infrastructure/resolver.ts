import type { Contract } from '../domain/contract.js';
import type { ServiceDescriptor } from '../domain/descriptor.js';
import {
  CircularResolutionError,
  ContainerError,
  FactoryError,
  MissingRequiredServiceError,
  ScopeDisposedError,
  UndefinedReturnError,
} from '../domain/errors.js';
import type { ServiceRegistry } from '../domain/registry.js';
import type { ServiceResolver } from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { CycleDetector } from './cycle-detector.js';
import { InstanceCache } from './instance-cache.js';

export interface ResolverDeps {
  registry: ServiceRegistry;
  /** Passed to every factory this resolver invokes. */
  context: ServiceResolver;
  /** Used in error messages, e.g. `ServiceScope(request)`. */
  label: string;
  /** Root resolver that owns the singleton cache. Omit for the root itself. */
  parent?: Resolver;
}

/**
 * Core resolver — lifetime-aware construction and caching for one resolution context.
 * The root resolver belongs to the provider and owns the singleton cache; each scope
 * gets a child resolver that keeps its own scoped cache and defers singletons to the root.
 */
export class Resolver {
  readonly registry: ServiceRegistry;
  readonly root: Resolver;
  readonly label: string;

  private readonly context: ServiceResolver;
  private readonly scoped = new InstanceCache();
  private readonly singletons: InstanceCache;
  private readonly cycleDetector: CycleDetector;
  private readonly validator = new Validator();
  private disposed = false;

  constructor(deps: ResolverDeps) {
    this.registry = deps.registry;
    this.context = deps.context;
    this.label = deps.label;
    this.root = deps.parent?.root ?? this;
    this.singletons = deps.parent ? deps.parent.singletons : new InstanceCache();
    this.cycleDetector = deps.parent ? deps.parent.cycleDetector : new CycleDetector();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get<T>(contract: Contract<T>): T | undefined {
    this.assertActive(contract);
    const descriptor = this.registry.lastOf(contract);
    return descriptor ? this.resolve(descriptor) : undefined;
  }

  getRequired<T>(contract: Contract<T>): T {
    this.assertActive(contract);
    const descriptor = this.registry.lastOf(contract);
    if (!descriptor) {
      const registered = this.registry.contracts().map((c) => c.name);
      const suggestion = this.validator.suggestName(contract.name, registered);
      throw new MissingRequiredServiceError(contract.name, this.cycleDetector.chain(), registered, suggestion);
    }
    return this.resolve(descriptor);
  }

  getAll<T>(contract: Contract<T>): T[] {
    this.assertActive(contract);
    return this.registry.descriptorsOf(contract).map((descriptor) => this.resolve(descriptor));
  }

  resolve<T>(descriptor: ServiceDescriptor<T>): T {
    switch (descriptor.lifetime) {
      case 'transient':
        return this.construct(descriptor);
      case 'scoped':
        return this.scoped.getOrCreate(descriptor, () => this.construct(descriptor));
      case 'singleton':
        return this.singletons.getOrCreate(descriptor, () => this.root.construct(descriptor));
    }
  }

  /** Whether an instance of the descriptor is cached where this context would look for it. */
  isResolved(descriptor: ServiceDescriptor): boolean {
    switch (descriptor.lifetime) {
      case 'transient':
        return false;
      case 'scoped':
        return this.scoped.has(descriptor);
      case 'singleton':
        return this.singletons.has(descriptor);
    }
  }

  /**
   * Caches this resolver owns, in disposal order: its scoped cache, then,
   * for the root only, the singleton cache.
   */
  ownedCaches(): InstanceCache[] {
    return this.root === this ? [this.scoped, this.singletons] : [this.scoped];
  }

  markDisposed(): void {
    this.disposed = true;
  }

  private construct<T>(descriptor: ServiceDescriptor<T>): T {
    const name = descriptor.contract.name;
    // Scoped instances land in this context's cache; everything else is keyed provider-wide.
    const owner = descriptor.lifetime === 'scoped' ? this : this.root;
    if (this.cycleDetector.isResolving(descriptor, owner)) {
      throw new CircularResolutionError(name, this.cycleDetector.chain());
    }

    this.cycleDetector.enter(descriptor, owner);
    const chain = this.cycleDetector.chain();

    try {
      const instance = descriptor.factory(this.context);
      if (instance === undefined) {
        throw new UndefinedReturnError(name, chain);
      }
      return instance;
    } catch (error) {
      if (error instanceof ContainerError) throw error;
      throw new FactoryError(name, chain, error);
    } finally {
      this.cycleDetector.leave(descriptor, owner);
    }
  }

  private assertActive(contract: Contract<unknown>): void {
    if (this.disposed) throw new ScopeDisposedError(this.label, contract.name);
    if (this.root.disposed) throw new ScopeDisposedError(this.root.label, contract.name);
  }
}
