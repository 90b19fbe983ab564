/**
 * lifetime-di — dependency injection with build-time graph validation.
 * Contracts are typed keys, descriptors declare what they need, and the provider
 * enforces transient, singleton and scoped lifetimes.
 *
 * @example
 * ```typescript
 * import { ServiceCollection, contract, exactlyOne, scoped, singleton } from 'lifetime-di';
 *
 * const Logger = contract<Logger>('Logger');
 * const UnitOfWork = contract<UnitOfWork>('UnitOfWork');
 *
 * const provider = new ServiceCollection()
 *   .add(singleton(Logger).from(() => new ConsoleLogger()))
 *   .add(scoped(UnitOfWork).dependsOn(exactlyOne(Logger)).from((r) => new PgUnitOfWork(r.getRequired(Logger))))
 *   .build(); // throws ValidationError if the graph is broken
 *
 * await provider.withScope((scope) => scope.getRequired(UnitOfWork).commit());
 * ```
 *
 * @packageDocumentation
 */

// Core API
export { Contract, contract } from './domain/contract.js';
export { exactlyOne, zeroOrOne, zeroOrMore } from './domain/dependency.js';
export { ServiceDescriptor } from './domain/descriptor.js';
export { ServiceRegistry } from './domain/registry.js';
export { validate } from './domain/validation.js';
export { ServiceCollection } from './application/service-collection.js';
export { ServiceProvider } from './application/service-provider.js';
export { ServiceScope } from './application/service-scope.js';
export { Lazy, lazy } from './application/lazy.js';
export {
  DescriptorBuilder,
  existing,
  scoped,
  singleton,
  transient,
} from './application/descriptor-builder.js';

// Types
export type {
  Cardinality,
  Factory,
  IServiceScope,
  Lifetime,
  ScopeGraph,
  ScopeOptions,
  ServiceDependency,
  ServiceInfo,
  ServiceResolver,
} from './domain/types.js';
export type { ServiceDescriptorInit } from './domain/descriptor.js';

// Lifecycle interfaces
export type { OnDestroy } from './domain/lifecycle.js';

// Errors (classes, so exported as values)
export {
  ContainerError,
  ValidationError,
  UnregisteredDependencyIssue,
  CircularDependencyIssue,
  CapturedDependencyIssue,
  MissingRequiredServiceError,
  CircularResolutionError,
  UndefinedReturnError,
  FactoryError,
  ScopeDisposedError,
} from './domain/errors.js';
export type { ValidationIssue } from './domain/errors.js';
