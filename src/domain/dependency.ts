import type { Contract } from './contract.js';
import type { Cardinality, ServiceDependency } from './types.js';

function declare<T, C extends Cardinality>(contract: Contract<T>, cardinality: C): ServiceDependency<T, C> {
  const dependency: ServiceDependency<T, C> = { contract, cardinality };
  return Object.freeze(dependency);
}

/** Declares a dependency that must resolve to exactly one instance. */
export function exactlyOne<T>(contract: Contract<T>): ServiceDependency<T, 'exactly-one'> {
  return declare(contract, 'exactly-one');
}

/** Declares an optional dependency. A missing registration is not a validation issue. */
export function zeroOrOne<T>(contract: Contract<T>): ServiceDependency<T, 'zero-or-one'> {
  return declare(contract, 'zero-or-one');
}

/** Declares a dependency on every registration of a contract, possibly none. */
export function zeroOrMore<T>(contract: Contract<T>): ServiceDependency<T, 'zero-or-more'> {
  return declare(contract, 'zero-or-more');
}
