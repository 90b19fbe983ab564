/**
 * A stable key naming a capability a consumer asks for.
 * Contracts compare by identity; `name` is only used for messages and introspection.
 * The type parameter never exists at runtime, it types every resolution call.
 *
 * @example
 * ```typescript
 * interface Logger { log(msg: string): void }
 * const Logger = contract<Logger>('Logger');
 *
 * provider.getRequired(Logger); // Logger
 * ```
 */
export class Contract<T> {
  private declare readonly type: T;

  constructor(readonly name: string) {
    Object.freeze(this);
  }

  toString(): string {
    return this.name;
  }
}

/** Creates a new contract. Two calls with the same name produce two distinct contracts. */
export function contract<T>(name: string): Contract<T> {
  return new Contract<T>(name);
}
