/**
 * Implement this interface (or just add an `onDestroy` method) to run
 * cleanup logic when the scope or provider that cached the instance is disposed.
 *
 * @example
 * ```typescript
 * class UnitOfWork implements OnDestroy {
 *   async onDestroy() { await this.rollbackIfOpen(); }
 * }
 * ```
 */
export interface OnDestroy {
  onDestroy(): void | Promise<void>;
}

/** Duck-type check: does the value have an `onDestroy` method? */
export function hasOnDestroy(value: unknown): value is OnDestroy {
  return (
    value !== null &&
    typeof value === 'object' &&
    'onDestroy' in value &&
    typeof value.onDestroy === 'function'
  );
}
