import type { Contract } from './contract.js';
import type { ServiceDescriptor } from './descriptor.js';
import type { ValidationIssue } from './errors.js';
import {
  CapturedDependencyIssue,
  CircularDependencyIssue,
  UnregisteredDependencyIssue,
  ValidationError,
} from './errors.js';
import { ServiceRegistry } from './registry.js';

type Color = 'in-progress' | 'done';

/**
 * Static analysis of declared dependencies.
 * Never fails fast: every check runs over the whole registry and all issues are returned.
 *
 * @example
 * ```typescript
 * const issues = new Validator().validate(registry);
 * // [UnregisteredDependencyIssue, CircularDependencyIssue, ...]
 * ```
 */
export class Validator {
  validate(registry: ServiceRegistry): ValidationIssue[] {
    return [
      ...this.findUnregistered(registry),
      ...this.findCycles(registry),
      ...this.findCaptured(registry),
    ];
  }

  /**
   * Finds the closest registered name to a missing one using Levenshtein distance.
   * Returns `undefined` unless the match is at least 50% similar.
   *
   * @example
   * ```typescript
   * validator.suggestName('UserRepo', ['UserRepository', 'Logger']);
   * // 'UserRepository'
   * ```
   */
  suggestName(name: string, registered: string[]): string | undefined {
    let bestMatch: string | undefined;
    let bestDistance = Infinity;

    for (const candidate of registered) {
      const distance = levenshtein(name, candidate);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestMatch = candidate;
      }
    }

    if (!bestMatch) return undefined;
    const maxLen = Math.max(name.length, bestMatch.length);
    const similarity = 1 - bestDistance / maxLen;
    return similarity >= 0.5 ? bestMatch : undefined;
  }

  /** Optional cardinalities tolerate absence, so only `exactly-one` declarations are checked. */
  private findUnregistered(registry: ServiceRegistry): UnregisteredDependencyIssue[] {
    const issues: UnregisteredDependencyIssue[] = [];
    const reported = new PairSet();

    for (const descriptor of registry) {
      for (const dependency of descriptor.dependencies) {
        if (dependency.cardinality !== 'exactly-one' || registry.has(dependency.contract)) continue;
        if (reported.add(descriptor.contract, dependency.contract)) {
          issues.push(new UnregisteredDependencyIssue(descriptor.contract.name, dependency.contract.name));
        }
      }
    }

    return issues;
  }

  /**
   * Three-color DFS over contracts, with an explicit stack so long chains never
   * exhaust the call stack. Every edge into an in-progress contract closes a cycle,
   * reported as the stack slice from that contract back to itself.
   */
  private findCycles(registry: ServiceRegistry): CircularDependencyIssue[] {
    const edges = dependencyEdges(registry);
    const colors = new Map<Contract<unknown>, Color>();
    const issues: CircularDependencyIssue[] = [];

    for (const start of edges.keys()) {
      if (colors.has(start)) continue;

      const stack: { node: Contract<unknown>; targets: Iterator<Contract<unknown>> }[] = [];
      const open = (node: Contract<unknown>): void => {
        colors.set(node, 'in-progress');
        stack.push({ node, targets: (edges.get(node) ?? new Set<Contract<unknown>>()).values() });
      };
      open(start);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const step = frame.targets.next();
        if (step.done) {
          stack.pop();
          colors.set(frame.node, 'done');
          continue;
        }

        const next = step.value;
        const color = colors.get(next);
        if (color === 'in-progress') {
          const path = stack.map((f) => f.node);
          const cycle = [...path.slice(path.indexOf(next)), next];
          issues.push(new CircularDependencyIssue(cycle.map((c) => c.name)));
        } else if (color === undefined) {
          open(next);
        }
      }
    }

    return issues;
  }

  /**
   * Walks from each singleton through its declared dependencies, continuing only
   * through other singletons. Any scoped descriptor reached is captured.
   * Transients end the walk, so a singleton holding a transient that holds a
   * scoped service is not reported.
   */
  private findCaptured(registry: ServiceRegistry): CapturedDependencyIssue[] {
    const issues: CapturedDependencyIssue[] = [];
    const reported = new PairSet();

    for (const singleton of registry) {
      if (singleton.lifetime !== 'singleton') continue;

      const visited = new Set<Contract<unknown>>();
      const pending: ServiceDescriptor[] = [singleton];
      for (let i = 0; i < pending.length; i++) {
        for (const { contract } of pending[i].dependencies) {
          if (visited.has(contract)) continue;
          visited.add(contract);

          for (const dependency of registry.descriptorsOf(contract)) {
            if (dependency.lifetime === 'scoped') {
              if (reported.add(singleton.contract, contract)) {
                issues.push(new CapturedDependencyIssue(singleton.contract.name, contract.name));
              }
            } else if (dependency.lifetime === 'singleton') {
              pending.push(dependency);
            }
          }
        }
      }
    }

    return issues;
  }
}

const validator = new Validator();

/**
 * Validates an arbitrary set of descriptors without building a provider.
 * Returns the aggregated error, or `undefined` when the configuration is sound.
 *
 * @example
 * ```typescript
 * const error = validate(services);
 * if (error) for (const issue of error.issues) console.warn(issue.message);
 * ```
 */
export function validate(services: Iterable<ServiceDescriptor>): ValidationError | undefined {
  const registry = services instanceof ServiceRegistry ? services : new ServiceRegistry(services);
  const issues = validator.validate(registry);
  return issues.length > 0 ? new ValidationError(issues) : undefined;
}

/**
 * Contract -> declared dependency contracts, merged across every descriptor of the contract.
 * Contracts that only appear as dependencies are nodes without edges.
 */
function dependencyEdges(registry: ServiceRegistry): Map<Contract<unknown>, Set<Contract<unknown>>> {
  const edges = new Map<Contract<unknown>, Set<Contract<unknown>>>();
  for (const contract of registry.contracts()) edges.set(contract, new Set());

  for (const descriptor of registry) {
    const targets = edges.get(descriptor.contract) ?? new Set<Contract<unknown>>();
    for (const { contract } of descriptor.dependencies) {
      targets.add(contract);
      if (!edges.has(contract)) edges.set(contract, new Set());
    }
    edges.set(descriptor.contract, targets);
  }

  return edges;
}

/** Set of (from, to) contract pairs; `add` reports whether the pair is new. */
class PairSet {
  private readonly pairs = new Map<Contract<unknown>, Set<Contract<unknown>>>();

  add(from: Contract<unknown>, to: Contract<unknown>): boolean {
    const targets = this.pairs.get(from) ?? new Set<Contract<unknown>>();
    if (targets.has(to)) return false;
    targets.add(to);
    this.pairs.set(from, targets);
    return true;
  }
}

/**
 * Levenshtein distance between two strings.
 * Used for fuzzy contract suggestion in error messages.
 */
function levenshtein(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  let prev = new Array<number>(lb + 1);
  let curr = new Array<number>(lb + 1);

  for (let j = 0; j <= lb; j++) prev[j] = j;

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}
