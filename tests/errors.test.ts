import { describe, expect, it } from 'vitest';
import {
  CircularResolutionError,
  ContainerError,
  FactoryError,
  MissingRequiredServiceError,
  ScopeDisposedError,
  ServiceCollection,
  UndefinedReturnError,
  ValidationError,
  contract,
  exactlyOne,
  singleton,
  transient,
} from '../src/index.js';

function catchError<E extends Error>(type: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error('expected the call to throw');
}

describe('errors', () => {
  describe('MissingRequiredServiceError', () => {
    const UserRepository = contract<string>('UserRepository');
    const Logger = contract<string>('Logger');

    it('is thrown by getRequired for an unregistered contract', () => {
      const provider = new ServiceCollection().build();

      expect(() => provider.getRequired(Logger)).toThrow(MissingRequiredServiceError);
    });

    it('suggests a similarly named contract', () => {
      const provider = new ServiceCollection()
        .add(singleton(UserRepository).from(() => 'repo'))
        .add(singleton(Logger).from(() => 'log'))
        .build();

      const err = catchError(MissingRequiredServiceError, () => provider.getRequired(contract<string>('UserRepo')));

      expect(err.message).toBe("No service is registered for 'UserRepo'.\n\nDid you mean 'UserRepository'?");
      expect(err.hint).toContain("Did you mean 'UserRepository'?");
      expect(err.details.registered).toEqual(['UserRepository', 'Logger']);
      expect(err.details.suggestion).toBe('UserRepository');
    });

    it('omits the suggestion when nothing is close', () => {
      const provider = new ServiceCollection().add(singleton(UserRepository).from(() => 'repo')).build();

      const err = catchError(MissingRequiredServiceError, () => provider.getRequired(contract<string>('Zebra')));

      expect(err.details.suggestion).toBeUndefined();
      expect(err.hint.startsWith('Register it before building')).toBe(true);
    });

    it('shows the resolution chain for nested lookups', () => {
      const Service = contract<string>('Service');
      const Missing = contract<string>('Missing');
      const provider = new ServiceCollection()
        .add(transient(Service).from((r) => r.getRequired(Missing)))
        .build();

      const err = catchError(MissingRequiredServiceError, () => provider.getRequired(Service));

      expect(err.message).toBe(
        "No service is registered for 'Missing'.\n\nResolution chain: Service -> Missing (not registered)",
      );
    });

    it('get() returns undefined instead of throwing', () => {
      const provider = new ServiceCollection().build();

      expect(provider.get(Logger)).toBeUndefined();
    });
  });

  describe('FactoryError', () => {
    const Database = contract<string>('Database');
    const Service = contract<string>('Service');

    it('wraps errors thrown by a factory', () => {
      const original = new Error('Connection refused');
      const provider = new ServiceCollection()
        .add(
          singleton(Database).from(() => {
            throw original;
          }),
        )
        .build();

      const err = catchError(FactoryError, () => provider.getRequired(Database));

      expect(err).toBeInstanceOf(FactoryError);
      expect(err.message).toBe('Factory for \'Database\' threw an error: "Connection refused"');
      expect(err.originalError).toBe(original);
      expect(err.cause).toBe(original);
      expect(err.details.chain).toEqual(['Database']);
    });

    it('shows the chain and is not wrapped again by outer factories', () => {
      const provider = new ServiceCollection()
        .add(
          singleton(Database).from(() => {
            throw new Error('boom');
          }),
        )
        .add(
          transient(Service)
            .dependsOn(exactlyOne(Database))
            .from((r) => `service(${r.getRequired(Database)})`),
        )
        .build();

      const err = catchError(FactoryError, () => provider.getRequired(Service));

      expect(err).toBeInstanceOf(FactoryError);
      expect(err.message).toBe(
        'Factory for \'Database\' threw an error: "boom"\n\nResolution chain: Service -> Database (factory threw)',
      );
    });

    it('stringifies non-Error throws', () => {
      const provider = new ServiceCollection()
        .add(
          singleton(Database).from(() => {
            throw 'plain string';
          }),
        )
        .build();

      const err = catchError(FactoryError, () => provider.getRequired(Database));

      expect(err.details.originalError).toBe('plain string');
    });
  });

  describe('UndefinedReturnError', () => {
    it('is thrown when a factory returns undefined', () => {
      const Nothing = contract<string | undefined>('Nothing');
      const provider = new ServiceCollection().add(transient(Nothing).from(() => undefined)).build();

      const err = catchError(UndefinedReturnError, () => provider.get(Nothing));

      expect(err.message).toBe("Factory for 'Nothing' returned undefined.");
      expect(err.hint).toContain('return statement');
    });
  });

  describe('CircularResolutionError', () => {
    it('catches cycles among undeclared dependencies at resolution time', () => {
      const A = contract<string>('A');
      const B = contract<string>('B');
      const provider = new ServiceCollection()
        .add(transient(A).from((r) => `a(${r.getRequired(B)})`))
        .add(transient(B).from((r) => `b(${r.getRequired(A)})`))
        .build();

      const err = catchError(CircularResolutionError, () => provider.getRequired(A));

      expect(err).toBeInstanceOf(CircularResolutionError);
      expect(err.message).toBe("Circular resolution of 'A'.\n\nCycle: A -> B -> A");
      expect(err.details.cycle).toEqual(['A', 'B', 'A']);
    });

    it('recovers after a cycle so later resolutions succeed', () => {
      const Self = contract<string>('Self');
      const Plain = contract<string>('Plain');
      const provider = new ServiceCollection()
        .add(singleton(Self).from((r) => r.getRequired(Self)))
        .add(singleton(Plain).from(() => 'plain'))
        .build();

      expect(() => provider.getRequired(Self)).toThrow(CircularResolutionError);
      expect(provider.getRequired(Plain)).toBe('plain');
    });
  });

  describe('ValidationError', () => {
    it('carries structured details for every issue', () => {
      const A = contract<string>('A');
      const Missing = contract<string>('Missing');
      const services = new ServiceCollection().add(
        transient(A).dependsOn(exactlyOne(Missing)).from(() => 'a'),
      );

      const err = catchError(ValidationError, () => services.build());

      expect(err).toBeInstanceOf(ValidationError);
      expect(err.message).toBe(
        "1 issue found in the service configuration:\n  - 'A' depends on 'Missing', which is not registered.",
      );
      expect(err.details).toEqual({
        issues: [{ type: 'unregistered_dependency', consumer: 'A', dependency: 'Missing' }],
      });
      expect(err.issues[0].hint).toContain('zeroOrOne(Missing)');
    });
  });

  describe('ContainerError', () => {
    it('is the base class of every thrown error, named after the subclass', () => {
      const err = new ScopeDisposedError('ServiceScope', 'Logger');

      expect(err).toBeInstanceOf(ContainerError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('ScopeDisposedError');
      expect(err.details).toEqual({ scope: 'ServiceScope', contract: 'Logger' });
    });
  });
});
