import { describe, expect, it } from 'vitest';
import {
  Lazy,
  ServiceCollection,
  ValidationError,
  contract,
  exactlyOne,
  existing,
  lazy,
  scoped,
  singleton,
  transient,
  zeroOrMore,
  zeroOrOne,
} from '../src/index.js';
import type { OnDestroy, ServiceResolver } from '../src/index.js';

// === Domain interfaces ===
interface Config {
  readonly greeting: string;
}

interface Logger {
  log(message: string): void;
  readonly messages: string[];
}

interface UserRepository {
  findName(id: string): string;
}

interface RequestContext {
  readonly requestId: number;
}

interface AuditSink {
  record(event: string): void;
}

// === Implementations ===
class MemoryLogger implements Logger {
  readonly messages: string[] = [];

  log(message: string): void {
    this.messages.push(message);
  }
}

class InMemoryUserRepository implements UserRepository, OnDestroy {
  private readonly users = new Map([
    ['1', 'Alice'],
    ['2', 'Bob'],
  ]);

  constructor(
    private readonly ctx: RequestContext,
    private readonly logger: Logger,
  ) {}

  findName(id: string): string {
    this.logger.log(`[${this.ctx.requestId}] find ${id}`);
    const name = this.users.get(id);
    if (!name) throw new Error(`User ${id} not found`);
    return name;
  }

  onDestroy(): void {
    this.logger.log(`[${this.ctx.requestId}] repository closed`);
  }
}

class GreetingHandler {
  constructor(
    private readonly config: Config,
    private readonly users: UserRepository,
    private readonly audit: AuditSink[],
    private readonly cache: Lazy<Map<string, string> | undefined>,
  ) {}

  handle(id: string): string {
    const cached = this.cache.value?.get(id);
    if (cached) return cached;
    const reply = `${this.config.greeting}, ${this.users.findName(id)}`;
    for (const sink of this.audit) sink.record(reply);
    return reply;
  }
}

const ConfigKey = contract<Config>('Config');
const LoggerKey = contract<Logger>('Logger');
const UsersKey = contract<UserRepository>('UserRepository');
const ContextKey = contract<RequestContext>('RequestContext');
const AuditKey = contract<AuditSink>('AuditSink');
const CacheKey = contract<Map<string, string>>('GreetingCache');
const HandlerKey = contract<GreetingHandler>('GreetingHandler');

function configure(audited: string[]): ServiceCollection {
  let nextRequest = 0;
  return new ServiceCollection()
    .add(existing(ConfigKey, { greeting: 'Hello' }))
    .add(singleton(LoggerKey).as('MemoryLogger').from(() => new MemoryLogger()))
    .add(scoped(ContextKey).from(() => ({ requestId: ++nextRequest })))
    .add(
      scoped(UsersKey)
        .as('InMemoryUserRepository')
        .dependsOn(exactlyOne(ContextKey), exactlyOne(LoggerKey))
        .from((r) => new InMemoryUserRepository(r.getRequired(ContextKey), r.getRequired(LoggerKey))),
    )
    .add(transient(AuditKey).as('ListAudit').from(() => ({ record: (e) => void audited.push(e) })))
    .add(
      transient(HandlerKey)
        .dependsOn(exactlyOne(ConfigKey), exactlyOne(UsersKey), zeroOrMore(AuditKey), zeroOrOne(CacheKey))
        .from(
          (r) =>
            new GreetingHandler(
              r.getRequired(ConfigKey),
              r.getRequired(UsersKey),
              r.getAll(AuditKey),
              lazy(zeroOrOne(CacheKey), r),
            ),
        ),
    );
}

describe('integration', () => {
  it('serves requests in isolated scopes and cleans up after each', async () => {
    const audited: string[] = [];
    const provider = configure(audited).build();

    const first = await provider.withScope((scope) => scope.getRequired(HandlerKey).handle('1'));
    const second = await provider.withScope((scope) => scope.getRequired(HandlerKey).handle('2'));

    expect([first, second]).toEqual(['Hello, Alice', 'Hello, Bob']);
    expect(audited).toEqual(['Hello, Alice', 'Hello, Bob']);
    expect(provider.getRequired(LoggerKey).messages).toEqual([
      '[1] find 1',
      '[1] repository closed',
      '[2] find 2',
      '[2] repository closed',
    ]);
  });

  it('uses an optional registration once it is added', async () => {
    const services = configure([]).add(existing(CacheKey, new Map([['1', 'cached hello']])));
    const provider = services.build();

    const reply = await provider.withScope((scope) => scope.getRequired(HandlerKey).handle('1'));

    expect(reply).toBe('cached hello');
    expect(provider.getRequired(LoggerKey).messages).toEqual(['[1] repository closed']);
  });

  it('swaps an implementation for tests with replace()', async () => {
    const provider = configure([])
      .replace(scoped(UsersKey).as('StubUsers').from(() => ({ findName: () => 'Stub' })))
      .build();

    const reply = await provider.withScope((scope) => scope.getRequired(HandlerKey).handle('42'));

    expect(reply).toBe('Hello, Stub');
  });

  it('rejects a configuration where a singleton would capture request state', () => {
    const services = configure([]).add(
      singleton(contract<RequestContext>('Cache'))
        .dependsOn(exactlyOne(ContextKey))
        .from((r) => r.getRequired(ContextKey)),
    );

    expect(() => services.build()).toThrow(ValidationError);
  });

  it('lets a transient keep its resolver and reach shared singletons later', () => {
    const Reporter = contract<{ report(): number }>('Reporter');
    const Counter = contract<{ count: number }>('Counter');
    const provider = new ServiceCollection()
      .add(singleton(Counter).from(() => ({ count: 0 })))
      .add(
        transient(Reporter).from((r: ServiceResolver) => ({
          report: () => ++r.getRequired(Counter).count,
        })),
      )
      .build();

    provider.getRequired(Reporter).report();
    provider.createScope().getRequired(Reporter).report();

    expect(provider.getRequired(Counter).count).toBe(2);
  });
});
