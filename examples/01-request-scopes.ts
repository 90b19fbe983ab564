/**
 * Example 01 — Request scopes
 *
 * Showcases: typed contracts, declared dependencies validated at build,
 * one transaction per request scope, withScope disposal, introspection.
 * Type-checked with the rest of the project by `npm run typecheck`.
 */
import {
  ServiceCollection,
  contract,
  exactlyOne,
  existing,
  scoped,
  singleton,
  transient,
  zeroOrMore,
} from '../src/index.js';
import type { OnDestroy } from '../src/index.js';

interface Config {
  readonly dbUrl: string;
}

interface Logger {
  info(message: string): void;
}

interface Transaction extends OnDestroy {
  readonly id: number;
  query(sql: string): string;
}

interface Middleware {
  before(path: string): void;
}

class ConsoleLogger implements Logger {
  info(message: string): void {
    console.log(`[info] ${message}`);
  }
}

let nextTx = 0;

class FakeTransaction implements Transaction {
  readonly id = ++nextTx;

  constructor(
    config: Config,
    private readonly logger: Logger,
  ) {
    logger.info(`tx ${this.id} opened on ${config.dbUrl}`);
  }

  query(sql: string): string {
    return `${sql} (tx ${this.id})`;
  }

  onDestroy(): void {
    this.logger.info(`tx ${this.id} committed`);
  }
}

class UserController {
  constructor(
    private readonly tx: Transaction,
    private readonly middleware: Middleware[],
  ) {}

  show(id: string): string {
    for (const m of this.middleware) m.before(`/users/${id}`);
    return this.tx.query(`SELECT * FROM users WHERE id = ${id}`);
  }
}

const ConfigKey = contract<Config>('Config');
const LoggerKey = contract<Logger>('Logger');
const TransactionKey = contract<Transaction>('Transaction');
const MiddlewareKey = contract<Middleware>('Middleware');
const ControllerKey = contract<UserController>('UserController');

const provider = new ServiceCollection()
  .add(existing(ConfigKey, { dbUrl: 'postgres://localhost/app' }))
  .add(singleton(LoggerKey).as('ConsoleLogger').from(() => new ConsoleLogger()))
  .add(
    scoped(TransactionKey)
      .as('FakeTransaction')
      .dependsOn(exactlyOne(ConfigKey), exactlyOne(LoggerKey))
      .from((r) => new FakeTransaction(r.getRequired(ConfigKey), r.getRequired(LoggerKey))),
  )
  .add(
    transient(MiddlewareKey)
      .as('RequestLog')
      .dependsOn(exactlyOne(LoggerKey))
      .from((r) => {
        const logger = r.getRequired(LoggerKey);
        return { before: (path: string) => logger.info(`GET ${path}`) };
      }),
  )
  .add(
    transient(ControllerKey)
      .dependsOn(exactlyOne(TransactionKey), zeroOrMore(MiddlewareKey))
      .from((r) => new UserController(r.getRequired(TransactionKey), r.getAll(MiddlewareKey))),
  )
  .build();

console.log(String(provider));

for (const id of ['1', '2']) {
  const result = await provider.withScope((scope) => scope.getRequired(ControllerKey).show(id), {
    name: `request-${id}`,
  });
  console.log(result);
}

await provider.dispose();
