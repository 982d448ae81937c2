import Knex, { type Knex as KnexType } from 'knex';
import { knexLog, type TargetDialect, type TargetConfig } from '../target';
import { registerTarget } from '../target-registry';

/**
 * SQLite target dialect (embedded, file-resident).
 * The only backend whose indexes are provisioned after a load.
 */
class SQLiteTarget implements TargetDialect {
  readonly name = 'sqlite';
  readonly managesIndexes = true;
  // SQLITE_MAX_VARIABLE_NUMBER since SQLite 3.32
  readonly maxBindings = 32_766;

  readonly client: KnexType;
  readonly table: string;

  constructor(config: TargetConfig) {
    if (config.type !== 'sqlite') {
      throw new Error('Invalid config type for SQLite target');
    }

    this.client = Knex({
      client: 'better-sqlite3',
      connection: { filename: config.database },
      useNullAsDefault: true,
      acquireConnectionTimeout: 10_000,
      log: knexLog,
    });

    this.table = config.table;
  }

  getClient(): KnexType {
    return this.client;
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}

export const createSQLiteTarget = (config: TargetConfig): TargetDialect => new SQLiteTarget(config);

registerTarget('sqlite', createSQLiteTarget);
