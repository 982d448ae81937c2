import Knex, { type Knex as KnexType } from 'knex';
import { knexLog, type TargetDialect, type TargetConfig } from '../target';
import { registerTarget } from '../target-registry';
import { toConnectionUrl } from '../connection-url';

/**
 * PostgreSQL target dialect (networked).
 * Indexes are left to external schema management.
 */
class PostgreSQLTarget implements TargetDialect {
  readonly name = 'postgresql';
  readonly managesIndexes = false;
  readonly maxBindings = 65_535;

  readonly client: KnexType;
  readonly table: string;

  constructor(config: TargetConfig) {
    if (config.type !== 'postgresql') {
      throw new Error('Invalid config type for PostgreSQL target');
    }

    const sslConfig = config.ssl ? { rejectUnauthorized: false } : false;

    this.client = Knex({
      client: 'pg',
      connection: {
        connectionString: toConnectionUrl(config),
        application_name: 'rowpipe',
        ssl: sslConfig,
      },
      pool: { min: 0, max: 4 },
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

export const createPostgreSQLTarget = (config: TargetConfig): TargetDialect => new PostgreSQLTarget(config);

registerTarget('postgresql', createPostgreSQLTarget);
