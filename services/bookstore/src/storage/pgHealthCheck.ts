import type { HealthCheck, SqlExecutor } from '../contracts/bookStorage';
import { DataAccessError, errorMessage } from '../errors';

export class PgHealthCheck implements HealthCheck {
  constructor(private readonly db: SqlExecutor) {}

  async checkConnection(): Promise<void> {
    try {
      await this.db.query('SELECT 1');
    } catch (err) {
      throw new DataAccessError(`database unreachable: ${errorMessage(err)}`, { cause: err });
    }
  }
}
