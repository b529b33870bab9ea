import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { PosError, StorageError, ValidationError, errorMessage } from '../../src/shared/errors';
import { createConsoleLogger, type Logger } from '../../src/main/logging/logger';
import { POS_COLUMN_UPGRADES, POS_SCHEMA_SQL } from './schema';

export const IN_MEMORY = ':memory:';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface OpenStorageOptions {
  filePath: string;
  logger?: Logger;
}

/**
 * Owns the single store handle shared by every repository. Build it once at
 * startup and pass it down.
 */
export class StorageGateway {
  readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  initialize(): void {
    this.db.exec(POS_SCHEMA_SQL);
    POS_COLUMN_UPGRADES.forEach((upgrade) => {
      this.ensureColumn(upgrade.table, upgrade.column, upgrade.definition);
    });
    this.logger.debug('schema ready');
  }

  ensureColumn(tableName: string, columnName: string, definition: string): boolean {
    if (!IDENTIFIER.test(tableName) || !IDENTIFIER.test(columnName)) {
      throw new ValidationError(`Invalid identifier: ${tableName}.${columnName}`);
    }

    const columns = this.db
      .prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`)
      .all();
    if (columns.some((row) => row.name.toLowerCase() === columnName.toLowerCase())) return false;

    try {
      this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
    } catch (error) {
      if (/duplicate column name/i.test(errorMessage(error))) return false;
      throw error;
    }

    this.logger.info('column added', { table: tableName, column: columnName });
    return true;
  }

  /** Runs `work` in one transaction: commit on return, rollback on throw. */
  transaction<T>(work: () => T): T {
    const tx = this.db.transaction(work);
    try {
      return tx();
    } catch (error) {
      if (error instanceof PosError) throw error;
      this.logger.error('transaction rolled back', { error: errorMessage(error) });
      throw new StorageError(`Storage failure: ${errorMessage(error)}`, error);
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

export function openStorage(options: OpenStorageOptions): StorageGateway {
  const logger = options.logger ?? createConsoleLogger('storage');
  if (options.filePath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(options.filePath), { recursive: true });
  }

  const db = new Database(options.filePath);
  if (options.filePath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  const gateway = new StorageGateway(db, logger);
  gateway.initialize();
  logger.info('store opened', { filePath: options.filePath });
  return gateway;
}
