import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

type BetterSqliteDb = Database.Database;

const IN_MEMORY_PATH = ':memory:';

/** Bump together with a change to schema.sql. Stored in PRAGMA user_version. */
export const SCHEMA_VERSION = 1;

function findSchemaFile(): string {
  const candidates = [
    path.resolve(__dirname, 'schema.sql'),
    path.resolve(__dirname, '../../../src/db/schema.sql'),
    path.resolve(process.cwd(), 'src/db/schema.sql'),
  ];

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in: ${candidates.join(', ')})`);
  }
  return found;
}

export class SqliteDatabase {
  readonly db: BetterSqliteDb;

  constructor(databasePath: string) {
    const inMemory = databasePath === IN_MEMORY_PATH;
    if (!inMemory) {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }

    this.db = new Database(databasePath);
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');

    this.applySchema();
  }

  get schemaVersion(): number {
    const version = this.db.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  /** Runs `work` in a transaction; nested calls become savepoints. */
  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private applySchema(): void {
    if (this.schemaVersion >= SCHEMA_VERSION) {
      return;
    }

    const schemaSql = fs.readFileSync(findSchemaFile(), 'utf8');
    this.transaction(() => {
      this.db.exec(schemaSql);
      this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
    });
  }
}

export type { BetterSqliteDb };
