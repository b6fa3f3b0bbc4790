// modules/results/results.repository.ts

import fs from 'fs';
import initSqlJs from 'sql.js';
import { writeFileAtomic } from '../../lib/files';
import { formatLocalTimestamp } from '../../lib/time';
import type { NewResult, ResultRecord, ResultStore } from './result.model';

type SqlJs = Awaited<ReturnType<typeof initSqlJs>>;
type SqlDatabase = InstanceType<SqlJs['Database']>;

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    surname TEXT NOT NULL,
    name TEXT NOT NULL,
    "group" TEXT NOT NULL,
    score INTEGER NOT NULL,
    total INTEGER NOT NULL
  )
`;

let sqlJs: Promise<SqlJs> | undefined;

// The WASM module is compiled once per process and shared by every store
function loadSqlJs(): Promise<SqlJs> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

function asNumber(value: unknown): number {
  if (typeof value !== 'number') throw new TypeError(`Expected a number column, got ${typeof value}`);
  return value;
}

function asString(value: unknown): string {
  if (typeof value !== 'string') throw new TypeError(`Expected a text column, got ${typeof value}`);
  return value;
}

function assertScore(score: number, total: number): void {
  if (!Number.isInteger(score) || !Number.isInteger(total) || score < 0 || score > total) {
    throw new RangeError(`Invalid score ${score} of ${total}`);
  }
}

/**
 * Append-only result log in a local SQLite file. Each call opens the file,
 * runs its statement and closes it again; writes replace the file atomically.
 */
export class SqliteResultStore implements ResultStore {
  private constructor(
    private readonly sql: SqlJs,
    private readonly dbPath: string,
    private readonly now: () => Date
  ) {}

  static async open(
    dbPath: string,
    now: () => Date = () => new Date()
  ): Promise<SqliteResultStore> {
    return new SqliteResultStore(await loadSqlJs(), dbPath, now);
  }

  private withConnection<T>(run: (db: SqlDatabase) => T, options: { write: boolean }): T {
    const db = fs.existsSync(this.dbPath)
      ? new this.sql.Database(fs.readFileSync(this.dbPath))
      : new this.sql.Database();
    try {
      const out = run(db);
      if (options.write) {
        writeFileAtomic(this.dbPath, db.export());
      }
      return out;
    } finally {
      db.close();
    }
  }

  init(): void {
    this.withConnection(
      (db) => {
        db.run(CREATE_TABLE);
      },
      { write: true }
    );
  }

  insert(result: NewResult): ResultRecord {
    assertScore(result.score, result.total);
    const timestamp = formatLocalTimestamp(this.now());

    return this.withConnection(
      (db) => {
        db.run(
          'INSERT INTO results (timestamp, surname, name, "group", score, total) VALUES (?, ?, ?, ?, ?, ?)',
          [timestamp, result.surname, result.name, result.group, result.score, result.total]
        );
        const [idResult] = db.exec('SELECT last_insert_rowid()');
        const id = asNumber(idResult?.values[0]?.[0]);
        return { id, timestamp, ...result };
      },
      { write: true }
    );
  }

  listAll(): ResultRecord[] {
    return this.withConnection(
      (db) => {
        const [table] = db.exec(
          'SELECT id, timestamp, surname, name, "group", score, total FROM results ORDER BY id DESC'
        );
        return (table?.values ?? []).map(([id, timestamp, surname, name, group, score, total]) => ({
          id: asNumber(id),
          timestamp: asString(timestamp),
          surname: asString(surname),
          name: asString(name),
          group: asString(group),
          score: asNumber(score),
          total: asNumber(total),
        }));
      },
      { write: false }
    );
  }
}
