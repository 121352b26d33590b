/**
 * SQLite Connector
 *
 * SQL-dialect connector over better-sqlite3. Named placeholders (@name,
 * :name, $name) bind from the params object. Rows are pulled lazily so the
 * sandbox's row cap is enforced without materializing the whole result.
 */

import Database from "better-sqlite3";
import { ConnectorUnavailableError, type Connector, type ConnectorQueryOptions, type ConnectorQueryResult, type HealthState, type QueryParams } from "./types.js";

export interface SqliteConnectorOptions {
  /** Database file, or ":memory:" */
  filename: string;
  /** Open the file read-only (default: false; the sandbox enforces read-only queries) */
  readonly?: boolean;
  /** Fail to connect instead of creating a missing file (default: true) */
  fileMustExist?: boolean;
  /**
   * Column carrying each row's last-change time. When present, the oldest
   * value among returned rows is reported as `modifiedAt`. The data itself
   * is as of the read.
   */
  timestampColumn?: string;
  /** Use an already-open database (tests, embedded stores). */
  database?: Database.Database;
}

type Binding = Record<string, string | number | null>;

function toBinding(params: QueryParams): Binding {
  const binding: Binding = {};
  for (const [key, value] of Object.entries(params)) {
    // better-sqlite3 cannot bind booleans.
    binding[key] = typeof value === "boolean" ? (value ? 1 : 0) : value;
  }
  return binding;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export class SqliteConnector implements Connector {
  readonly kind = "sqlite";
  readonly dialect = "sql";
  private db: Database.Database | null = null;

  constructor(private readonly options: SqliteConnectorOptions) {}

  async connect(): Promise<void> {
    if (this.db) return;
    if (this.options.database) {
      this.db = this.options.database;
      return;
    }
    try {
      this.db = new Database(this.options.filename, {
        readonly: this.options.readonly ?? false,
        fileMustExist: this.options.fileMustExist ?? true,
      });
    } catch (err) {
      throw new ConnectorUnavailableError(`cannot open SQLite database "${this.options.filename}"`, { cause: err });
    }
  }

  async query(text: string, params: QueryParams, options: ConnectorQueryOptions): Promise<ConnectorQueryResult> {
    const db = this.db;
    if (!db) throw new ConnectorUnavailableError("not connected");
    options.signal.throwIfAborted();

    const statement = db.prepare(text);
    const binding = toBinding(params);
    const hasParams = Object.keys(binding).length > 0;

    if (!statement.reader) {
      const info = hasParams ? statement.run(binding) : statement.run();
      return { data: { changes: info.changes }, rowCount: 1 };
    }

    const rows: Record<string, unknown>[] = [];
    for (const row of hasParams ? statement.iterate(binding) : statement.iterate()) {
      if (isRow(row)) rows.push(Object.fromEntries(Object.entries(row)));
      // One past the cap is enough for the sandbox to reject the result.
      if (rows.length > options.maxRows) break;
    }

    return { data: rows, rowCount: rows.length, modifiedAt: this.oldestModification(rows) };
  }

  private oldestModification(rows: Record<string, unknown>[]): string | undefined {
    const column = this.options.timestampColumn;
    if (!column || rows.length === 0) return undefined;

    let oldest = Infinity;
    for (const row of rows) {
      const value = row[column];
      const ms = typeof value === "string" ? Date.parse(value) : typeof value === "number" ? value : NaN;
      if (Number.isNaN(ms)) return undefined;
      oldest = Math.min(oldest, ms);
    }
    return new Date(oldest).toISOString();
  }

  async health(): Promise<HealthState> {
    if (!this.db) return "unreachable";
    try {
      this.db.prepare("SELECT 1").get();
      return "healthy";
    } catch {
      return "unreachable";
    }
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
