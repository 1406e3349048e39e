import { existsSync, statSync } from "node:fs";
import Database from "better-sqlite3";
import { createLogger } from "../infra/logger.js";
import { SchemaMismatchError, StoreUnavailableError } from "../infra/errors.js";

const log = createLogger("store");

/**
 * Tables and columns the tool reads. Anything else in the file is ignored.
 */
export const REQUIRED_SCHEMA: Readonly<Record<string, readonly string[]>> = {
  Events: ["EventID", "TimeStamp", "ChatID", "ContactID"],
  Messages: ["EventID", "Type", "Subject", "Body", "Info", "Duration", "StickerID"],
  Contact: ["ContactID", "Name", "ClientName"],
  ChatRelation: ["ChatID", "ContactID"],
  ChatInfo: ["ChatID", "Name"],
};

/** Contact id the client assigns to the account owner. */
export const OWNER_CONTACT_ID = 1;

export interface MessageStore {
  readonly db: Database.Database;
  readonly path: string;
  close(): void;
}

export function openStore(dbPath: string): MessageStore {
  if (!existsSync(dbPath)) {
    throw new StoreUnavailableError(`Database file not found: ${dbPath}`);
  }
  if (!statSync(dbPath).isFile()) {
    throw new StoreUnavailableError(`Not a database file: ${dbPath}`);
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new StoreUnavailableError(
      `Cannot open database ${dbPath}: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }

  try {
    verifySchema(db);
  } catch (err) {
    db.close();
    throw err;
  }

  log.debug(`Opened ${dbPath} read-only`);

  return {
    db,
    path: dbPath,
    close() {
      if (db.open) {
        db.close();
        log.debug(`Closed ${dbPath}`);
      }
    },
  };
}

/**
 * Open the store, run `fn` against it, and close it on every path.
 */
export function withStore<T>(dbPath: string, fn: (store: MessageStore) => T): T {
  const store = openStore(dbPath);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

function verifySchema(db: Database.Database): void {
  const missing: string[] = [];

  for (const [table, columns] of Object.entries(REQUIRED_SCHEMA)) {
    const present = readColumns(db, table);
    if (present.size === 0) {
      missing.push(`table ${table}`);
      continue;
    }
    for (const column of columns) {
      if (!present.has(column.toLowerCase())) {
        missing.push(`column ${table}.${column}`);
      }
    }
  }

  if (missing.length > 0) {
    throw new SchemaMismatchError(
      `Expected message database structure not found (missing ${missing.join(", ")})`,
    );
  }
}

function readColumns(db: Database.Database, table: string): Set<string> {
  let rows: Array<{ name: string }>;
  try {
    rows = db
      .prepare("SELECT name FROM pragma_table_info(?)")
      .all(table) as Array<{ name: string }>;
  } catch (err) {
    // Files that are not SQLite only fail on the first read.
    throw new StoreUnavailableError(
      `Not a valid message database: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
  return new Set(rows.map((row) => row.name.toLowerCase()));
}
