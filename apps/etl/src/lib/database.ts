import Database from 'better-sqlite3';

export type LibraryDatabase = Database.Database;

export const IN_MEMORY_DATABASE = ':memory:';

export interface OpenDatabaseOptions {
    readonly?: boolean;
}

// SQLite leaves foreign keys unenforced unless asked per connection
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): LibraryDatabase {
    const db = new Database(path, {
        readonly: options.readonly ?? false,
        fileMustExist: options.readonly ?? false,
    });

    db.pragma('foreign_keys = ON');
    if (path !== IN_MEMORY_DATABASE && !options.readonly) {
        db.pragma('journal_mode = WAL');
    }

    return db;
}
