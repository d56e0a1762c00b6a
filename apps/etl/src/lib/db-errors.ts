import Database from 'better-sqlite3';

type SqliteError = InstanceType<typeof Database.SqliteError>;

// DDL could not be applied; nothing else can run
export class SchemaError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SchemaError';
    }
}

// A row broke a foreign key, NOT NULL or CHECK constraint. The loader inserts
// parents before children, so reaching this means a batch was built out of order.
export class IntegrityViolationError extends Error {
    constructor(
        public readonly table: string,
        public readonly key: string,
        public readonly constraint: string,
        options?: { cause?: unknown }
    ) {
        super(`Integrity violation (${constraint}) inserting ${table} row ${key}`, options);
        this.name = 'IntegrityViolationError';
    }
}

export function isConstraintError(error: unknown): error is SqliteError {
    return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}
