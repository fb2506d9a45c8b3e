import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';

export const IN_MEMORY = ':memory:';

function ensureDbDirectory(dbPath: string): void {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

// Initialize database schema. Records are append-only: the triggers reject
// any UPDATE or DELETE on the log.
function initSchema(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS sessions (
            id TEXT PRIMARY KEY,
            persona TEXT NOT NULL,
            created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS session_records (
            seq INTEGER PRIMARY KEY AUTOINCREMENT,
            session_id TEXT NOT NULL,
            type TEXT NOT NULL CHECK(type IN ('query', 'action', 'finding')),
            timestamp TEXT NOT NULL,
            payload TEXT NOT NULL,
            FOREIGN KEY (session_id) REFERENCES sessions(id)
        );

        CREATE INDEX IF NOT EXISTS idx_session_records_session ON session_records(session_id, seq);
        CREATE INDEX IF NOT EXISTS idx_session_records_type ON session_records(type, seq);

        CREATE TRIGGER IF NOT EXISTS session_records_no_update
        BEFORE UPDATE ON session_records
        BEGIN
            SELECT RAISE(ABORT, 'session records are append-only');
        END;

        CREATE TRIGGER IF NOT EXISTS session_records_no_delete
        BEFORE DELETE ON session_records
        BEGIN
            SELECT RAISE(ABORT, 'session records are append-only');
        END;
    `);
}

/** Open (creating when needed) the session database at `dbPath`. */
export function openDatabase(dbPath: string): Database.Database {
    if (dbPath !== IN_MEMORY) {
        ensureDbDirectory(dbPath);
    }
    logger.debug(`Database path: ${dbPath}`);

    const db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    initSchema(db);
    return db;
}
