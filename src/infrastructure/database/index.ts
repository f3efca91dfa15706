import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import path from 'path';
import fs from 'fs';
import { CONFIG } from '../../config/config';

export const IN_MEMORY = ':memory:';

export type OrchestratorDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
    db: OrchestratorDatabase;
    sqlite: Database.Database;
}

const CREATE_TABLES = `
    CREATE TABLE IF NOT EXISTS workflow_executions (
        workflow_id TEXT PRIMARY KEY,
        order_id TEXT NOT NULL,
        run_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'RUNNING',
        request TEXT NOT NULL,
        checkpoint TEXT NOT NULL,
        result TEXT,
        event_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        closed_at INTEGER
    );

    CREATE TABLE IF NOT EXISTS workflow_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        workflow_id TEXT NOT NULL REFERENCES workflow_executions(workflow_id) ON DELETE CASCADE,
        sequence INTEGER NOT NULL,
        type TEXT NOT NULL,
        payload TEXT NOT NULL,
        recorded_at INTEGER NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS uid_executions_order ON workflow_executions(order_id);
    CREATE INDEX IF NOT EXISTS idx_executions_status ON workflow_executions(status);
    CREATE UNIQUE INDEX IF NOT EXISTS uid_events_workflow_sequence ON workflow_events(workflow_id, sequence);
`;

/**
 * Opens a SQLite database and creates the orchestrator tables.
 * Each call returns its own connection; tests open `:memory:` ones.
 */
export function openDatabase(dbPath: string = CONFIG.PATHS.DATABASE_FILE): DatabaseConnection {
    if (dbPath !== IN_MEMORY) {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const sqlite = new Database(dbPath);
    sqlite.pragma('journal_mode = WAL'); // Checkpoint writes don't block status reads
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(CREATE_TABLES);

    return { db: drizzle(sqlite, { schema }), sqlite };
}

export { schema };
export { workflowExecutions, workflowEvents } from './schema';
