import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import fs from 'fs';
import { getServerConfig } from './config';

export type {
    User, Client, ClientNote, ClientDocument, Case, CaseNote, Appointment,
    Invoice, InvoiceItem, DashboardStats, RecentActivity, DbSchema,
} from './types';
import type { DbSchema } from './types';

export type Db = Low<DbSchema>;

const DB_FILE_NAME = 'db.json';

const COLLECTIONS = [
    'users', 'clients', 'client_notes', 'client_documents', 'cases', 'case_notes',
    'appointments', 'invoices', 'invoice_items', 'dashboard_stats', 'recent_activities',
    'revoked_tokens',
] as const satisfies readonly (keyof DbSchema)[];

export function emptySchema(): DbSchema {
    return {
        users: [],
        clients: [],
        client_notes: [],
        client_documents: [],
        cases: [],
        case_notes: [],
        appointments: [],
        invoices: [],
        invoice_items: [],
        dashboard_stats: [],
        recent_activities: [],
        revoked_tokens: [],
    };
}

let dbInstance: Db | null = null;

/**
 * Returns the process-wide lowdb instance, creating `db.json` under DATABASE_DIR on first use.
 * Collections added after a file was created are filled in on load.
 */
export async function getDb(): Promise<Db> {
    if (!dbInstance) {
        const dir = getServerConfig().databaseDir;
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        const adapter = new JSONFile<DbSchema>(path.join(dir, DB_FILE_NAME));
        const db = new Low<DbSchema>(adapter, emptySchema());
        await db.read();

        // Partial migrations
        let changed = false;
        for (const key of COLLECTIONS) {
            if (!Array.isArray(db.data[key])) {
                Object.assign(db.data, { [key]: [] });
                changed = true;
            }
        }
        if (changed) {
            await db.write();
        }
        dbInstance = db;
    }
    return dbInstance;
}

/** In-process database for tests and scripts that must not touch disk. */
export function createMemoryDb(seed: Partial<DbSchema> = {}): Db {
    return new Low<DbSchema>(new Memory<DbSchema>(), { ...emptySchema(), ...seed });
}

export function setDb(db: Db | null) {
    dbInstance = db;
}
