import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

function getSchemaPath(): string {
    const candidates = [
        path.join(__dirname, 'schema.sql'),
        path.join(process.cwd(), 'src', 'infrastructure', 'database', 'schema.sql')
    ];
    const found = candidates.find(p => fs.existsSync(p));
    if (!found) {
        throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
    }
    return found;
}

/**
 * Opens the state database and applies the schema.
 * `:memory:` gives a throwaway database.
 */
export function openDatabase(filePath: string): SqliteDatabase {
    const inMemory = filePath === IN_MEMORY;
    if (!inMemory) {
        fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }

    const db = new Database(filePath);
    if (!inMemory) {
        db.pragma('journal_mode = WAL');
    }
    db.exec(fs.readFileSync(getSchemaPath(), 'utf8'));
    return db;
}
