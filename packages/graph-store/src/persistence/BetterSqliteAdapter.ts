import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import type { IDatabase, IStatement, IRunResult, OpenOptions } from "./IDatabase";

/**
 * Ensures the directory containing the given path 'p' exists. Creates it recursively if missing.
 * @param p The full path to the file (the database file).
 */
function ensureDirExists(p: string) {
    const dir = path.dirname(p);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

/**
 * Wrapper around better-sqlite3 Statement to match IStatement interface.
 */
class BetterSqliteStatement implements IStatement {
    constructor(private stmt: Database.Statement) { }

    run(...params: unknown[]): IRunResult {
        const result = this.stmt.run(...params);
        return {
            changes: result.changes,
            lastInsertRowid: result.lastInsertRowid
        };
    }

    all(...params: unknown[]): unknown[] {
        return this.stmt.all(...params);
    }
}

/**
 * Native better-sqlite3 adapter over the package store.
 *
 * Read workflows open it with `readonly` and `fileMustExist`, so a missing
 * store is an error instead of a fresh empty file. Write workflows get the
 * schema created if missing.
 */
export class BetterSqliteAdapter implements IDatabase {
    private db: Database.Database;

    constructor(dbPath: string, options: OpenOptions = {}) {
        const readonly = options.readonly ?? false;
        if (!readonly) ensureDirExists(dbPath);
        this.db = new Database(dbPath, {
            readonly,
            fileMustExist: options.fileMustExist ?? readonly
        });
        if (!readonly) this.ensureSchema();
    }

    /**
    * Create schema if missing (packages and dependencies tables).
    * Column names match existing package stores.
    */
    private ensureSchema(): void {
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS packages (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL
      );
     `);

        this.db.exec(`
      CREATE TABLE IF NOT EXISTS dependencies (
        package INTEGER NOT NULL,
        needs_package INTEGER NOT NULL,
        times INTEGER NOT NULL DEFAULT 1
      );
     `);

        // --- Index Creation for Query Optimization ---
        this.db.exec(`CREATE INDEX IF NOT EXISTS idx_dependencies_package ON dependencies(package);`);
        this.db.exec(`CREATE INDEX IF NOT EXISTS idx_dependencies_needs ON dependencies(needs_package);`);
    }

    prepare(sql: string): IStatement {
        return new BetterSqliteStatement(this.db.prepare(sql));
    }

    exec(sql: string): void {
        this.db.exec(sql);
    }

    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
    }

    /**
     * Destructive reset - drops and recreates tables.
     */
    resetSchema(): void {
        this.db.exec(`DROP TABLE IF EXISTS dependencies;`);
        this.db.exec(`DROP TABLE IF EXISTS packages;`);
        this.ensureSchema();
    }
}

/**
 * Factory function to create a BetterSqliteAdapter.
 */
export function createBetterSqliteAdapter(dbPath: string, options?: OpenOptions): IDatabase {
    return new BetterSqliteAdapter(dbPath, options);
}
