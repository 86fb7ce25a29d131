import { z } from "zod";
import type { Package } from "../graph/types";
import { IDatabase, IStatement } from "./IDatabase";

// Shape of a row returned by the packages SELECT
const PackageRow = z.object({
  id: z.number().int(),
  name: z.string()
});

// --- PackageStore Class Definition ---

// The class responsible for all interactions with the 'packages' table
export class PackageStore {
  db: IDatabase;
  insertStmt: IStatement; // Upsert by id
  selectAllStmt: IStatement;

  constructor(db: IDatabase) {
    this.db = db;

    this.insertStmt = db.prepare(`
      INSERT INTO packages (id, name)
      VALUES (@id, @name)
      ON CONFLICT(id) DO UPDATE SET name = excluded.name
    `);

    this.selectAllStmt = db.prepare(`SELECT id, name FROM packages`);
  }

  /**
   * Inserts a new package or renames an existing one.
   */
  upsert(pkg: Package) {
    this.insertStmt.run({ id: pkg.id, name: pkg.name });
  }

  /**
   * Returns every package in store order. Throws a ZodError on a malformed row.
   */
  all(): Package[] {
    return this.selectAllStmt.all().map(row => PackageRow.parse(row));
  }
}
