import { z } from "zod";
import type { Dependency } from "../graph/types";
import { IDatabase, IStatement } from "./IDatabase";

// Row shape of the dependencies table: `package` needs `needs_package`, seen `times` times
const DependencyRow = z
  .object({
    package: z.number().int(),
    needs_package: z.number().int(),
    // Older rows may lack a count; the schema default is 1
    times: z.number().int().nullable().transform(t => t ?? 1)
  })
  .transform((row): Dependency => ({
    sourceId: row.package,
    targetId: row.needs_package,
    weight: row.times
  }));

// --- DependencyStore Class Definition ---

// The class responsible for all interactions with the 'dependencies' table
export class DependencyStore {
  db: IDatabase;
  insertStmt: IStatement;
  selectAllStmt: IStatement;

  constructor(db: IDatabase) {
    this.db = db;

    // No uniqueness constraint: duplicate rows are kept as independent edges
    this.insertStmt = db.prepare(`
      INSERT INTO dependencies (package, needs_package, times)
      VALUES (@sourceId, @targetId, @weight)
    `);

    this.selectAllStmt = db.prepare(`SELECT package, needs_package, times FROM dependencies`);
  }

  insert(dep: Dependency) {
    this.insertStmt.run({ sourceId: dep.sourceId, targetId: dep.targetId, weight: dep.weight });
  }

  /**
   * Returns every dependency row in store order. Throws a ZodError on a malformed row.
   */
  all(): Dependency[] {
    return this.selectAllStmt.all().map(row => DependencyRow.parse(row));
  }
}
