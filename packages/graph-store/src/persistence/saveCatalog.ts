import type { Catalog } from "../graph/types";
import { createBetterSqliteAdapter } from "./BetterSqliteAdapter";
import { PackageStore } from "./PackageStore";
import { DependencyStore } from "./DependencyStore";

/* ============================================================
   WRITE WORKFLOW
   ============================================================*/

export function saveCatalog(catalog: Catalog, dbPath: string) {
  const db = createBetterSqliteAdapter(dbPath);
  try {
    // IMPORTANT: write workflow must clear stale state; read workflows must not.
    db.resetSchema?.();
    const packages = new PackageStore(db);
    const dependencies = new DependencyStore(db);

    db.transaction(() => {
      catalog.packages.forEach(p => packages.upsert(p));
      catalog.dependencies.forEach(d => dependencies.insert(d));
    });
  } finally {
    db.close();
  }
}
