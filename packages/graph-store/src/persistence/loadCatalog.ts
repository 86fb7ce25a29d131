import type { Catalog } from "../graph/types";
import { SourceUnavailableError } from "../errors";
import { createBetterSqliteAdapter } from "./BetterSqliteAdapter";
import type { IDatabase } from "./IDatabase";
import { PackageStore } from "./PackageStore";
import { DependencyStore } from "./DependencyStore";

/* ============================================================
   READ WORKFLOW
   ============================================================*/

function openReadOnly(dbPath: string): IDatabase {
  try {
    return createBetterSqliteAdapter(dbPath, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new SourceUnavailableError(`Cannot open package store at ${dbPath}`, err);
  }
}

/**
 * Reads every package and dependency row from the store at `dbPath`.
 *
 * The store is opened read-only and must already exist; it is never created
 * or migrated here. Failures to open it or read its rows are rethrown as
 * SourceUnavailableError with the original error as `cause`.
 */
export function loadCatalog(dbPath: string): Catalog {
  const db = openReadOnly(dbPath);
  try {
    const packages = new PackageStore(db).all();
    const dependencies = new DependencyStore(db).all();
    return { packages, dependencies };
  } catch (err) {
    throw new SourceUnavailableError(`Cannot read package store at ${dbPath}`, err);
  } finally {
    db.close();
  }
}
