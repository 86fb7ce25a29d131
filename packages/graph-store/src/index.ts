/**
 * Programmatic Export
 */
export type {
  Package,
  Dependency,
  Catalog,
  FilterOptions,
  DotWriteOptions,
  ExportOptions,
  ExportResult
} from "./graph/types";
export { filterPackages, connectedPackageIds, outgoingDependencies } from "./graph/filterPackages";
export { renderDot, writeDot, escapeLabel, GRAPH_NAME } from "./graph/writeDot";
export type { DotDocument } from "./graph/writeDot";
export { exportDot } from "./graph/exportDot";

export { loadCatalog } from "./persistence/loadCatalog";
export { saveCatalog } from "./persistence/saveCatalog";
export { BetterSqliteAdapter, createBetterSqliteAdapter } from "./persistence/BetterSqliteAdapter";
export type { IDatabase, IStatement, IRunResult, OpenOptions } from "./persistence/IDatabase";
export { PackageStore } from "./persistence/PackageStore";
export { DependencyStore } from "./persistence/DependencyStore";

export { GraphStoreError, SourceUnavailableError } from "./errors";
