import type { Logger } from "pino";
import { filterPackages } from "./filterPackages";
import { writeDot } from "./writeDot";
import type { Catalog, ExportOptions, ExportResult } from "./types";

/**
 * Filters the catalog's packages and writes the resulting graph to `filePath`.
 * Edges are matched against the full, unfiltered dependency list.
 */
export function exportDot(
  filePath: string,
  catalog: Catalog,
  options: ExportOptions = {},
  log?: Logger
): ExportResult {
  const nodes = filterPackages(catalog.packages, catalog.dependencies, options, log);
  const doc = writeDot(filePath, nodes, catalog.dependencies, { escapeLabels: options.escapeLabels });
  return { nodes: doc.nodeCount, edges: doc.edgeCount };
}
