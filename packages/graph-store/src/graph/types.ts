// A package row from the store, emitted as a graph vertex
export type Package = {
  id: number;   // Unique, stable identifier
  name: string; // Display label only; not guaranteed unique
};

// "sourceId requires targetId", observed `weight` times
export type Dependency = {
  sourceId: number;
  targetId: number;
  weight: number; // Accepted as input, never written to the graph
};

// Everything a single export run reads from the store
export type Catalog = {
  packages: Package[];
  dependencies: Dependency[];
};

// --- Pipeline Options ---

export interface FilterOptions {
  maxNodes?: number | null;       // Keep only the first N packages (null/undefined keeps all)
  removeDisconnected?: boolean;   // Drop packages with no incident dependency at all
  removeSelfImportOnly?: boolean; // Drop packages without an outgoing dependency on another package
}

export interface DotWriteOptions {
  escapeLabels?: boolean; // Escape `\` and `"` in labels (off: names are written verbatim)
}

export type ExportOptions = FilterOptions & DotWriteOptions;

// Counts of what ended up in the written graph
export type ExportResult = {
  nodes: number;
  edges: number;
};
