import fs from "fs";
import type { Dependency, DotWriteOptions, Package } from "./types";

export const GRAPH_NAME = "python_package_dependencies";

export type DotDocument = {
  lines: string[];
  nodeCount: number;
  edgeCount: number;
};

/**
 * Backslash-escapes `\` and `"` so a label stays one quoted DOT string.
 */
export function escapeLabel(name: string): string {
  return name.replace(/[\\"]/g, "\\$&");
}

/**
 * Builds the DOT statements for `nodes` and the dependencies between them.
 *
 * Edges point from the required package to the package that requires it
 * (`targetId -> sourceId`) and keep input order. Dependencies with an
 * endpoint outside `nodes` are skipped. Labels are written verbatim unless
 * `escapeLabels` is set; a name containing `"` then breaks strict parsers.
 */
export function renderDot(
  nodes: Package[],
  dependencies: Dependency[],
  options: DotWriteOptions = {}
): DotDocument {
  const label = options.escapeLabels ? escapeLabel : (name: string) => name;
  const lines = [`digraph ${GRAPH_NAME} {`];

  const ids = new Set<number>();
  for (const pkg of nodes) {
    lines.push(`${pkg.id} [shape=point, label="${label(pkg.name)}"];`);
    ids.add(pkg.id);
  }

  let edgeCount = 0;
  for (const dep of dependencies) {
    if (ids.has(dep.targetId) && ids.has(dep.sourceId)) {
      lines.push(`${dep.targetId} -> ${dep.sourceId};`);
      edgeCount++;
    }
  }

  lines.push("}");
  return { lines, nodeCount: nodes.length, edgeCount };
}

/**
 * Writes the DOT graph to `filePath`, replacing any existing file.
 *
 * Every statement ends with a newline except the closing brace. The file
 * descriptor is closed on every path; a failed write leaves the file as it is.
 */
export function writeDot(
  filePath: string,
  nodes: Package[],
  dependencies: Dependency[],
  options: DotWriteOptions = {}
): DotDocument {
  const doc = renderDot(nodes, dependencies, options);
  const last = doc.lines.length - 1;

  const fd = fs.openSync(filePath, "w");
  try {
    doc.lines.forEach((line, i) => {
      fs.writeSync(fd, i < last ? `${line}\n` : line, null, "utf8");
    });
  } finally {
    fs.closeSync(fd);
  }

  return doc;
}
