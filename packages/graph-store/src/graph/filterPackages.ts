import type { Logger } from "pino";
import type { Dependency, FilterOptions, Package } from "./types";

/**
 * Ids of every package that takes part in at least one dependency, on either
 * end. Self-dependencies count.
 */
export function connectedPackageIds(dependencies: Dependency[]): Set<number> {
  const ids = new Set<number>();
  for (const dep of dependencies) {
    ids.add(dep.targetId);
    ids.add(dep.sourceId);
  }
  return ids;
}

/**
 * Package id -> ids of the *other* packages it depends on.
 * Self-dependencies are skipped, so a package that only requires itself has no entry.
 */
export function outgoingDependencies(dependencies: Dependency[]): Map<number, number[]> {
  const outgoing = new Map<number, number[]>();
  for (const dep of dependencies) {
    if (dep.sourceId === dep.targetId) continue;
    const targets = outgoing.get(dep.sourceId);
    if (targets) targets.push(dep.targetId);
    else outgoing.set(dep.sourceId, [dep.targetId]);
  }
  return outgoing;
}

/**
 * Derives the node set of the exported graph.
 *
 * Connectivity pruning runs first, then self-import-only pruning; both look at
 * the full dependency list. The result is then cut to the first `maxNodes`
 * packages, keeping input order.
 */
export function filterPackages(
  packages: Package[],
  dependencies: Dependency[],
  options: FilterOptions = {},
  log?: Logger
): Package[] {
  const { maxNodes = null, removeDisconnected = false, removeSelfImportOnly = false } = options;

  if (maxNodes !== null && (!Number.isInteger(maxNodes) || maxNodes < 0)) {
    throw new RangeError(`maxNodes must be a non-negative integer, got ${maxNodes}`);
  }

  let kept = packages;

  if (removeDisconnected || removeSelfImportOnly) {
    const connected = connectedPackageIds(dependencies);
    log?.info(`Imported graph had ${packages.length} nodes. Only ${connected.size} of them have edges.`);
    if (removeDisconnected) {
      kept = kept.filter(pkg => connected.has(pkg.id));
    }
  }

  if (removeSelfImportOnly) {
    const outgoing = outgoingDependencies(dependencies);
    log?.info("Remove packages which only import themselves.");
    kept = kept.filter(pkg => (outgoing.get(pkg.id)?.length ?? 0) >= 1);
  }

  log?.info(`${kept.length} packages remaining`);

  return maxNodes === null ? kept.slice() : kept.slice(0, maxNodes);
}
