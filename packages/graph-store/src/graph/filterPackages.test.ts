import { describe, expect, it } from "vitest";
import pino from "pino";

import { connectedPackageIds, filterPackages, outgoingDependencies } from "./filterPackages";
import type { Dependency, Package } from "./types";

const packages: Package[] = [
  { id: 1, name: "a" },
  { id: 2, name: "b" },
  { id: 3, name: "c" }
];

const dependencies: Dependency[] = [
  { sourceId: 1, targetId: 2, weight: 5 },
  { sourceId: 3, targetId: 3, weight: 1 }
];

const ids = (pkgs: Package[]) => pkgs.map(p => p.id);

describe("connectedPackageIds", () => {
  it("collects both endpoints, self-dependencies included", () => {
    expect([...connectedPackageIds(dependencies)].sort()).toEqual([1, 2, 3]);
  });

  it("is empty without dependencies", () => {
    expect(connectedPackageIds([]).size).toBe(0);
  });
});

describe("outgoingDependencies", () => {
  it("maps each source to its other targets and skips self-dependencies", () => {
    const outgoing = outgoingDependencies([
      { sourceId: 1, targetId: 2, weight: 1 },
      { sourceId: 1, targetId: 3, weight: 1 },
      { sourceId: 3, targetId: 3, weight: 4 },
      { sourceId: 1, targetId: 2, weight: 2 }
    ]);
    expect([...outgoing.entries()]).toEqual([[1, [2, 3, 2]]]);
  });
});

describe("filterPackages", () => {
  it("keeps every package when no option is set", () => {
    const result = filterPackages(packages, dependencies);
    expect(result).toEqual(packages);
    expect(result).not.toBe(packages);
  });

  it("keeps packages touched by any dependency, including a self-dependency", () => {
    expect(ids(filterPackages(packages, dependencies, { removeDisconnected: true }))).toEqual([1, 2, 3]);
  });

  it("drops packages without any incident dependency", () => {
    const withLoner = [...packages, { id: 4, name: "d" }];
    expect(ids(filterPackages(withLoner, dependencies, { removeDisconnected: true }))).toEqual([1, 2, 3]);
  });

  it("keeps only packages that depend on another package", () => {
    const opts = { removeDisconnected: true, removeSelfImportOnly: true };
    expect(ids(filterPackages(packages, dependencies, opts))).toEqual([1]);
  });

  it("ignores incoming dependencies for self-import-only pruning", () => {
    // 2 is required by 1 but requires nothing itself
    expect(ids(filterPackages(packages, dependencies, { removeSelfImportOnly: true }))).toEqual([1]);
  });

  it("consults the full dependency list after connectivity pruning", () => {
    const pkgs: Package[] = [
      { id: 1, name: "a" },
      { id: 5, name: "e" }
    ];
    // 1 depends on 9, which is not a known package
    const deps: Dependency[] = [{ sourceId: 1, targetId: 9, weight: 1 }];
    const opts = { removeDisconnected: true, removeSelfImportOnly: true };
    expect(ids(filterPackages(pkgs, deps, opts))).toEqual([1]);
  });

  it("keeps input order instead of sorting", () => {
    const shuffled: Package[] = [
      { id: 3, name: "c" },
      { id: 1, name: "a" },
      { id: 2, name: "b" }
    ];
    expect(ids(filterPackages(shuffled, dependencies, { removeDisconnected: true }))).toEqual([3, 1, 2]);
  });

  it("truncates to the first maxNodes packages after pruning", () => {
    expect(filterPackages(packages, dependencies, { removeDisconnected: true, maxNodes: 1 })).toEqual([
      { id: 1, name: "a" }
    ]);
    expect(ids(filterPackages(packages, dependencies, { maxNodes: 2 }))).toEqual([1, 2]);
    expect(ids(filterPackages(packages, dependencies, { maxNodes: 10 }))).toEqual([1, 2, 3]);
  });

  it("keeps nothing for maxNodes 0", () => {
    expect(filterPackages(packages, dependencies, { maxNodes: 0 })).toEqual([]);
  });

  it("keeps everything for a null maxNodes", () => {
    expect(ids(filterPackages(packages, dependencies, { maxNodes: null }))).toEqual([1, 2, 3]);
  });

  it("rejects a negative or fractional maxNodes", () => {
    expect(() => filterPackages(packages, dependencies, { maxNodes: -1 })).toThrow(RangeError);
    expect(() => filterPackages(packages, dependencies, { maxNodes: 1.5 })).toThrow(RangeError);
  });

  it("returns an empty list for empty input", () => {
    const opts = { removeDisconnected: true, removeSelfImportOnly: true };
    expect(filterPackages([], [], opts)).toEqual([]);
  });

  it("does not modify its inputs", () => {
    const pkgs = packages.slice();
    const deps = dependencies.slice();
    filterPackages(pkgs, deps, { removeDisconnected: true, removeSelfImportOnly: true, maxNodes: 1 });
    expect(pkgs).toEqual(packages);
    expect(deps).toEqual(dependencies);
  });

  it("reports progress through the given logger", () => {
    const messages: string[] = [];
    const log = pino({ level: "info" }, { write: (line: string) => messages.push(JSON.parse(line).msg) });

    const withLoner = [...packages, { id: 4, name: "d" }];
    filterPackages(withLoner, dependencies, { removeDisconnected: true, removeSelfImportOnly: true }, log);

    expect(messages).toEqual([
      "Imported graph had 4 nodes. Only 3 of them have edges.",
      "Remove packages which only import themselves.",
      "1 packages remaining"
    ]);
  });
});
