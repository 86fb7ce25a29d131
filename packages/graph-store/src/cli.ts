#!/usr/bin/env node
/**
 * CLI entry: read the package store and write it as a Graphviz DOT file.
 */
import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { config } from "./config/env";
import { logger } from "./logger";
import { loadCatalog } from "./persistence/loadCatalog";
import { exportDot } from "./graph/exportDot";
import type { ExportResult } from "./graph/types";

// Attribute names as commander derives them from the flags below
export type CliOptions = {
  file: string;
  n?: number;
  remove: boolean;
  remove_selfimport_only: boolean;
  db: string;
  escapeLabels: boolean;
};

export function parseNodeCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

/**
 * Fetch both record sets from the store, then filter and write the graph.
 */
export function runExport(opts: CliOptions, log: Logger = logger): ExportResult {
  log.info("Start fetching data from database...");
  const catalog = loadCatalog(opts.db);

  log.info("Start writing graphviz file...");
  const result = exportDot(
    opts.file,
    catalog,
    {
      maxNodes: opts.n ?? null,
      removeDisconnected: opts.remove,
      removeSelfImportOnly: opts.remove_selfimport_only,
      escapeLabels: opts.escapeLabels
    },
    log
  );

  log.info({ file: opts.file, ...result }, "Graphviz file written");
  return result;
}

export function buildProgram(log: Logger = logger): Command {
  const program = new Command();

  program
    .name("pkgdeps-dot")
    .description("Generate a dotfile for Python package dependencies.")
    .option("-f, --file <path>", "write dotfile to FILE", config.outFile)
    .option("-n <count>", "how many nodes the graph will have", parseNodeCount)
    .option("-r, --remove", "remove packages which are not imported and do not import", false)
    .option(
      "-s, --remove_selfimport_only",
      "remove packages which do not import anything except themselves",
      false
    )
    .option("--db <path>", "SQLite package store to read", config.dbPath)
    .option("--escape-labels", "escape quotes and backslashes in node labels", false)
    .action(() => {
      runExport(program.opts<CliOptions>(), log);
    });

  return program;
}

export function main(argv: string[] = process.argv): void {
  try {
    buildProgram().parse(argv);
  } catch (err) {
    logger.error({ err }, "Export failed");
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
