export const config = {
  dbPath: process.env.PKGDEPS_DB || "pypi.db",
  outFile: process.env.PKGDEPS_OUT || "graphviz.dot",
  logLevel: process.env.LOG_LEVEL || "info"
};

export type Config = typeof config;
