/**
 * Persistence driver: db | file.
 * PERSISTENCE_DRIVER wins over the config file; default is file.
 */

export type PersistenceDriver = "db" | "file";

export function getPersistenceDriver(configured?: PersistenceDriver): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.toLowerCase();
  if (v === "db") return "db";
  if (v === "file") return "file";
  return configured ?? "file";
}
