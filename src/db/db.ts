import {existsSync, readFileSync, renameSync, writeFileSync} from "node:fs";
import {join} from "node:path";
import initSqlJs, {Database, SqlJsStatic} from "sql.js";

let SQL: SqlJsStatic | null = null;

/**
 * Opens the publish state database. With a file path the previous contents are
 * loaded from disk; without one the database lives only as long as the process.
 */
export async function createDb(filePath?: string): Promise<Database> {
  if (!SQL) {
    SQL = await initSqlJs();
  }

  const db = filePath && existsSync(filePath) ? new SQL.Database(readFileSync(filePath)) : new SQL.Database();
  const schema = readFileSync(join(process.cwd(), "src/db/schema.sql"), "utf8");
  db.run(schema);
  return db;
}

export function saveDb(db: Database, filePath: string): void {
  const tempPath = `${filePath}.tmp`;
  writeFileSync(tempPath, Buffer.from(db.export()));
  renameSync(tempPath, filePath);
}
