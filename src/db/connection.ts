import { promises as fs } from "fs";
import path from "path";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export const DEFAULT_SCHEMA_PATH = "db/schema.sql";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process PostgreSQL stand-in; state lives as long as the pool. */
export function createInMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

export async function applySchema(pool: pg.Pool, filePath: string = DEFAULT_SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(path.resolve(filePath), "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Kysely<DB>;
  mode: "postgres" | "pg-mem";
  close(): Promise<void>;
}

/**
 * Connects to DATABASE_URL when given, otherwise to an in-memory database.
 * The schema is applied for in-memory databases and when `autoSchema` is set.
 */
export async function openDatabase(opts: {
  databaseUrl?: string | null;
  autoSchema?: boolean;
  schemaPath?: string;
}): Promise<DatabaseHandle> {
  const url = opts.databaseUrl ?? null;
  const pool = url ? createPgPool(url) : createInMemoryPool();
  if (!url || opts.autoSchema) {
    await applySchema(pool, opts.schemaPath);
  }
  const db = createDb(pool);
  return {
    pool,
    db,
    mode: url ? "postgres" : "pg-mem",
    close: () => db.destroy()
  };
}
