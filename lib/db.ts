// lib/db.ts
import mysql from "mysql2/promise";
import { parseDatabaseUrl } from "./config";

export type SQLParam = string | number | boolean | Date | null;
type Row = Record<string, unknown>;

/** Run a parameterized statement and return typed rows. */
export type QueryFn = <T extends Row = Row>(sql: string, params?: ReadonlyArray<SQLParam>) => Promise<T[]>;

let pool: mysql.Pool | null = null;

/** Create a new pool (TLS required). Connection settings come from DATABASE_URL. */
function createPool(): mysql.Pool {
  const url = process.env.DATABASE_URL?.trim();
  if (!url) throw new Error("DATABASE_URL is not set");

  return mysql.createPool({
    ...parseDatabaseUrl(url),
    ssl: { rejectUnauthorized: true },
    waitForConnections: true,
    connectionLimit: 10,
  });
}

/** One pool per process, created on first use. */
export function getPool(): mysql.Pool {
  if (!pool) pool = createPool();
  return pool;
}

/** Run a parameterized SELECT and return typed rows. */
export const query: QueryFn = async <T extends Row = Row>(
  sql: string,
  params: ReadonlyArray<SQLParam> = [],
): Promise<T[]> => {
  const [rows] = await getPool().execute<mysql.RowDataPacket[]>(sql, [...params]);
  return rows as unknown as T[];
};

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
