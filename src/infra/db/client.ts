import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10 });
  const db = drizzle(sql);
  return { db, sql };
};

export type Database = ReturnType<typeof createDb>["db"];
