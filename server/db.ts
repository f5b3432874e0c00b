import { drizzle } from "drizzle-orm/mysql2";

export type Database = ReturnType<typeof drizzle>;

let _db: Database | null = null;

// Lazily create the drizzle instance so local tooling can run without a DB.
export async function getDb(): Promise<Database | null> {
  if (!_db && process.env.DATABASE_URL) {
    try {
      _db = drizzle(process.env.DATABASE_URL);
    } catch (error) {
      console.warn("[Database] Failed to connect:", error);
      _db = null;
    }
  }
  return _db;
}
