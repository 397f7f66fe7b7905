import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const directory = path.dirname(dbPath);
    fs.mkdirSync(directory, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}
