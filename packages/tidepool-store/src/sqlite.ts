import type Database from "better-sqlite3";

import type { DocumentPersistence, PersistedDocument } from "./persistence.js";

export type SqlitePersistenceOptions = {
  /** Close the database handle when the persistence is closed. */
  ownsDb?: boolean;
};

export function createSqlitePersistence(
  db: Database.Database,
  opts: SqlitePersistenceOptions = {},
): DocumentPersistence {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tidepool_documents (
      doc_key TEXT PRIMARY KEY NOT NULL,
      bytes BLOB NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  const selectOne = db.prepare<[string], { bytes: Buffer }>(
    "SELECT bytes FROM tidepool_documents WHERE doc_key = ?",
  );
  const selectKeys = db.prepare<[], { doc_key: string }>(
    "SELECT doc_key FROM tidepool_documents ORDER BY doc_key",
  );
  const upsert = db.prepare<[string, Buffer, number]>(
    `INSERT INTO tidepool_documents (doc_key, bytes, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(doc_key) DO UPDATE SET bytes = excluded.bytes, updated_at = excluded.updated_at`,
  );
  const saveAll = db.transaction((docs: readonly PersistedDocument[]) => {
    const now = Date.now();
    for (const { key, bytes } of docs) upsert.run(key, Buffer.from(bytes), now);
  });

  return {
    load: (key) => {
      const row = selectOne.get(key);
      return row ? new Uint8Array(row.bytes) : undefined;
    },
    save: (docs) => {
      saveAll(docs);
    },
    keys: () => selectKeys.all().map((row) => row.doc_key),
    close: () => {
      if (opts.ownsDb) db.close();
    },
  };
}
