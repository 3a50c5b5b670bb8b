import { DocumentStore, createLogger } from "../src/index.js";
import type { DocumentPersistence, SchemaInput } from "../src/index.js";

export const NOTES: SchemaInput = {
  namespace: "notes",
  version: 1,
  fields: [
    { path: "title", type: "string", strategy: "lww" },
    { path: "tags", type: "string[]", strategy: "or_set" },
    { path: "likes", type: "int", strategy: "pn_counter", bound: { min: 0 } },
    { path: "body", type: "string[]", strategy: "rga" },
    { path: "meta.author", type: "string", strategy: "immutable" },
    { path: "draft", type: "string", strategy: "mv_register" },
    { path: "text", type: "richtext", strategy: "peritext" },
    { path: "secret", type: "bytes", strategy: "lww", encrypted: true },
  ],
};

export const EMPTY_NOTE = {
  title: null,
  tags: [],
  likes: 0,
  body: [],
  meta: { author: null },
  draft: [],
  text: { text: "", marks: [] },
  secret: null,
};

export const silent = createLogger({ level: "silent" });

export function makeStore(actor: string, persistence?: DocumentPersistence): DocumentStore {
  return new DocumentStore({ actor, logger: silent, schemas: [NOTES], persistence });
}
