export type PersistedDocument = { key: string; bytes: Uint8Array };

/**
 * Where serialized documents live. Calls are synchronous so that a commit is
 * durable before `mutate` returns. `save` writes every document of a commit
 * or none of them.
 */
export interface DocumentPersistence {
  load(key: string): Uint8Array | undefined;
  save(docs: readonly PersistedDocument[]): void;
  keys(): string[];
  close?(): void;
}

export function createMemoryPersistence(): DocumentPersistence & { readonly size: number } {
  const docs = new Map<string, Uint8Array>();
  return {
    load: (key) => docs.get(key),
    save: (batch) => {
      for (const { key, bytes } of batch) docs.set(key, bytes.slice());
    },
    keys: () => Array.from(docs.keys()).sort(),
    get size() {
      return docs.size;
    },
  };
}
