import type { CrdtStrategy, FieldOptions, NumericBound, Value, ValueObject } from "@tidepool/crdt";
import { encodeCanonical, compareBytes, isCrdtStrategy, isValueObject } from "@tidepool/crdt";

import { SchemaError } from "./errors.js";

export type FieldSchema = {
  /** Dotted path inside the document, e.g. `profile.name`. */
  path: string;
  /** Application type name; informational for the store. */
  type: string;
  strategy: CrdtStrategy;
  bound?: NumericBound;
  /** Holds an opaque ciphertext produced by the field cipher. */
  encrypted?: boolean;
};

export type DocumentSchema = {
  namespace: string;
  version: number;
  fields: FieldSchema[];
};

/**
 * Schema metadata as it arrives from the outside, before the strategy names
 * have been checked.
 */
export type SchemaInput = {
  namespace: string;
  version: number;
  fields: (Omit<FieldSchema, "strategy"> & { strategy: string })[];
};

const NUMERIC_STRATEGIES: readonly CrdtStrategy[] = ["lww", "pn_counter"];
const ENCRYPTABLE_STRATEGIES: readonly CrdtStrategy[] = ["lww", "immutable"];
const PATH_SEGMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function validateSchema(input: SchemaInput): DocumentSchema {
  const { namespace, version } = input;
  if (namespace.length === 0 || namespace.includes("/")) {
    throw new SchemaError(`invalid namespace: ${JSON.stringify(namespace)}`);
  }
  if (!Number.isSafeInteger(version) || version < 1) {
    throw new SchemaError(`${namespace}: invalid schema version ${version}`);
  }
  if (input.fields.length === 0) throw new SchemaError(`${namespace}: schema declares no fields`);

  const fields: FieldSchema[] = [];
  const paths = new Set<string>();
  for (const raw of input.fields) {
    const where = `${namespace}.${raw.path}`;
    if (!raw.path.split(".").every((seg) => PATH_SEGMENT.test(seg))) {
      throw new SchemaError(`${namespace}: invalid field path ${JSON.stringify(raw.path)}`);
    }
    if (paths.has(raw.path)) throw new SchemaError(`${where}: declared twice`);
    const strategy = raw.strategy;
    if (!isCrdtStrategy(strategy)) throw new SchemaError(`${where}: unknown crdt strategy ${JSON.stringify(strategy)}`);
    if (raw.bound) {
      if (!NUMERIC_STRATEGIES.includes(strategy)) {
        throw new SchemaError(`${where}: bounds are only allowed on numeric lww and pn_counter fields`);
      }
      const { min, max } = raw.bound;
      if ((min !== undefined && !Number.isFinite(min)) || (max !== undefined && !Number.isFinite(max))) {
        throw new SchemaError(`${where}: bound must be finite`);
      }
      if (min !== undefined && max !== undefined && min > max) throw new SchemaError(`${where}: min > max`);
    }
    if (raw.encrypted && !ENCRYPTABLE_STRATEGIES.includes(strategy)) {
      throw new SchemaError(`${where}: encrypted fields must be lww or immutable`);
    }
    paths.add(raw.path);
    const field: FieldSchema = { path: raw.path, type: raw.type, strategy };
    if (raw.bound) {
      const bound: NumericBound = {};
      if (raw.bound.min !== undefined) bound.min = raw.bound.min;
      if (raw.bound.max !== undefined) bound.max = raw.bound.max;
      field.bound = bound;
    }
    if (raw.encrypted) field.encrypted = true;
    fields.push(field);
  }

  for (const path of paths) {
    for (const other of paths) {
      if (other !== path && other.startsWith(`${path}.`)) {
        throw new SchemaError(`${namespace}: field ${path} is also the parent of ${other}`);
      }
    }
  }
  return { namespace, version, fields };
}

/** Compiled schema with per-path lookup. */
export class CompiledSchema {
  readonly byPath: ReadonlyMap<string, FieldSchema>;

  constructor(readonly schema: DocumentSchema) {
    this.byPath = new Map(schema.fields.map((f) => [f.path, f]));
  }

  get namespace(): string {
    return this.schema.namespace;
  }

  get version(): number {
    return this.schema.version;
  }

  field(path: string): FieldSchema | undefined {
    return this.byPath.get(path);
  }

  fieldOptions(field: FieldSchema): FieldOptions {
    const opts: FieldOptions = { path: field.path };
    if (field.bound) opts.bound = field.bound;
    return opts;
  }

  /** True when `prefix` is a strict ancestor of some field path. */
  isBranch(prefix: string): boolean {
    for (const path of this.byPath.keys()) if (path.startsWith(`${prefix}.`)) return true;
    return false;
  }

  /**
   * Values the view assigns to declared fields. Missing fields are left out
   * (unchanged); keys that match no field throw.
   */
  flatten(view: ValueObject): Map<string, Value> {
    const out = new Map<string, Value>();
    const walk = (obj: ValueObject, prefix: string) => {
      for (const [key, value] of Object.entries(obj)) {
        const path = prefix ? `${prefix}.${key}` : key;
        const field = this.byPath.get(path);
        if (field) {
          if (field.encrypted && value !== null && !(value instanceof Uint8Array)) {
            throw new SchemaError(`${this.namespace}.${path}: encrypted fields only hold ciphertext bytes`);
          }
          out.set(path, value);
        } else if (this.isBranch(path) && isValueObject(value)) {
          walk(value, path);
        } else {
          throw new SchemaError(`${this.namespace}: unknown field ${path}`);
        }
      }
    };
    walk(view, "");
    return out;
  }
}

export class SchemaRegistry {
  private readonly schemas = new Map<string, CompiledSchema>();

  register(input: SchemaInput): CompiledSchema {
    const schema = validateSchema(input);
    const existing = this.schemas.get(schema.namespace);
    if (existing) {
      if (schema.version < existing.version) {
        throw new SchemaError(`${schema.namespace}: version ${schema.version} is older than ${existing.version}`);
      }
      if (schema.version === existing.version) {
        if (compareBytes(encodeCanonical(schema), encodeCanonical(existing.schema)) !== 0) {
          throw new SchemaError(`${schema.namespace}: version ${schema.version} re-registered with different fields`);
        }
        return existing;
      }
      for (const field of schema.fields) {
        const before = existing.field(field.path);
        if (before && before.strategy !== field.strategy) {
          throw new SchemaError(`${schema.namespace}.${field.path}: strategy cannot change from ${before.strategy}`);
        }
      }
    }
    const compiled = new CompiledSchema(schema);
    this.schemas.set(schema.namespace, compiled);
    return compiled;
  }

  get(namespace: string): CompiledSchema | undefined {
    return this.schemas.get(namespace);
  }

  require(namespace: string): CompiledSchema {
    const schema = this.schemas.get(namespace);
    if (!schema) throw new SchemaError(`no schema registered for namespace ${namespace}`);
    return schema;
  }

  namespaces(): string[] {
    return Array.from(this.schemas.keys()).sort();
  }
}
