import { webcrypto } from "node:crypto";

import { bytesToHex, concatBytes, randomBytes, utf8ToBytes } from "@noble/hashes/utils";

import type { Value } from "@tidepool/crdt";
import { decodeCanonical, decodeValue, encodeCanonical, encodeValue, expectRecord, expectString } from "@tidepool/crdt";

export const FIELD_KEY_LEN = 32;
const AES_GCM_NONCE_LEN = 12;

const ENCRYPTED_FIELD_V1_TAG = "tidepool/field-encrypted/v1";
const ENCRYPTED_FIELD_V1_AAD_DOMAIN = utf8ToBytes(ENCRYPTED_FIELD_V1_TAG);

const FIELD_KEY_ID_MAX_LEN = 128;
const FIELD_KEY_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/**
 * Opaque encrypt/decrypt boundary for encrypted schema fields. `context`
 * names what the ciphertext belongs to (usually the document key and field
 * path) and is authenticated, so a blob copied under another field fails to
 * decrypt.
 */
export interface FieldCipher {
  encrypt(key: Uint8Array, plaintext: Uint8Array, context: string, keyId?: string): Promise<Uint8Array>;
  decrypt(key: Uint8Array, ciphertext: Uint8Array, context: string): Promise<Uint8Array>;
}

export type FieldKeyring = {
  activeKid: string;
  keys: Record<string, Uint8Array>;
};

/** What an encrypted field blob decodes to: `{ v: 1, t, alg, nonce, ct, kid }` in canonical CBOR. */
type EncryptedFieldV1 = { nonce: Uint8Array; ct: Uint8Array; kid: string | null };

function expectBytes(value: unknown, field: string, length?: number): Uint8Array {
  if (!(value instanceof Uint8Array)) throw new Error(`${field} must be bytes`);
  if (length !== undefined && value.length !== length) {
    throw new Error(`${field}: expected ${length} bytes, got ${value.length}`);
  }
  return value;
}

function fieldAadV1(context: string): Uint8Array {
  return concatBytes(ENCRYPTED_FIELD_V1_AAD_DOMAIN, utf8ToBytes(context));
}

function assertContext(context: string): void {
  if (context.trim().length === 0) throw new Error("context must not be empty");
}

async function aesGcm(
  mode: "encrypt" | "decrypt",
  key: Uint8Array,
  nonce: Uint8Array,
  data: Uint8Array,
  aad: Uint8Array,
): Promise<Uint8Array> {
  const cryptoKey = await webcrypto.subtle.importKey("raw", key, { name: "AES-GCM" }, false, [mode]);
  const params = { name: "AES-GCM", iv: nonce, additionalData: aad, tagLength: 128 };
  const out =
    mode === "encrypt"
      ? await webcrypto.subtle.encrypt(params, cryptoKey, data)
      : await webcrypto.subtle.decrypt(params, cryptoKey, data);
  return new Uint8Array(out);
}

function randomFieldKeyIdV1(): string {
  return `k${bytesToHex(randomBytes(8))}`;
}

function assertFieldKeyId(kid: string, field: string): string {
  const clean = kid.trim();
  if (clean.length === 0) throw new Error(`${field} must not be empty`);
  if (clean.length > FIELD_KEY_ID_MAX_LEN) throw new Error(`${field} too long (max ${FIELD_KEY_ID_MAX_LEN})`);
  if (!FIELD_KEY_ID_PATTERN.test(clean)) throw new Error(`${field} contains unsupported characters`);
  return clean;
}

function cloneKeyring(keyring: FieldKeyring): FieldKeyring {
  const activeKid = assertFieldKeyId(keyring.activeKid, "keyring.activeKid");
  const entries = Object.entries(keyring.keys);
  if (entries.length === 0) throw new Error("keyring.keys must not be empty");

  const keys: Record<string, Uint8Array> = {};
  for (const [rawKid, rawKey] of entries) {
    const kid = assertFieldKeyId(rawKid, "keyring.keys[<kid>]");
    keys[kid] = new Uint8Array(expectBytes(rawKey, `keyring.keys[${kid}]`, FIELD_KEY_LEN));
  }
  if (!Object.prototype.hasOwnProperty.call(keys, activeKid)) {
    throw new Error("keyring.activeKid does not exist in keyring.keys");
  }
  return { activeKid, keys };
}

function decodeEncryptedFieldV1(bytes: Uint8Array): EncryptedFieldV1 {
  const rec = expectRecord(decodeCanonical(bytes), "encrypted field");
  if (rec.v !== 1) throw new Error("encrypted field version must be 1");
  if (rec.t !== ENCRYPTED_FIELD_V1_TAG) throw new Error("encrypted field tag mismatch");
  if (rec.alg !== "A256GCM") throw new Error(`unsupported field cipher ${String(rec.alg)}`);

  const nonce = expectBytes(rec.nonce, "encrypted field nonce", AES_GCM_NONCE_LEN);
  const ct = expectBytes(rec.ct, "encrypted field ct");
  const kid =
    rec.kid === undefined ? null : assertFieldKeyId(expectString(rec.kid, "encrypted field kid"), "encrypted field kid");
  return { nonce, ct, kid };
}

function tryDecodeEncryptedFieldV1(bytes: Uint8Array): EncryptedFieldV1 | null {
  try {
    return decodeEncryptedFieldV1(bytes);
  } catch {
    return null;
  }
}

export function generateFieldKey(): Uint8Array {
  return randomBytes(FIELD_KEY_LEN);
}

/** AES-256-GCM with a random 96-bit nonce per call, wrapped in a CBOR envelope. */
export function createAesGcmFieldCipher(): FieldCipher {
  return {
    async encrypt(key, plaintext, context, keyId) {
      assertContext(context);
      expectBytes(key, "key", FIELD_KEY_LEN);
      const kid = assertFieldKeyId(keyId ?? "k0", "keyId");
      const nonce = randomBytes(AES_GCM_NONCE_LEN);
      const ct = await aesGcm("encrypt", key, nonce, plaintext, fieldAadV1(context));
      return encodeCanonical({ v: 1, t: ENCRYPTED_FIELD_V1_TAG, alg: "A256GCM", nonce, ct, kid });
    },
    async decrypt(key, ciphertext, context) {
      assertContext(context);
      expectBytes(key, "key", FIELD_KEY_LEN);
      const decoded = decodeEncryptedFieldV1(ciphertext);
      return await aesGcm("decrypt", key, decoded.nonce, decoded.ct, fieldAadV1(context));
    },
  };
}

export function isEncryptedField(bytes: Uint8Array): boolean {
  return tryDecodeEncryptedFieldV1(bytes) !== null;
}

export function encryptedFieldKeyId(bytes: Uint8Array): string | null {
  return tryDecodeEncryptedFieldV1(bytes)?.kid ?? null;
}

export function createFieldKeyring(opts: { key: Uint8Array; activeKid?: string }): FieldKeyring {
  expectBytes(opts.key, "key", FIELD_KEY_LEN);
  const activeKid = assertFieldKeyId(opts.activeKid ?? randomFieldKeyIdV1(), "activeKid");
  return { activeKid, keys: { [activeKid]: new Uint8Array(opts.key) } };
}

export function upsertFieldKey(opts: {
  keyring: FieldKeyring;
  kid: string;
  key: Uint8Array;
  makeActive?: boolean;
}): FieldKeyring {
  const keyring = cloneKeyring(opts.keyring);
  const kid = assertFieldKeyId(opts.kid, "kid");
  expectBytes(opts.key, "key", FIELD_KEY_LEN);
  keyring.keys[kid] = new Uint8Array(opts.key);
  if (opts.makeActive ?? false) keyring.activeKid = kid;
  return keyring;
}

/** Adds a fresh key and makes it active. Older keys stay for decryption. */
export function rotateFieldKeyring(opts: { keyring: FieldKeyring; nextKid?: string; nextKey?: Uint8Array }): {
  keyring: FieldKeyring;
  rotatedKid: string;
} {
  const rotatedKid = assertFieldKeyId(opts.nextKid ?? randomFieldKeyIdV1(), "nextKid");
  const keyring = upsertFieldKey({
    keyring: opts.keyring,
    kid: rotatedKid,
    key: opts.nextKey ?? generateFieldKey(),
    makeActive: true,
  });
  return { keyring, rotatedKid };
}

export type OpenFieldResult =
  | { keyMissing: false; keyId: string | null; plaintext: Uint8Array }
  | { keyMissing: true; keyId: string | null; plaintext: null };

export async function encryptWithKeyring(
  cipher: FieldCipher,
  opts: { keyring: FieldKeyring; plaintext: Uint8Array; context: string },
): Promise<Uint8Array> {
  const keyring = cloneKeyring(opts.keyring);
  const key = keyring.keys[keyring.activeKid];
  if (!key) throw new Error("active field key is missing");
  return await cipher.encrypt(key, opts.plaintext, opts.context, keyring.activeKid);
}

/** Picks the key named by the envelope; reports `keyMissing` instead of throwing when it is not held. */
export async function decryptWithKeyring(
  cipher: FieldCipher,
  opts: { keyring: FieldKeyring; ciphertext: Uint8Array; context: string },
): Promise<OpenFieldResult> {
  const parsed = decodeEncryptedFieldV1(opts.ciphertext);
  const keyring = cloneKeyring(opts.keyring);
  const key = parsed.kid === null ? undefined : keyring.keys[parsed.kid];
  if (!key) return { keyMissing: true, keyId: parsed.kid, plaintext: null };
  const plaintext = await cipher.decrypt(key, opts.ciphertext, opts.context);
  return { keyMissing: false, keyId: parsed.kid, plaintext };
}

/** Canonical-encodes `value` and encrypts it into the blob stored under an encrypted field. */
export async function sealValue(
  cipher: FieldCipher,
  opts: { keyring: FieldKeyring; value: Value; context: string },
): Promise<Uint8Array> {
  return await encryptWithKeyring(cipher, { keyring: opts.keyring, plaintext: encodeValue(opts.value), context: opts.context });
}

export async function openValue(
  cipher: FieldCipher,
  opts: { keyring: FieldKeyring; blob: Uint8Array; context: string },
): Promise<Value> {
  const res = await decryptWithKeyring(cipher, { keyring: opts.keyring, ciphertext: opts.blob, context: opts.context });
  if (res.keyMissing) throw new Error(`field key ${res.keyId ?? "<none>"} is not in the keyring`);
  return decodeValue(res.plaintext);
}

/** Context string binding a field blob to its document and path. */
export function fieldContext(docKey: string, path: string): string {
  return `${docKey}#${path}`;
}
