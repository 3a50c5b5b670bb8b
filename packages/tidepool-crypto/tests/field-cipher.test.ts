import { expect, test } from "vitest";

import { encodeCanonical } from "@tidepool/crdt";
import { DocumentStore, createLogger, docKey } from "@tidepool/store";

import {
  createAesGcmFieldCipher,
  createFieldKeyring,
  decryptWithKeyring,
  encryptedFieldKeyId,
  fieldContext,
  generateFieldKey,
  isEncryptedField,
  openValue,
  rotateFieldKeyring,
  sealValue,
} from "../src/index.js";

const cipher = createAesGcmFieldCipher();

test("encrypt/decrypt roundtrip", async () => {
  const key = generateFieldKey();
  const ct = await cipher.encrypt(key, new TextEncoder().encode("hello"), "notes/n1#secret");
  expect(isEncryptedField(ct)).toBe(true);
  expect(encryptedFieldKeyId(ct)).toBe("k0");
  expect(new TextDecoder().decode(await cipher.decrypt(key, ct, "notes/n1#secret"))).toBe("hello");
});

test("decrypt fails under another context", async () => {
  const key = generateFieldKey();
  const ct = await cipher.encrypt(key, new TextEncoder().encode("hello"), "notes/n1#secret");
  await expect(cipher.decrypt(key, ct, "notes/n2#secret")).rejects.toThrow();
});

test("decrypt fails with the wrong key", async () => {
  const ct = await cipher.encrypt(generateFieldKey(), Uint8Array.from([1, 2, 3]), "ctx");
  await expect(cipher.decrypt(generateFieldKey(), ct, "ctx")).rejects.toThrow();
});

test("keys must be 32 bytes and contexts non-empty", async () => {
  await expect(cipher.encrypt(new Uint8Array(16), new Uint8Array(1), "ctx")).rejects.toThrow(
    "key: expected 32 bytes, got 16",
  );
  await expect(cipher.encrypt(generateFieldKey(), new Uint8Array(1), " ")).rejects.toThrow(
    "context must not be empty",
  );
});

test("non-envelope bytes are not encrypted fields", () => {
  expect(isEncryptedField(Uint8Array.from([1, 2, 3, 4]))).toBe(false);
  expect(encryptedFieldKeyId(Uint8Array.from([1, 2, 3, 4]))).toBe(null);
  const nonce = new Uint8Array(12);
  const envelope = { v: 1, t: "tidepool/field-encrypted/v1", alg: "A256GCM", nonce, ct: new Uint8Array(16), kid: "k1" };
  expect(encryptedFieldKeyId(encodeCanonical(envelope))).toBe("k1");
  expect(isEncryptedField(encodeCanonical({ ...envelope, v: 2 }))).toBe(false);
  expect(isEncryptedField(encodeCanonical({ ...envelope, nonce: new Uint8Array(8) }))).toBe(false);
});

test("rotation keeps old keys for reading and tags new blobs with the new kid", async () => {
  const keyring = createFieldKeyring({ key: generateFieldKey(), activeKid: "epoch-1" });
  const old = await sealValue(cipher, { keyring, value: { card: "4111" }, context: "ctx" });

  const { keyring: rotated, rotatedKid } = rotateFieldKeyring({ keyring, nextKid: "epoch-2" });
  expect(rotatedKid).toBe("epoch-2");
  expect(rotated.activeKid).toBe("epoch-2");
  expect(Object.keys(rotated.keys).sort()).toEqual(["epoch-1", "epoch-2"]);
  expect(keyring.activeKid).toBe("epoch-1");

  const fresh = await sealValue(cipher, { keyring: rotated, value: "new", context: "ctx" });
  expect(encryptedFieldKeyId(fresh)).toBe("epoch-2");
  expect(await openValue(cipher, { keyring: rotated, blob: old, context: "ctx" })).toEqual({ card: "4111" });
  expect(await openValue(cipher, { keyring: rotated, blob: fresh, context: "ctx" })).toBe("new");
});

test("a blob under an unknown kid reports keyMissing", async () => {
  const sender = createFieldKeyring({ key: generateFieldKey(), activeKid: "epoch-1" });
  const receiver = createFieldKeyring({ key: generateFieldKey(), activeKid: "epoch-2" });
  const blob = await sealValue(cipher, { keyring: sender, value: 42, context: "ctx" });

  const res = await decryptWithKeyring(cipher, { keyring: receiver, ciphertext: blob, context: "ctx" });
  expect(res).toEqual({ keyMissing: true, keyId: "epoch-1", plaintext: null });
  await expect(openValue(cipher, { keyring: receiver, blob, context: "ctx" })).rejects.toThrow(
    "field key epoch-1 is not in the keyring",
  );
});

test("invalid key ids are refused", () => {
  expect(() => createFieldKeyring({ key: generateFieldKey(), activeKid: "has space" })).toThrow(
    "activeKid contains unsupported characters",
  );
});

test("sealed blobs travel through an encrypted store field untouched", async () => {
  const store = new DocumentStore({ actor: "A", logger: createLogger({ level: "silent" }) });
  store.registerSchema({
    namespace: "people",
    version: 1,
    fields: [
      { path: "name", type: "string", strategy: "lww" },
      { path: "ssn", type: "bytes", strategy: "lww", encrypted: true },
    ],
  });
  const keyring = createFieldKeyring({ key: generateFieldKey(), activeKid: "k1" });
  const ref = { namespace: "people", id: "p1" };
  const context = fieldContext(docKey(ref), "ssn");
  expect(context).toBe("people/p1#ssn");

  const blob = await sealValue(cipher, { keyring, value: "123-45-6789", context });
  store.create("people", "p1", { name: "Ana", ssn: blob });

  const stored = store.read(ref).ssn;
  expect(stored instanceof Uint8Array).toBe(true);
  if (!(stored instanceof Uint8Array)) return;
  expect(await openValue(cipher, { keyring, blob: stored, context })).toBe("123-45-6789");
});
