import { hashes as ed25519Hashes, getPublicKey as getPublicKeyImpl, sign as signImpl, utils, verify as verifyImpl } from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha512";

let ed25519Ready = false;

export function ensureEd25519(): void {
  if (ed25519Ready) return;
  ed25519Hashes.sha512 = sha512;
  ed25519Ready = true;
}

export function randomEd25519SecretKey(): Uint8Array {
  ensureEd25519();
  return utils.randomSecretKey();
}

export function getEd25519PublicKey(secretKey: Uint8Array): Uint8Array {
  ensureEd25519();
  return getPublicKeyImpl(secretKey);
}

export function signEd25519(message: Uint8Array, secretKey: Uint8Array): Uint8Array {
  ensureEd25519();
  return signImpl(message, secretKey);
}

export function verifyEd25519(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  ensureEd25519();
  try {
    return verifyImpl(signature, message, publicKey);
  } catch {
    // malformed keys or signatures count as invalid votes
    return false;
  }
}
