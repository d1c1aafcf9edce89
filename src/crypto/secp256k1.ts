import { secp256k1 } from "@noble/curves/secp256k1";
import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex } from "../utils/bytes";
import type { Address } from "../types/brands";

export type PrivKey = Uint8Array;
export type PubKey = Uint8Array;

export type RecoverableSig = { r: bigint; s: bigint; recovery: number };

/** Uncompressed (65-byte) public key. */
export const pub = (priv: PrivKey): PubKey => secp256k1.getPublicKey(priv, false);

/** Account address: last 20 bytes of keccak(X ‖ Y). */
export const addr = (pubKey: PubKey): Address =>
  bytesToHex(keccak_256(pubKey.slice(1)).slice(-20));

export const sign = (msgHash: Uint8Array, priv: PrivKey): RecoverableSig => {
  const sig = secp256k1.sign(msgHash, priv);
  return { r: sig.r, s: sig.s, recovery: sig.recovery };
};

/** Throws when (r, s, recovery) do not recover to a point. */
export const recoverAddress = (msgHash: Uint8Array, sig: RecoverableSig): Address => {
  const point = new secp256k1.Signature(sig.r, sig.s)
    .addRecoveryBit(sig.recovery)
    .recoverPublicKey(msgHash);
  return addr(point.toRawBytes(false));
};
