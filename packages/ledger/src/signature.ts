/**
 * @wcam/ledger — secp256k1 signer recovery.
 *
 * Default SignatureRecovery for permits. Accepts only canonical 65-byte
 * r || s || v signatures:
 * - v is 27 or 28
 * - 0 < r < n and 0 < s <= n/2 (low-s, no malleable twins)
 *
 * Anything else is reported as "no recovery possible" (null).
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { hexToBigInt, hexToBytes, hexToNumber, isHex, slice, toHex, type Address, type Hex } from "viem";
import { publicKeyToAddress } from "viem/accounts";

const CURVE_ORDER = secp256k1.CURVE.n;
const HALF_CURVE_ORDER = CURVE_ORDER >> 1n;

/** "0x" + 65 bytes of hex */
const SIGNATURE_HEX_LENGTH = 2 + 65 * 2;

export function recoverSigner(digest: Hex, signature: Hex): Address | null {
  if (!isHex(signature, { strict: true }) || signature.length !== SIGNATURE_HEX_LENGTH) {
    return null;
  }
  if (!isHex(digest, { strict: true }) || digest.length !== 66) {
    return null;
  }

  const r = hexToBigInt(slice(signature, 0, 32));
  const s = hexToBigInt(slice(signature, 32, 64));
  const v = hexToNumber(slice(signature, 64, 65));

  if (v !== 27 && v !== 28) return null;
  if (r === 0n || r >= CURVE_ORDER) return null;
  if (s === 0n || s > HALF_CURVE_ORDER) return null;

  let publicKey: Uint8Array;
  try {
    publicKey = new secp256k1.Signature(r, s)
      .addRecoveryBit(v - 27)
      .recoverPublicKey(hexToBytes(digest))
      .toRawBytes(false);
  } catch {
    // r is not the x-coordinate of any curve point
    return null;
  }

  return publicKeyToAddress(toHex(publicKey));
}
