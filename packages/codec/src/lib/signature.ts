// SPDX-License-Identifier: Apache-2.0

import { concat, getBytes, hexlify, Signature, toBeHex, toBigInt } from 'ethers';

import constants from './constants';
import { predefined } from './errors/CodecError';

export interface ISignatureTriplet {
  readonly r: bigint;
  readonly s: bigint;
  readonly v: bigint;
}

const WORD_BYTE_LENGTH = 32;
const COMPACT_SIGNATURE_BYTE_LENGTH = 64;

const assertFits = (component: string, value: bigint, byteLength: number): void => {
  if (value < 0n || value >= 1n << BigInt(byteLength * 8)) {
    throw predefined.SIGNATURE_OUT_OF_RANGE(component, value, byteLength);
  }
};

/**
 * Fails unless `r` and `s` fit in 32 bytes and `v` in one.
 */
export const assertSignatureRange = (signature: ISignatureTriplet): void => {
  assertFits('r', signature.r, WORD_BYTE_LENGTH);
  assertFits('s', signature.s, WORD_BYTE_LENGTH);
  assertFits('v', signature.v, 1);
};

/**
 * Serializes a signature as `r (32 bytes) || s (32 bytes) || v (1 byte)`.
 * `v` is written as is, so a parity (0/1) and a 27/28 value both survive a
 * round trip.
 */
export const marshalSignature = (signature: ISignatureTriplet): Uint8Array => {
  assertSignatureRange(signature);
  return getBytes(
    concat([toBeHex(signature.r, WORD_BYTE_LENGTH), toBeHex(signature.s, WORD_BYTE_LENGTH), toBeHex(signature.v, 1)]),
  );
};

/**
 * Reads the compact 64-byte form (EIP-2098), where the parity is folded into
 * the top bit of `s`. `v` comes back as 27 or 28.
 */
const unmarshalCompact = (bytes: Uint8Array): ISignatureTriplet => {
  try {
    const signature = Signature.from(hexlify(bytes));
    return {
      r: BigInt(signature.r),
      s: BigInt(signature.s),
      v: BigInt(signature.v),
    };
  } catch (e: unknown) {
    throw predefined.SIGNATURE_UNMARSHAL_FAILURE(e instanceof Error ? e.message : 'unknown error');
  }
};

/**
 * Recovers `(r, s, v)` from a serialized signature: 65 bytes with a raw `v`
 * byte, or the compact 64-byte form. A high `s` or any other length is rejected.
 */
export const unmarshalSignature = (bytes: Uint8Array): ISignatureTriplet => {
  if (bytes.length === COMPACT_SIGNATURE_BYTE_LENGTH) {
    return unmarshalCompact(bytes);
  }
  if (bytes.length !== constants.SIGNATURE_BYTE_LENGTH) {
    throw predefined.SIGNATURE_UNMARSHAL_FAILURE(
      `expected ${constants.SIGNATURE_BYTE_LENGTH} bytes, got ${bytes.length}`,
    );
  }

  const s = bytes.subarray(WORD_BYTE_LENGTH, 2 * WORD_BYTE_LENGTH);
  if ((s[0] & 0x80) !== 0) {
    throw predefined.SIGNATURE_UNMARSHAL_FAILURE('non-canonical s');
  }

  return {
    r: toBigInt(bytes.subarray(0, WORD_BYTE_LENGTH)),
    s: toBigInt(s),
    v: BigInt(bytes[2 * WORD_BYTE_LENGTH]),
  };
};
