// SPDX-License-Identifier: Apache-2.0

import { RLP } from '@ethereumjs/rlp';
import { expect } from 'chai';

import { CodecError, CodecErrorKind } from '../src/lib/errors/CodecError';
import type { RlpItem } from '../src/lib/rlpContent';

/**
 * Runs `fn` and asserts that it throws a {@link CodecError} of the given kind.
 */
export const expectCodecError = (fn: () => unknown, kind: CodecErrorKind): CodecError => {
  try {
    fn();
  } catch (e: unknown) {
    if (!CodecError.isCodecError(e)) {
      throw e;
    }
    expect(e.is(kind), `expected a ${kind} error, got ${e.kind}`).to.be.true;
    return e;
  }
  return expect.fail(`expected a ${kind} error`);
};

/**
 * Narrows a decoded RLP item to a byte string.
 */
export const asBytes = (item: RlpItem | undefined): Uint8Array => {
  if (!(item instanceof Uint8Array)) {
    return expect.fail('expected an RLP byte string');
  }
  return item;
};

/**
 * Narrows a decoded RLP item to a list.
 */
export const asList = (item: RlpItem | undefined): RlpItem[] => {
  if (item === undefined || item instanceof Uint8Array) {
    return expect.fail('expected an RLP list');
  }
  return item;
};

/**
 * Decodes the RLP list that follows the one-byte EIP-2718 type prefix.
 */
export const decodeTypedPayload = (encoded: Uint8Array): RlpItem[] => {
  return asList(RLP.decode(encoded.subarray(1)));
};

export const bytesOfLength = (length: number, fill: number): Uint8Array => new Uint8Array(length).fill(fill);
