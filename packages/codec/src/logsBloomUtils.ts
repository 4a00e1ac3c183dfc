// SPDX-License-Identifier: Apache-2.0

import { getBytes, keccak256 } from 'ethers';

import constants from './lib/constants';
import { predefined } from './lib/errors/CodecError';

const BLOOM_MASK = 0x7ff;
const BLOOM_HASHES = 3;

/**
 * Bit positions an element sets in a 2048-bit logs bloom, as
 * `[byteIndex, bitMask]` pairs.
 */
const bloomBits = (element: Uint8Array): [number, number][] => {
  const hash = getBytes(keccak256(element));
  const bits: [number, number][] = [];
  for (let i = 0; i < BLOOM_HASHES; i++) {
    const position = ((hash[i * 2] << 8) | hash[i * 2 + 1]) & BLOOM_MASK;
    bits.push([constants.LOGS_BLOOM_BYTE_LENGTH - 1 - (position >> 3), 1 << (position % 8)]);
  }
  return bits;
};

export class LogsBloomUtils {
  /**
   * Validates a logs bloom read from a receipt or block.
   */
  public static fromBytes(bytes: Uint8Array): Uint8Array {
    if (bytes.length !== constants.LOGS_BLOOM_BYTE_LENGTH) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(
        'logsBloom',
        `${constants.LOGS_BLOOM_BYTE_LENGTH} bytes`,
        `${bytes.length} bytes`,
      );
    }
    return bytes;
  }

  public static empty(): Uint8Array {
    return new Uint8Array(constants.LOGS_BLOOM_BYTE_LENGTH);
  }

  /**
   * Builds the bloom of a single log from its emitter address and topics.
   */
  public static buildLogsBloom(address: string, topics: readonly Uint8Array[]): Uint8Array {
    const bloom = LogsBloomUtils.empty();
    for (const element of [getBytes(address), ...topics]) {
      for (const [byteIndex, mask] of bloomBits(element)) {
        bloom[byteIndex] |= mask;
      }
    }
    return bloom;
  }

  /**
   * False means the element is certainly absent; true means it may be present.
   */
  public static mayContain(bloom: Uint8Array, element: Uint8Array): boolean {
    return bloomBits(element).every(([byteIndex, mask]) => (bloom[byteIndex] & mask) !== 0);
  }
}
