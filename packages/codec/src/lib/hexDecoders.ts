// SPDX-License-Identifier: Apache-2.0

import { hexToBytes } from '@ethereumjs/util';
import { getAddress } from 'ethers';

import { isHex, prepend0x, strip0x } from '../formatters';
import { CodecError, predefined } from './errors/CodecError';

/**
 * A decoded JSON object, as returned by a node or built by application code.
 */
export type KeyedContainer = Readonly<Record<string, unknown>>;

export const isKeyedContainer = (value: unknown): value is KeyedContainer => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Parses a hex quantity. Any number of digits is accepted and `0x` alone is zero.
 */
export const parseHexQuantity = (key: string, value: unknown): bigint => {
  if (typeof value !== 'string' || !isHex(value)) {
    throw predefined.MALFORMED_HEX(key, value);
  }
  const digits = strip0x(value);
  return digits.length === 0 ? 0n : BigInt(`0x${digits}`);
};

/**
 * Parses a hex byte string. The digit count must be even.
 */
export const parseHexBytes = (key: string, value: unknown): Uint8Array => {
  if (typeof value !== 'string' || !isHex(value) || strip0x(value).length % 2 !== 0) {
    throw predefined.MALFORMED_HEX(key, value);
  }
  return hexToBytes(prepend0x(value));
};

/**
 * Parses an address and returns it in checksum form. A mixed-case input must
 * carry a valid checksum.
 */
export const parseAddress = (key: string, value: unknown): string => {
  if (typeof value !== 'string') {
    throw predefined.MALFORMED_ADDRESS(key, `expected a string, got ${typeof value}`);
  }
  try {
    return getAddress(value);
  } catch (e: unknown) {
    throw predefined.MALFORMED_ADDRESS(key, e instanceof Error ? e.message : String(value));
  }
};

const toSafeNumber = (key: string, value: bigint): number => {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw predefined.MALFORMED_HEX(key, `0x${value.toString(16)}`);
  }
  return Number(value);
};

/**
 * Field readers over a keyed container.
 *
 * Each reader comes in two flavours: the plain one fails with `MissingField`
 * when the key is absent, the `...Or` one returns the caller's default
 * instead. Both fail when the key is present with malformed content. A `null`
 * value counts as absent.
 */
export const HexDecoders = {
  has(container: KeyedContainer, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(container, key);
  },

  isPresent(container: KeyedContainer, key: string): boolean {
    return container[key] !== undefined && container[key] !== null;
  },

  required(container: KeyedContainer, key: string): unknown {
    if (!HexDecoders.isPresent(container, key)) {
      throw predefined.MISSING_FIELD(key);
    }
    return container[key];
  },

  quantity(container: KeyedContainer, key: string): bigint {
    return parseHexQuantity(key, HexDecoders.required(container, key));
  },

  quantityOr<T extends bigint | undefined>(container: KeyedContainer, key: string, fallback: T): bigint | T {
    return HexDecoders.isPresent(container, key) ? parseHexQuantity(key, container[key]) : fallback;
  },

  safeNumber(container: KeyedContainer, key: string): number {
    return toSafeNumber(key, HexDecoders.quantity(container, key));
  },

  safeNumberOr<T extends number | undefined>(container: KeyedContainer, key: string, fallback: T): number | T {
    return HexDecoders.isPresent(container, key) ? HexDecoders.safeNumber(container, key) : fallback;
  },

  bytes(container: KeyedContainer, key: string): Uint8Array {
    return parseHexBytes(key, HexDecoders.required(container, key));
  },

  bytesOr<T extends Uint8Array | undefined>(container: KeyedContainer, key: string, fallback: T): Uint8Array | T {
    return HexDecoders.isPresent(container, key) ? parseHexBytes(key, container[key]) : fallback;
  },

  address(container: KeyedContainer, key: string): string {
    return parseAddress(key, HexDecoders.required(container, key));
  },

  string(container: KeyedContainer, key: string): string {
    const value = HexDecoders.required(container, key);
    if (typeof value !== 'string') {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'a string', typeof value);
    }
    return value;
  },

  boolean(container: KeyedContainer, key: string): boolean {
    const value = HexDecoders.required(container, key);
    if (typeof value !== 'boolean') {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'a boolean', typeof value);
    }
    return value;
  },

  array(container: KeyedContainer, key: string): readonly unknown[] {
    const value = HexDecoders.required(container, key);
    if (!Array.isArray(value)) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'an array', typeof value);
    }
    return value;
  },

  object(container: KeyedContainer, key: string): KeyedContainer {
    const value = HexDecoders.required(container, key);
    if (!isKeyedContainer(value)) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'an object', Array.isArray(value) ? 'array' : typeof value);
    }
    return value;
  },
};

/**
 * Runs a decode step and substitutes `fallback` when it fails with a codec
 * error. Only for fields whose decode is best-effort; other errors propagate.
 */
export const orDefault = <T>(decode: () => T, fallback: T, onError?: (error: CodecError) => void): T => {
  try {
    return decode();
  } catch (e: unknown) {
    if (!CodecError.isCodecError(e)) {
      throw e;
    }
    onError?.(e);
    return fallback;
  }
};
