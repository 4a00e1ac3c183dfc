// SPDX-License-Identifier: Apache-2.0

import type { NestedUint8Array } from '@ethereumjs/rlp';
import { bytesToBigInt, bytesToHex } from '@ethereumjs/util';
import { getAddress } from 'ethers';

import constants from './constants';
import { predefined } from './errors/CodecError';
import { IPaymasterParams } from './types';

export type RlpItem = Uint8Array | NestedUint8Array;

/**
 * Shape of one decoded RLP position: missing, a byte string, or a nested list.
 */
export type RlpContent =
  | { readonly kind: 'noItem' }
  | { readonly kind: 'data'; readonly bytes: Uint8Array }
  | { readonly kind: 'list'; readonly items: readonly RlpItem[] };

export const classifyRlpItem = (item: RlpItem | undefined): RlpContent => {
  if (item === undefined) {
    return { kind: 'noItem' };
  }
  if (item instanceof Uint8Array) {
    return { kind: 'data', bytes: item };
  }
  return { kind: 'list', items: item };
};

const describeContent = (content: RlpContent): string => {
  switch (content.kind) {
    case 'noItem':
      return 'no item';
    case 'data':
      return `a ${content.bytes.length}-byte string`;
    case 'list':
      return `a list of ${content.items.length} items`;
  }
};

/**
 * Reads a byte string. Lists and missing items are rejected.
 */
export const decodeScalar = (field: string, item: RlpItem | undefined): Uint8Array => {
  const content = classifyRlpItem(item);
  switch (content.kind) {
    case 'data':
      return content.bytes;
    case 'noItem':
    case 'list':
      throw predefined.UNEXPECTED_VARIANT_SHAPE(field, 'a byte string', describeContent(content));
  }
};

export const decodeQuantity = (field: string, item: RlpItem | undefined): bigint => {
  return bytesToBigInt(decodeScalar(field, item));
};

/**
 * Reads an optional address: missing or empty is `undefined`, exactly 20 bytes
 * is an address, anything else fails.
 */
export const decodeOptionalAddress = (field: string, item: RlpItem | undefined): string | undefined => {
  const content = classifyRlpItem(item);
  switch (content.kind) {
    case 'noItem':
      return undefined;
    case 'data':
      if (content.bytes.length === 0) {
        return undefined;
      }
      if (content.bytes.length !== constants.ADDRESS_BYTE_LENGTH) {
        throw predefined.MALFORMED_ADDRESS(
          field,
          `expected ${constants.ADDRESS_BYTE_LENGTH} bytes, got ${content.bytes.length}`,
        );
      }
      return getAddress(bytesToHex(content.bytes));
    case 'list':
      throw predefined.UNEXPECTED_VARIANT_SHAPE(field, 'an address', describeContent(content));
  }
};

/**
 * Reads the factory dependency list. A missing item or a byte string is an
 * empty list; every element of a list must be a byte string.
 */
export const decodeFactoryDeps = (field: string, item: RlpItem | undefined): Uint8Array[] => {
  const content = classifyRlpItem(item);
  switch (content.kind) {
    case 'noItem':
    case 'data':
      return [];
    case 'list':
      return content.items.map((element, index) => decodeScalar(`${field}[${index}]`, element));
  }
};

/**
 * Reads the paymaster pair. Elements are told apart by length: 20 bytes is the
 * paymaster address, anything else is the paymaster input. The pair exists only
 * when both were found; a second element of either kind is rejected.
 */
export const decodePaymasterPair = (field: string, item: RlpItem | undefined): IPaymasterParams | undefined => {
  const content = classifyRlpItem(item);
  switch (content.kind) {
    case 'noItem':
    case 'data':
      return undefined;
    case 'list': {
      let paymaster: string | undefined;
      let paymasterInput: Uint8Array | undefined;

      for (const [index, element] of content.items.entries()) {
        const bytes = decodeScalar(`${field}[${index}]`, element);
        if (bytes.length === constants.ADDRESS_BYTE_LENGTH) {
          if (paymaster !== undefined) {
            throw predefined.UNEXPECTED_VARIANT_SHAPE(field, 'a single paymaster address', 'more than one');
          }
          paymaster = getAddress(bytesToHex(bytes));
        } else {
          if (paymasterInput !== undefined) {
            throw predefined.UNEXPECTED_VARIANT_SHAPE(field, 'a single paymaster input', 'more than one');
          }
          paymasterInput = bytes;
        }
      }

      if (paymaster === undefined || paymasterInput === undefined) {
        return undefined;
      }
      return { paymaster, paymasterInput };
    }
  }
};
