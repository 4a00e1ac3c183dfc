// SPDX-License-Identifier: Apache-2.0

import { bytesToHex } from '@ethereumjs/util';

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

const strip0x = (value: string): string => {
  return value.startsWith('0x') || value.startsWith('0X') ? value.substring(2) : value;
};

const prepend0x = (value: string): `0x${string}` => {
  return `0x${strip0x(value)}`;
};

/**
 * Checks for a hex digit string, with or without a `0x` prefix.
 * An empty digit string (`0x`) counts as hex.
 */
const isHex = (value: string): boolean => {
  return HEX_DIGITS.test(strip0x(value));
};

const numberTo0x = (input: number | bigint): `0x${string}` => {
  return `0x${input.toString(16)}`;
};

const toHexString = (bytes: Uint8Array): string => {
  return strip0x(bytesToHex(bytes));
};

const bytesTo0x = (bytes: Uint8Array): `0x${string}` => {
  return prepend0x(toHexString(bytes));
};

export { bytesTo0x, isHex, numberTo0x, prepend0x, strip0x, toHexString };
