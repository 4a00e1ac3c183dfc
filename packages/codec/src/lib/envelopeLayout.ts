// SPDX-License-Identifier: Apache-2.0

/**
 * Positions of the EIP-712 envelope fields in the broadcast (raw transaction) RLP list.
 *
 * The chain id appears twice. Both copies are written on encode; on decode the
 * second one is the value kept. `Reserved1` and `Reserved2` are written as empty
 * strings and ignored on decode.
 */
export enum BroadcastField {
  Nonce = 0,
  MaxPriorityFeePerGas = 1,
  MaxFeePerGas = 2,
  GasLimit = 3,
  To = 4,
  Value = 5,
  Data = 6,
  ChainId = 7,
  Reserved1 = 8,
  Reserved2 = 9,
  ChainIdRepeated = 10,
  From = 11,
  GasPerPubdata = 12,
  FactoryDeps = 13,
  CustomSignature = 14,
  PaymasterParams = 15,
}

/**
 * Positions of the fields in the RLP list that is signed. The signature itself
 * is absent and the sender, gas price, access list and metadata are added.
 */
export enum SigningField {
  Nonce = 0,
  MaxPriorityFeePerGas = 1,
  MaxFeePerGas = 2,
  GasLimit = 3,
  To = 4,
  From = 5,
  Value = 6,
  Data = 7,
  ChainId = 8,
  GasPrice = 9,
  AccessList = 10,
  Meta = 11,
}

export const BROADCAST_POSITIONS: readonly BroadcastField[] = Object.values(BroadcastField)
  .filter((value): value is BroadcastField => typeof value === 'number')
  .sort((a, b) => a - b);

export const SIGNING_POSITIONS: readonly SigningField[] = Object.values(SigningField)
  .filter((value): value is SigningField => typeof value === 'number')
  .sort((a, b) => a - b);

export const BROADCAST_FIELD_COUNT = BROADCAST_POSITIONS.length;

export const SIGNING_FIELD_COUNT = SIGNING_POSITIONS.length;

/**
 * Lays out a field table as the positional list it describes.
 */
export const orderFields = <F extends number, T>(positions: readonly F[], fields: Record<F, T>): T[] => {
  return positions.map((position) => fields[position]);
};
