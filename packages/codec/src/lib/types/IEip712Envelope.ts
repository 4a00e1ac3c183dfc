// SPDX-License-Identifier: Apache-2.0

import { TransactionType } from '../constants';

/**
 * Sponsor of the transaction fees and the data handed to it.
 *
 * @property paymaster - Checksummed paymaster address.
 * @property paymasterInput - Calldata passed to the paymaster.
 */
export interface IPaymasterParams {
  readonly paymaster?: string;
  readonly paymasterInput?: Uint8Array;
}

/**
 * L2 metadata carried by an EIP-712 envelope.
 *
 * @property gasPerPubdata - Gas the sender pays per byte of published data.
 * @property customSignature - Raw signature replacing the `(r, s, v)` triplet, e.g. for account abstraction.
 * @property paymasterParams - Fee sponsor, if any.
 * @property factoryDeps - Bytecode blobs the transaction deploys or references.
 */
export interface IEip712Meta {
  readonly gasPerPubdata?: bigint;
  readonly customSignature?: Uint8Array;
  readonly paymasterParams?: IPaymasterParams;
  readonly factoryDeps: readonly Uint8Array[];
}

export interface IAccessListEntry {
  readonly address: string;
  readonly storageKeys: readonly string[];
}

export interface IEip712Envelope {
  readonly type: TransactionType.Eip712;
  readonly nonce: bigint;
  readonly chainId: bigint;
  // checksummed address, or the contract deployment sentinel
  readonly to: string;
  readonly value: bigint;
  readonly data: Uint8Array;
  readonly v: bigint;
  readonly r: bigint;
  readonly s: bigint;
  readonly gasLimit: bigint;
  readonly maxPriorityFeePerGas: bigint;
  readonly maxFeePerGas: bigint;
  readonly gasPrice: bigint;
  readonly accessList: readonly IAccessListEntry[];
  // sender; empty in the broadcast form when unknown
  readonly from?: string;
  readonly meta?: IEip712Meta;
}

/**
 * Builder input: everything but `to` may be omitted and falls back to its default.
 */
export type IEip712EnvelopeParams = Partial<Omit<IEip712Envelope, 'type' | 'to'>> & {
  to?: string | null;
};

export interface IPaymasterParamsJson {
  paymaster?: string;
  paymasterInput?: number[];
}

/**
 * JSON form of the metadata. Byte blobs are arrays of byte values, the shape
 * L2 nodes accept for `factoryDeps` and `paymasterInput`.
 */
export interface IEip712MetaJson {
  gasPerPubdata?: string;
  customSignature?: string;
  paymasterParams?: IPaymasterParamsJson;
  factoryDeps?: number[][];
}

/**
 * JSON-RPC request form of an envelope. Quantities and data are 0x-prefixed hex.
 */
export interface IEip712EnvelopeJson {
  type: string;
  nonce: string;
  chainId: string;
  to: string | null;
  from?: string;
  value: string;
  data: string;
  gas: string;
  gasPrice: string;
  maxPriorityFeePerGas: string;
  maxFeePerGas: string;
  accessList: { address: string; storageKeys: string[] }[];
  v: string;
  r: string;
  s: string;
  eip712Meta?: IEip712MetaJson;
}
