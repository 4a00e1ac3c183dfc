// SPDX-License-Identifier: Apache-2.0

import { Input, RLP } from '@ethereumjs/rlp';
import { bigIntToUnpaddedBytes, bytesToBigInt, concatBytes, equalsBytes, intToBytes } from '@ethereumjs/util';
import { getBytes } from 'ethers';

import { bytesTo0x, numberTo0x } from '../../formatters';
import constants, { TransactionType } from '../constants';
import {
  BROADCAST_FIELD_COUNT,
  BROADCAST_POSITIONS,
  BroadcastField,
  orderFields,
  SIGNING_POSITIONS,
  SigningField,
} from '../envelopeLayout';
import { CodecError, predefined } from '../errors/CodecError';
import { HexDecoders, isKeyedContainer, KeyedContainer, orDefault, parseAddress, parseHexBytes } from '../hexDecoders';
import { logger } from '../logger';
import {
  classifyRlpItem,
  decodeFactoryDeps,
  decodeOptionalAddress,
  decodePaymasterPair,
  decodeQuantity,
  decodeScalar,
  RlpItem,
} from '../rlpContent';
import { assertSignatureRange, marshalSignature, unmarshalSignature } from '../signature';
import { IAccessListEntry, IEip712Envelope, IEip712EnvelopeJson, IEip712EnvelopeParams, IEip712Meta } from '../types';
import { Eip712MetaFactory } from './eip712MetaFactory';

const log = logger.child({ module: 'eip712EnvelopeFactory' });

// keys whose absence means the JSON object is not an EIP-712 envelope
const REQUIRED_JSON_KEYS = ['to', 'nonce', 'value', 'chainId', 'v', 'r', 's'] as const;

const DEPLOYMENT_TARGETS = new Set(['', '0x', '0x0']);

/**
 * Maps an empty or zero-valued `to` onto the contract deployment sentinel and
 * checksums any other address.
 */
const normalizeTo = (to: unknown): string => {
  if (to === undefined || to === null) {
    return constants.CONTRACT_DEPLOYMENT_ADDRESS;
  }
  if (typeof to === 'string' && DEPLOYMENT_TARGETS.has(to.toLowerCase())) {
    return constants.CONTRACT_DEPLOYMENT_ADDRESS;
  }
  return parseAddress('to', to);
};

/**
 * Reads an access list in its JSON form: `[{ address, storageKeys: [key, ...] }, ...]`.
 * Addresses come back checksummed and storage keys as lowercase 32-byte hex.
 */
const decodeAccessList = (key: string, value: unknown): IAccessListEntry[] => {
  if (!Array.isArray(value)) {
    throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'an access list', typeof value);
  }
  return value.map((entry: unknown, index) => {
    if (!isKeyedContainer(entry)) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE(`${key}[${index}]`, 'an access list entry', typeof entry);
    }
    const storageKeys = HexDecoders.array(entry, 'storageKeys').map((storageKey, keyIndex) => {
      const bytes = parseHexBytes(`${key}[${index}].storageKeys[${keyIndex}]`, storageKey);
      if (bytes.length !== constants.HASH_BYTE_LENGTH) {
        throw predefined.MALFORMED_HEX(`${key}[${index}].storageKeys[${keyIndex}]`, storageKey);
      }
      return bytesTo0x(bytes);
    });
    return { address: HexDecoders.address(entry, 'address'), storageKeys };
  });
};

const encodeAccessList = (accessList: readonly IAccessListEntry[]): Input => {
  return accessList.map((entry) => [getBytes(entry.address), entry.storageKeys.map((key) => getBytes(key))]);
};

const rejectionReason = (e: CodecError) => ({ kind: e.kind, reason: e.message });

/**
 * Builds, encodes and decodes EIP-712 (type `0x71`) transaction envelopes.
 *
 * An envelope travels in three forms: the JSON object returned by a node, the
 * raw RLP bytes that are broadcast, and the structured value built here. The
 * `from...` decoders return `null` when the input is not a well formed envelope
 * so that callers can try the next candidate type; the `parse...` variants throw
 * the underlying {@link CodecError} instead.
 */
export class Eip712EnvelopeFactory {
  public static readonly TYPE = TransactionType.Eip712;

  /**
   * Builds an envelope, filling in defaults for every omitted field.
   *
   * @param params - Envelope fields; `to` left empty targets contract deployment.
   * @returns Frozen envelope.
   * @throws CodecError when `r` or `s` exceeds 32 bytes or `v` exceeds one byte.
   */
  public static createEnvelope(params: IEip712EnvelopeParams = {}): IEip712Envelope {
    const signature = {
      v: params.v ?? constants.DEFAULT_SIGNATURE_V,
      r: params.r ?? constants.DEFAULT_SIGNATURE_R,
      s: params.s ?? constants.DEFAULT_SIGNATURE_S,
    };
    assertSignatureRange(signature);

    return Object.freeze({
      type: TransactionType.Eip712,
      nonce: params.nonce ?? 0n,
      chainId: params.chainId ?? 0n,
      to: normalizeTo(params.to),
      value: params.value ?? 0n,
      data: params.data ?? new Uint8Array(0),
      ...signature,
      gasLimit: params.gasLimit ?? 0n,
      maxPriorityFeePerGas: params.maxPriorityFeePerGas ?? 0n,
      maxFeePerGas: params.maxFeePerGas ?? 0n,
      gasPrice: params.gasPrice ?? 0n,
      accessList: Object.freeze(decodeAccessList('accessList', params.accessList ?? [])),
      ...(params.from !== undefined ? { from: parseAddress('from', params.from) } : {}),
      ...(params.meta !== undefined ? { meta: Eip712MetaFactory.createMeta(params.meta) } : {}),
    });
  }

  /**
   * Encodes the envelope as a raw transaction ready to be broadcast:
   * `0x71 || RLP([...16 fields])`, laid out as {@link BroadcastField}.
   *
   * Without a custom signature in the metadata, the `(r, s, v)` triplet is
   * marshalled into the custom signature slot.
   */
  public static encodeForBroadcast(envelope: IEip712Envelope): Uint8Array {
    const meta = envelope.meta;
    const fields: Record<BroadcastField, Input> = {
      [BroadcastField.Nonce]: bigIntToUnpaddedBytes(envelope.nonce),
      [BroadcastField.MaxPriorityFeePerGas]: bigIntToUnpaddedBytes(envelope.maxPriorityFeePerGas),
      [BroadcastField.MaxFeePerGas]: bigIntToUnpaddedBytes(envelope.maxFeePerGas),
      [BroadcastField.GasLimit]: bigIntToUnpaddedBytes(envelope.gasLimit),
      [BroadcastField.To]: getBytes(envelope.to),
      [BroadcastField.Value]: bigIntToUnpaddedBytes(envelope.value),
      [BroadcastField.Data]: envelope.data,
      [BroadcastField.ChainId]: bigIntToUnpaddedBytes(envelope.chainId),
      [BroadcastField.Reserved1]: new Uint8Array(0),
      [BroadcastField.Reserved2]: new Uint8Array(0),
      [BroadcastField.ChainIdRepeated]: bigIntToUnpaddedBytes(envelope.chainId),
      [BroadcastField.From]: envelope.from !== undefined ? getBytes(envelope.from) : new Uint8Array(0),
      [BroadcastField.GasPerPubdata]: bigIntToUnpaddedBytes(meta?.gasPerPubdata ?? 0n),
      [BroadcastField.FactoryDeps]: [...(meta?.factoryDeps ?? [])],
      [BroadcastField.CustomSignature]: meta?.customSignature ?? marshalSignature(envelope),
      [BroadcastField.PaymasterParams]: Eip712MetaFactory.pairForBroadcast(meta),
    };

    return concatBytes(intToBytes(TransactionType.Eip712), RLP.encode(orderFields(BROADCAST_POSITIONS, fields)));
  }

  /**
   * Encodes the fields covered by the signature: `0x71 || RLP([...12 fields])`,
   * laid out as {@link SigningField}. The signature is not part of it; the
   * sender, gas price, access list and metadata block are.
   */
  public static encodeForSigning(envelope: IEip712Envelope): Uint8Array {
    const fields: Record<SigningField, Input> = {
      [SigningField.Nonce]: bigIntToUnpaddedBytes(envelope.nonce),
      [SigningField.MaxPriorityFeePerGas]: bigIntToUnpaddedBytes(envelope.maxPriorityFeePerGas),
      [SigningField.MaxFeePerGas]: bigIntToUnpaddedBytes(envelope.maxFeePerGas),
      [SigningField.GasLimit]: bigIntToUnpaddedBytes(envelope.gasLimit),
      [SigningField.To]: getBytes(envelope.to),
      [SigningField.From]: envelope.from !== undefined ? getBytes(envelope.from) : null,
      [SigningField.Value]: bigIntToUnpaddedBytes(envelope.value),
      [SigningField.Data]: envelope.data,
      [SigningField.ChainId]: bigIntToUnpaddedBytes(envelope.chainId),
      [SigningField.GasPrice]: bigIntToUnpaddedBytes(envelope.gasPrice),
      [SigningField.AccessList]: encodeAccessList(envelope.accessList),
      [SigningField.Meta]: Eip712MetaFactory.toSigningFields(envelope.meta),
    };

    return concatBytes(intToBytes(TransactionType.Eip712), RLP.encode(orderFields(SIGNING_POSITIONS, fields)));
  }

  /**
   * Hex form of {@link encodeForBroadcast}, as passed to `eth_sendRawTransaction`.
   */
  public static serialize(envelope: IEip712Envelope): string {
    return bytesTo0x(Eip712EnvelopeFactory.encodeForBroadcast(envelope));
  }

  /**
   * Decodes a raw broadcast transaction.
   *
   * @returns The envelope, or null when the bytes are not a well formed EIP-712 envelope.
   */
  public static fromRawBytes(bytes: Uint8Array): IEip712Envelope | null {
    try {
      return Eip712EnvelopeFactory.parseRawBytes(bytes);
    } catch (e: unknown) {
      if (!CodecError.isCodecError(e)) {
        throw e;
      }
      log.debug(rejectionReason(e), 'Raw bytes rejected as EIP-712 envelope');
      return null;
    }
  }

  /**
   * Decodes a raw broadcast transaction, throwing a {@link CodecError} on any
   * malformed input. The access list is not part of the broadcast form and comes
   * back empty; so does the gas price.
   */
  public static parseRawBytes(bytes: Uint8Array): IEip712Envelope {
    if (bytes.length === 0 || bytes[0] !== TransactionType.Eip712) {
      throw predefined.WRONG_TYPE_DISCRIMINANT(TransactionType.Eip712, bytes.length === 0 ? undefined : bytes[0]);
    }

    let decoded: RlpItem;
    try {
      decoded = RLP.decode(bytes.subarray(1));
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : 'invalid RLP';
      throw predefined.UNEXPECTED_VARIANT_SHAPE('envelope', 'an RLP list', reason);
    }

    const content = classifyRlpItem(decoded);
    if (content.kind !== 'list') {
      throw predefined.UNEXPECTED_VARIANT_SHAPE('envelope', 'an RLP list', content.kind);
    }
    const items = content.items;
    if (items.length !== BROADCAST_FIELD_COUNT) {
      throw predefined.FIELD_COUNT_MISMATCH(BROADCAST_FIELD_COUNT, items.length);
    }
    const item = (field: BroadcastField): RlpItem => items[field];

    // both chain id copies are read and the repeated one wins; they are not compared
    let chainId = decodeQuantity('chainId', item(BroadcastField.ChainId));
    chainId = decodeQuantity('chainId', item(BroadcastField.ChainIdRepeated));

    // Reserved1 and Reserved2 carry nothing

    const customSignature = decodeScalar('customSignature', item(BroadcastField.CustomSignature));
    const signature = unmarshalSignature(customSignature);
    const isMarshalledTriplet = equalsBytes(customSignature, marshalSignature(signature));

    const gasPerPubdata = decodeScalar('gasPerPubdata', item(BroadcastField.GasPerPubdata));
    const paymasterParams = decodePaymasterPair('paymasterParams', item(BroadcastField.PaymasterParams));
    const factoryDeps = decodeFactoryDeps('factoryDeps', item(BroadcastField.FactoryDeps));

    // slots 12 to 15 all at their defaults are what an envelope without metadata encodes to
    const hasMeta =
      gasPerPubdata.length > 0 || paymasterParams !== undefined || factoryDeps.length > 0 || !isMarshalledTriplet;
    const meta: IEip712Meta | undefined = hasMeta
      ? Eip712MetaFactory.createMeta({
          gasPerPubdata: gasPerPubdata.length > 0 ? bytesToBigInt(gasPerPubdata) : undefined,
          customSignature: isMarshalledTriplet ? undefined : customSignature,
          paymasterParams,
          factoryDeps,
        })
      : undefined;

    const from = decodeOptionalAddress('from', item(BroadcastField.From));

    return Eip712EnvelopeFactory.createEnvelope({
      nonce: decodeQuantity('nonce', item(BroadcastField.Nonce)),
      maxPriorityFeePerGas: decodeQuantity('maxPriorityFeePerGas', item(BroadcastField.MaxPriorityFeePerGas)),
      maxFeePerGas: decodeQuantity('maxFeePerGas', item(BroadcastField.MaxFeePerGas)),
      gasLimit: decodeQuantity('gasLimit', item(BroadcastField.GasLimit)),
      to: decodeOptionalAddress('to', item(BroadcastField.To)) ?? null,
      value: decodeQuantity('value', item(BroadcastField.Value)),
      data: decodeScalar('data', item(BroadcastField.Data)),
      chainId,
      r: signature.r,
      s: signature.s,
      v: signature.v,
      accessList: [],
      from,
      meta,
    });
  }

  /**
   * Decodes the JSON object a node returns for a transaction.
   *
   * @returns The envelope, or null when a required key is missing (the object is
   *   some other transaction type) or a present value is malformed.
   */
  public static fromJson(json: unknown): IEip712Envelope | null {
    try {
      return Eip712EnvelopeFactory.parseJson(json);
    } catch (e: unknown) {
      if (!CodecError.isCodecError(e)) {
        throw e;
      }
      log.debug(rejectionReason(e), 'JSON rejected as EIP-712 envelope');
      return null;
    }
  }

  /**
   * Decodes the JSON object a node returns for a transaction.
   *
   * Returns null when one of `to`, `nonce`, `value`, `chainId`, `data`/`input`,
   * `v`, `r`, `s` is missing, and throws a {@link CodecError} when a present
   * value is malformed. Optional quantities default to zero, `input` is preferred
   * over `data` and `gas` over `gasLimit`. A malformed access list is dropped.
   */
  public static parseJson(input: unknown): IEip712Envelope | null {
    if (!isKeyedContainer(input)) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE('envelope', 'an object', Array.isArray(input) ? 'array' : typeof input);
    }
    const json: KeyedContainer = input;

    const missing = REQUIRED_JSON_KEYS.find((key) => !HexDecoders.has(json, key));
    if (missing !== undefined || (!HexDecoders.has(json, 'data') && !HexDecoders.has(json, 'input'))) {
      log.trace({ missing: missing ?? 'data' }, 'JSON is not an EIP-712 envelope');
      return null;
    }

    const accessList = orDefault(
      () => (HexDecoders.isPresent(json, 'accessList') ? decodeAccessList('accessList', json.accessList) : []),
      [],
      (e) => log.debug(rejectionReason(e), 'Dropping malformed access list'),
    );

    const gasLimit = HexDecoders.quantityOr(json, 'gas', undefined) ?? HexDecoders.quantityOr(json, 'gasLimit', 0n);
    const data = HexDecoders.bytesOr(json, 'input', undefined) ?? HexDecoders.bytes(json, 'data');

    return Eip712EnvelopeFactory.createEnvelope({
      chainId: HexDecoders.quantityOr(json, 'chainId', 0n),
      nonce: HexDecoders.quantity(json, 'nonce'),
      accessList,
      to: normalizeTo(json.to),
      value: HexDecoders.quantityOr(json, 'value', 0n),
      maxPriorityFeePerGas: HexDecoders.quantityOr(json, 'maxPriorityFeePerGas', 0n),
      maxFeePerGas: HexDecoders.quantityOr(json, 'maxFeePerGas', 0n),
      gasPrice: HexDecoders.quantityOr(json, 'gasPrice', 0n),
      gasLimit,
      data,
      v: HexDecoders.quantity(json, 'v'),
      r: HexDecoders.quantity(json, 'r'),
      s: HexDecoders.quantity(json, 's'),
      from: HexDecoders.isPresent(json, 'from') ? HexDecoders.address(json, 'from') : undefined,
      meta: HexDecoders.isPresent(json, 'eip712Meta')
        ? Eip712MetaFactory.fromJson(HexDecoders.object(json, 'eip712Meta'))
        : undefined,
    });
  }

  /**
   * Converts the envelope to its JSON-RPC form. A deployment has a null `to`.
   */
  public static toJson(envelope: IEip712Envelope): IEip712EnvelopeJson {
    const json: IEip712EnvelopeJson = {
      type: numberTo0x(envelope.type),
      nonce: numberTo0x(envelope.nonce),
      chainId: numberTo0x(envelope.chainId),
      to: envelope.to === constants.CONTRACT_DEPLOYMENT_ADDRESS ? null : envelope.to,
      value: numberTo0x(envelope.value),
      data: bytesTo0x(envelope.data),
      gas: numberTo0x(envelope.gasLimit),
      gasPrice: numberTo0x(envelope.gasPrice),
      maxPriorityFeePerGas: numberTo0x(envelope.maxPriorityFeePerGas),
      maxFeePerGas: numberTo0x(envelope.maxFeePerGas),
      accessList: envelope.accessList.map((entry) => ({ address: entry.address, storageKeys: [...entry.storageKeys] })),
      v: numberTo0x(envelope.v),
      r: numberTo0x(envelope.r),
      s: numberTo0x(envelope.s),
    };

    if (envelope.from !== undefined) {
      json.from = envelope.from;
    }
    if (envelope.meta !== undefined) {
      json.eip712Meta = Eip712MetaFactory.toJson(envelope.meta);
    }

    return json;
  }
}
