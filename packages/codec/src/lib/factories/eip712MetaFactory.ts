// SPDX-License-Identifier: Apache-2.0

import type { Input } from '@ethereumjs/rlp';
import { bigIntToUnpaddedBytes } from '@ethereumjs/util';
import { getBytes } from 'ethers';

import { bytesTo0x, numberTo0x } from '../../formatters';
import { predefined } from '../errors/CodecError';
import { HexDecoders, KeyedContainer, parseAddress, parseHexBytes } from '../hexDecoders';
import { IEip712Meta, IEip712MetaJson, IPaymasterParams, IPaymasterParamsJson } from '../types';

const isByte = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
};

/**
 * Reads a byte blob given either as hex or as an array of byte values.
 */
const parseByteLike = (key: string, value: unknown): Uint8Array => {
  if (typeof value === 'string') {
    return parseHexBytes(key, value);
  }
  if (Array.isArray(value) && value.every(isByte)) {
    return Uint8Array.from(value);
  }
  throw predefined.MALFORMED_HEX(key, Array.isArray(value) ? `[${value.join(',')}]` : value);
};

export class Eip712MetaFactory {
  /**
   * Builds a metadata block, dropping the members that are not set.
   */
  public static createMeta(params: Partial<IEip712Meta> = {}): IEip712Meta {
    const paymasterParams =
      params.paymasterParams !== undefined
        ? Eip712MetaFactory.createPaymasterParams(params.paymasterParams)
        : undefined;

    return Object.freeze({
      ...(params.gasPerPubdata !== undefined ? { gasPerPubdata: params.gasPerPubdata } : {}),
      ...(params.customSignature !== undefined ? { customSignature: params.customSignature } : {}),
      ...(paymasterParams !== undefined ? { paymasterParams } : {}),
      factoryDeps: Object.freeze([...(params.factoryDeps ?? [])]),
    });
  }

  public static createPaymasterParams(params: IPaymasterParams): IPaymasterParams {
    return Object.freeze({
      ...(params.paymaster !== undefined ? { paymaster: parseAddress('paymaster', params.paymaster) } : {}),
      ...(params.paymasterInput !== undefined ? { paymasterInput: params.paymasterInput } : {}),
    });
  }

  /**
   * Converts the metadata to its JSON form. Members that are not set are
   * omitted rather than written as null.
   */
  public static toJson(meta: IEip712Meta): IEip712MetaJson {
    const json: IEip712MetaJson = {};

    if (meta.gasPerPubdata !== undefined) {
      json.gasPerPubdata = numberTo0x(meta.gasPerPubdata);
    }
    if (meta.customSignature !== undefined) {
      json.customSignature = bytesTo0x(meta.customSignature);
    }
    if (meta.paymasterParams !== undefined) {
      const paymasterParams: IPaymasterParamsJson = {};
      if (meta.paymasterParams.paymaster !== undefined) {
        paymasterParams.paymaster = meta.paymasterParams.paymaster;
      }
      if (meta.paymasterParams.paymasterInput !== undefined) {
        paymasterParams.paymasterInput = Array.from(meta.paymasterParams.paymasterInput);
      }
      json.paymasterParams = paymasterParams;
    }
    json.factoryDeps = meta.factoryDeps.map((dep) => Array.from(dep));

    return json;
  }

  /**
   * Reads the metadata from its JSON form. Every member is optional, including
   * each half of the paymaster pair; a member that is present must be well formed.
   */
  public static fromJson(json: KeyedContainer): IEip712Meta {
    const gasPerPubdata = HexDecoders.quantityOr(json, 'gasPerPubdata', undefined);
    const customSignature = HexDecoders.isPresent(json, 'customSignature')
      ? parseByteLike('customSignature', json.customSignature)
      : undefined;

    let paymasterParams: IPaymasterParams | undefined;
    if (HexDecoders.isPresent(json, 'paymasterParams')) {
      const pair = HexDecoders.object(json, 'paymasterParams');
      paymasterParams = Eip712MetaFactory.createPaymasterParams({
        paymaster: HexDecoders.isPresent(pair, 'paymaster') ? HexDecoders.address(pair, 'paymaster') : undefined,
        paymasterInput: HexDecoders.isPresent(pair, 'paymasterInput')
          ? parseByteLike('paymasterInput', pair.paymasterInput)
          : undefined,
      });
    }

    const factoryDeps = HexDecoders.isPresent(json, 'factoryDeps')
      ? HexDecoders.array(json, 'factoryDeps').map((dep, index) => parseByteLike(`factoryDeps[${index}]`, dep))
      : [];

    return Eip712MetaFactory.createMeta({ gasPerPubdata, customSignature, paymasterParams, factoryDeps });
  }

  /**
   * RLP block of the metadata in the signing layout:
   * `[gasPerPubdata, customSignature, [paymaster, paymasterInput], factoryDeps]`,
   * or an empty list when there is no metadata.
   */
  public static toSigningFields(meta: IEip712Meta | undefined): Input {
    if (meta === undefined) {
      return [];
    }
    return [
      bigIntToUnpaddedBytes(meta.gasPerPubdata ?? 0n),
      meta.customSignature ?? new Uint8Array(0),
      Eip712MetaFactory.pairForBroadcast(meta),
      [...meta.factoryDeps],
    ];
  }

  /**
   * `[paymaster, paymasterInput]` when both halves are set, otherwise an empty list.
   */
  public static pairForBroadcast(meta: IEip712Meta | undefined): Input {
    const paymaster = meta?.paymasterParams?.paymaster;
    const paymasterInput = meta?.paymasterParams?.paymasterInput;
    if (paymaster === undefined || paymasterInput === undefined) {
      return [];
    }
    return [getBytes(paymaster), paymasterInput];
  }
}
