// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';
import { predefined } from '../errors/CodecError';
import { HexDecoders, isKeyedContainer, KeyedContainer, parseHexBytes } from '../hexDecoders';
import { IL2ToL1Log, ILog } from '../types';

const asContainer = (key: string, value: unknown): KeyedContainer => {
  if (!isKeyedContainer(value)) {
    throw predefined.UNEXPECTED_VARIANT_SHAPE(key, 'an object', Array.isArray(value) ? 'array' : typeof value);
  }
  return value;
};

/**
 * Decoders for the log entries attached to a transaction receipt.
 */
export class LogFactory {
  /**
   * Decodes one event log. Every field but `removed` is required.
   */
  public static fromJson(json: unknown): ILog {
    const container = asContainer('log', json);

    const topics = HexDecoders.array(container, 'topics').map((topic, index) => {
      const bytes = parseHexBytes(`topics[${index}]`, topic);
      if (bytes.length !== constants.HASH_BYTE_LENGTH) {
        throw predefined.MALFORMED_HEX(`topics[${index}]`, topic);
      }
      return bytes;
    });

    return Object.freeze({
      address: HexDecoders.address(container, 'address'),
      topics: Object.freeze(topics),
      data: HexDecoders.bytes(container, 'data'),
      blockHash: HexDecoders.bytes(container, 'blockHash'),
      blockNumber: HexDecoders.quantity(container, 'blockNumber'),
      transactionHash: HexDecoders.bytes(container, 'transactionHash'),
      transactionIndex: HexDecoders.quantity(container, 'transactionIndex'),
      logIndex: HexDecoders.quantity(container, 'logIndex'),
      removed: HexDecoders.isPresent(container, 'removed') ? HexDecoders.boolean(container, 'removed') : false,
    });
  }

  /**
   * Decodes one L2-to-L1 log. All fields are required; `key`, `value` and
   * `transactionHash` are kept as transmitted.
   */
  public static l2ToL1LogFromJson(json: unknown): IL2ToL1Log {
    const container = asContainer('l2ToL1Log', json);

    return Object.freeze({
      blockNumber: HexDecoders.quantity(container, 'blockNumber'),
      blockHash: HexDecoders.bytes(container, 'blockHash'),
      l1BatchNumber: HexDecoders.quantity(container, 'l1BatchNumber'),
      transactionIndex: HexDecoders.safeNumber(container, 'transactionIndex'),
      shardId: HexDecoders.safeNumber(container, 'shardId'),
      isService: HexDecoders.boolean(container, 'isService'),
      sender: HexDecoders.address(container, 'sender'),
      key: HexDecoders.string(container, 'key'),
      value: HexDecoders.string(container, 'value'),
      transactionHash: HexDecoders.string(container, 'transactionHash'),
      logIndex: HexDecoders.safeNumber(container, 'logIndex'),
    });
  }

  public static listFromJson<T>(container: KeyedContainer, key: string, decode: (json: unknown) => T): readonly T[] {
    return Object.freeze(HexDecoders.array(container, key).map((entry) => decode(entry)));
  }
}
