// SPDX-License-Identifier: Apache-2.0

import { LogsBloomUtils } from '../../logsBloomUtils';
import { CodecError, predefined } from '../errors/CodecError';
import { HexDecoders, isKeyedContainer, KeyedContainer, orDefault } from '../hexDecoders';
import { logger } from '../logger';
import { IL2ToL1Log, ITransactionReceipt, TransactionStatus } from '../types';
import { LogFactory } from './logFactory';

const log = logger.child({ module: 'transactionReceiptFactory' });

/**
 * Factory for transaction receipts
 */
class TransactionReceiptFactory {
  /**
   * Creates the placeholder receipt of a transaction that has not been processed yet
   *
   * Used while polling for a receipt that the node does not return yet. Every
   * field but the hash is zero or empty.
   *
   * @param transactionHash Hash of the pending transaction
   * @returns {ITransactionReceipt} Receipt with status `NotYetProcessed`
   */
  public static createNotProcessedReceipt(transactionHash: Uint8Array): ITransactionReceipt {
    return Object.freeze({
      transactionHash,
      blockHash: new Uint8Array(0),
      l1BatchNumber: 0n,
      l1BatchTxIndex: 0,
      blockNumber: 0n,
      transactionIndex: 0n,
      cumulativeGasUsed: 0n,
      gasUsed: 0n,
      effectiveGasPrice: 0n,
      logs: Object.freeze([]),
      status: TransactionStatus.NotYetProcessed,
    });
  }

  /**
   * Decodes a receipt returned by `eth_getTransactionReceipt`
   *
   * @param json Receipt object as returned by the node
   * @returns {ITransactionReceipt | null} The receipt, or null when a mandatory field is missing or malformed
   */
  public static fromJson(json: unknown): ITransactionReceipt | null {
    try {
      return TransactionReceiptFactory.parseJson(json);
    } catch (e: unknown) {
      if (!CodecError.isCodecError(e)) {
        throw e;
      }
      log.debug({ kind: e.kind, reason: e.message }, 'Receipt JSON rejected');
      return null;
    }
  }

  /**
   * Decodes a receipt returned by `eth_getTransactionReceipt`
   *
   * `blockNumber`, `blockHash`, `transactionIndex`, `transactionHash`,
   * `cumulativeGasUsed`, `gasUsed` and `logs` are mandatory and a failure there
   * throws a {@link CodecError}. The remaining fields are read best-effort: nodes
   * return null or malformed values for them on some transactions (a contract
   * address on a plain call, L2 batch data on L1), so a failure only drops the
   * field. A missing or unreadable `status` means the transaction has not been
   * processed yet.
   *
   * @param input Receipt object as returned by the node
   * @returns {ITransactionReceipt} The decoded receipt
   */
  public static parseJson(input: unknown): ITransactionReceipt {
    if (!isKeyedContainer(input)) {
      throw predefined.UNEXPECTED_VARIANT_SHAPE('receipt', 'an object', Array.isArray(input) ? 'array' : typeof input);
    }
    const json: KeyedContainer = input;

    const skipped = (field: string) => (e: CodecError) => {
      log.trace({ field, reason: e.message }, 'Skipping receipt field');
    };

    const l1BatchNumber = orDefault<bigint | undefined>(
      () => HexDecoders.quantityOr(json, 'l1BatchNumber', undefined),
      undefined,
      skipped('l1BatchNumber'),
    );
    const l1BatchTxIndex = orDefault<number | undefined>(
      () => HexDecoders.safeNumberOr(json, 'l1BatchTxIndex', undefined),
      undefined,
      skipped('l1BatchTxIndex'),
    );
    const contractAddress = orDefault<string | undefined>(
      () => (HexDecoders.isPresent(json, 'contractAddress') ? HexDecoders.address(json, 'contractAddress') : undefined),
      undefined,
      skipped('contractAddress'),
    );
    const l2ToL1Logs = orDefault<readonly IL2ToL1Log[] | undefined>(
      () =>
        HexDecoders.isPresent(json, 'l2ToL1Logs')
          ? LogFactory.listFromJson(json, 'l2ToL1Logs', LogFactory.l2ToL1LogFromJson)
          : undefined,
      undefined,
      skipped('l2ToL1Logs'),
    );
    const logsBloom = orDefault<Uint8Array | undefined>(
      () => LogsBloomUtils.fromBytes(HexDecoders.bytes(json, 'logsBloom')),
      undefined,
      skipped('logsBloom'),
    );

    return Object.freeze({
      blockNumber: HexDecoders.quantity(json, 'blockNumber'),
      blockHash: HexDecoders.bytes(json, 'blockHash'),
      transactionIndex: HexDecoders.quantity(json, 'transactionIndex'),
      transactionHash: HexDecoders.bytes(json, 'transactionHash'),
      cumulativeGasUsed: HexDecoders.quantity(json, 'cumulativeGasUsed'),
      gasUsed: HexDecoders.quantity(json, 'gasUsed'),
      effectiveGasPrice: orDefault<bigint>(
        () => HexDecoders.quantity(json, 'effectiveGasPrice'),
        0n,
        skipped('effectiveGasPrice'),
      ),
      status: TransactionReceiptFactory.decodeStatus(json),
      logs: LogFactory.listFromJson(json, 'logs', LogFactory.fromJson),
      ...(l1BatchNumber !== undefined ? { l1BatchNumber } : {}),
      ...(l1BatchTxIndex !== undefined ? { l1BatchTxIndex } : {}),
      ...(contractAddress !== undefined ? { contractAddress } : {}),
      ...(l2ToL1Logs !== undefined ? { l2ToL1Logs } : {}),
      ...(logsBloom !== undefined ? { logsBloom } : {}),
    });
  }

  /**
   * Maps the hex `status` onto the receipt status: absent or unreadable is
   * not-yet-processed, `0x1` is success and any other value is failure.
   */
  private static decodeStatus(json: KeyedContainer): TransactionStatus {
    const status = orDefault<bigint | undefined>(() => HexDecoders.quantity(json, 'status'), undefined);
    switch (status) {
      case undefined:
        return TransactionStatus.NotYetProcessed;
      case 1n:
        return TransactionStatus.Success;
      default:
        return TransactionStatus.Failure;
    }
  }
}

export { TransactionReceiptFactory };
