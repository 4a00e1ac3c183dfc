// SPDX-License-Identifier: Apache-2.0

/**
 * Receipt serialization per Ethereum Yellow Paper and EIP-2718.
 *
 * Yellow Paper: receipt is RLP of the 4-tuple
 *   (status, cumulative_gas_used, logs_bloom, logs).
 * Post-Byzantium: first field is the status (empty for failure, 0x01 for success).
 * Each log: RLP([address, topics[], data]).
 *
 * EIP-2718: for typed txs (type !== 0), wire format is type_byte || RLP(above 4-tuple).
 */

import { RLP } from '@ethereumjs/rlp';
import { bigIntToUnpaddedBytes, concatBytes, intToBytes } from '@ethereumjs/util';
import { getBytes } from 'ethers';

import { bytesTo0x } from '../formatters';
import { LogsBloomUtils } from '../logsBloomUtils';
import { TransactionType } from './constants';
import { predefined } from './errors/CodecError';
import { IReceiptRlpInput, TransactionStatus } from './types';

const STATUS_SUCCESS = Uint8Array.from([0x01]);

/**
 * Converts receipt logs into the RLP encoded log structure.
 *
 * Each log becomes a 3-tuple [address, topics[], data] per the Yellow Paper.
 *
 * @param logs - The logs of the transaction receipt.
 * @returns Array of [address, topics, data] as Uint8Arrays for RLP encoding.
 */
function encodeLogsForReceipt(logs: IReceiptRlpInput['logs']): [Uint8Array, Uint8Array[], Uint8Array][] {
  return logs.map((log) => [getBytes(log.address), [...log.topics], log.data]);
}

/**
 * First receipt field: 0x01 on success, empty on failure.
 */
function encodeStatus(receipt: IReceiptRlpInput): Uint8Array {
  switch (receipt.status) {
    case TransactionStatus.Success:
      return STATUS_SUCCESS;
    case TransactionStatus.Failure:
      return new Uint8Array(0);
    case TransactionStatus.NotYetProcessed:
      throw predefined.RECEIPT_NOT_PROCESSED(bytesTo0x(receipt.transactionHash));
  }
}

/**
 * Encodes a single transaction receipt to EIP-2718 binary form.
 *
 * Produces the RLP-encoded 4-tuple (status, cumulative_gas_used, logs_bloom, logs)
 * per the Ethereum Yellow Paper. For typed transactions (type !== 0), the output
 * is the single-byte type prefix followed by that RLP payload (EIP-2718).
 *
 * @param receipt - The receipt fields to encode (see {@link IReceiptRlpInput}).
 * @returns The encoded receipt, suitable for receipts root hashing.
 * @throws CodecError when the receipt has not been processed and so has no status.
 */
export function encodeReceipt(receipt: IReceiptRlpInput): Uint8Array {
  const txType = receipt.type ?? TransactionType.Legacy;

  const encodedList = RLP.encode([
    encodeStatus(receipt),
    bigIntToUnpaddedBytes(receipt.cumulativeGasUsed), // canonical RLP encoding (no leading zeros)
    receipt.logsBloom ?? LogsBloomUtils.empty(),
    encodeLogsForReceipt(receipt.logs),
  ]);

  if (txType === TransactionType.Legacy) {
    return encodedList;
  }
  return concatBytes(intToBytes(txType), encodedList);
}

/**
 * Hex (0x-prefixed) form of {@link encodeReceipt}.
 */
export function encodeReceiptToHex(receipt: IReceiptRlpInput): string {
  return bytesTo0x(encodeReceipt(receipt));
}
