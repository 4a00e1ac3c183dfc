// SPDX-License-Identifier: Apache-2.0

import { ILog, TransactionStatus } from './ITransactionReceipt';

/**
 * Input shape used when building RLP-encoded transaction receipt data.
 *
 * @property cumulativeGasUsed - Cumulative gas used up to and including this transaction.
 * @property logs - Log entries emitted by this transaction.
 * @property logsBloom - Bloom filter for logs; an empty bloom is encoded when unknown.
 * @property status - Outcome of the transaction; must not be `NotYetProcessed`.
 * @property transactionHash - Used to identify the receipt in errors.
 * @property type - Transaction type (e.g. `0x2`, `0x71`) or null for legacy.
 */
export interface IReceiptRlpInput {
  cumulativeGasUsed: bigint;
  logs: readonly Pick<ILog, 'address' | 'topics' | 'data'>[];
  logsBloom?: Uint8Array;
  status: TransactionStatus;
  transactionHash: Uint8Array;
  type: number | null;
}
