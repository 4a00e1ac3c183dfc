// SPDX-License-Identifier: Apache-2.0

export enum TransactionStatus {
  NotYetProcessed = 'notYetProcessed',
  Success = 'success',
  Failure = 'failure',
}

/**
 * Event log emitted by a transaction.
 */
export interface ILog {
  readonly address: string;
  readonly topics: readonly Uint8Array[];
  readonly data: Uint8Array;
  readonly blockHash: Uint8Array;
  readonly blockNumber: bigint;
  readonly transactionHash: Uint8Array;
  readonly transactionIndex: bigint;
  readonly logIndex: bigint;
  readonly removed: boolean;
}

/**
 * Message sent from L2 to L1 by a transaction. `key`, `value` and
 * `transactionHash` are kept as the node transmitted them.
 */
export interface IL2ToL1Log {
  readonly blockNumber: bigint;
  readonly blockHash: Uint8Array;
  readonly l1BatchNumber: bigint;
  readonly transactionIndex: number;
  readonly shardId: number;
  readonly isService: boolean;
  readonly sender: string;
  readonly key: string;
  readonly value: string;
  readonly transactionHash: string;
  readonly logIndex: number;
}

export interface ITransactionReceipt {
  readonly transactionHash: Uint8Array;
  readonly blockHash: Uint8Array;
  readonly l1BatchNumber?: bigint;
  readonly l1BatchTxIndex?: number;
  readonly blockNumber: bigint;
  readonly transactionIndex: bigint;
  readonly contractAddress?: string;
  readonly cumulativeGasUsed: bigint;
  readonly gasUsed: bigint;
  readonly effectiveGasPrice: bigint;
  readonly logs: readonly ILog[];
  readonly l2ToL1Logs?: readonly IL2ToL1Log[];
  readonly status: TransactionStatus;
  readonly logsBloom?: Uint8Array;
}
