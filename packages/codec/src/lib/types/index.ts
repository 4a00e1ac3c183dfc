// SPDX-License-Identifier: Apache-2.0

export * from './IEip712Envelope';
export * from './IReceiptRlpInput';
export * from './ITransactionReceipt';
