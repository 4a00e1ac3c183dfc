// SPDX-License-Identifier: Apache-2.0

export { ConfigService } from './config/configService';
export * from './formatters';
export { default as constants, TransactionType } from './lib/constants';
export * from './lib/envelopeLayout';
export * from './lib/errors/CodecError';
export { Eip712EnvelopeFactory } from './lib/factories/eip712EnvelopeFactory';
export { Eip712MetaFactory } from './lib/factories/eip712MetaFactory';
export { LogFactory } from './lib/factories/logFactory';
export { TransactionReceiptFactory } from './lib/factories/transactionReceiptFactory';
export { HexDecoders, isKeyedContainer, orDefault } from './lib/hexDecoders';
export type { KeyedContainer } from './lib/hexDecoders';
export { encodeReceipt, encodeReceiptToHex } from './lib/receiptSerialization';
export * from './lib/rlpContent';
export { marshalSignature, unmarshalSignature } from './lib/signature';
export type { ISignatureTriplet } from './lib/signature';
export * from './lib/types';
export { LogsBloomUtils } from './logsBloomUtils';
