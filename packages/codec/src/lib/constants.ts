// SPDX-License-Identifier: Apache-2.0

export enum TransactionType {
  Legacy = 0x00,
  Eip2930 = 0x01,
  Eip1559 = 0x02,
  Eip712 = 0x71,
}

export default {
  ADDRESS_BYTE_LENGTH: 20,
  HASH_BYTE_LENGTH: 32,
  LOGS_BLOOM_BYTE_LENGTH: 256,
  SIGNATURE_BYTE_LENGTH: 65,

  // `to` of a contract creation; encodes as an empty RLP string
  CONTRACT_DEPLOYMENT_ADDRESS: '0x',

  // defaults of an envelope built without a signature
  DEFAULT_SIGNATURE_V: 1n,
  DEFAULT_SIGNATURE_R: 0n,
  DEFAULT_SIGNATURE_S: 0n,
};
