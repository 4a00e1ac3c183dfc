// SPDX-License-Identifier: Apache-2.0

export enum CodecErrorKind {
  MissingField = 'MissingField',
  MalformedHex = 'MalformedHex',
  MalformedAddress = 'MalformedAddress',
  UnexpectedVariantShape = 'UnexpectedVariantShape',
  WrongTypeDiscriminant = 'WrongTypeDiscriminant',
  FieldCountMismatch = 'FieldCountMismatch',
  SignatureUnmarshalFailure = 'SignatureUnmarshalFailure',
  SignatureOutOfRange = 'SignatureOutOfRange',
  ReceiptNotProcessed = 'ReceiptNotProcessed',
}

export class CodecError extends Error {
  public readonly kind: CodecErrorKind;

  constructor(kind: CodecErrorKind, message: string) {
    super(message);
    this.name = 'CodecError';
    this.kind = kind;
    Object.setPrototypeOf(this, CodecError.prototype);
  }

  public static isCodecError(error: unknown): error is CodecError {
    return error instanceof CodecError;
  }

  public is(kind: CodecErrorKind): boolean {
    return this.kind === kind;
  }
}

export const predefined = {
  MISSING_FIELD: (key: string) => new CodecError(CodecErrorKind.MissingField, `Missing required field '${key}'`),
  MALFORMED_HEX: (key: string, value: unknown) =>
    new CodecError(CodecErrorKind.MalformedHex, `Field '${key}' is not a valid hex value: ${String(value)}`),
  MALFORMED_ADDRESS: (key: string, detail: string) =>
    new CodecError(CodecErrorKind.MalformedAddress, `Field '${key}' is not a valid address: ${detail}`),
  UNEXPECTED_VARIANT_SHAPE: (key: string, expected: string, actual: string) =>
    new CodecError(CodecErrorKind.UnexpectedVariantShape, `Field '${key}' expected ${expected} but got ${actual}`),
  WRONG_TYPE_DISCRIMINANT: (expected: number, actual: number | undefined) =>
    new CodecError(
      CodecErrorKind.WrongTypeDiscriminant,
      `Expected transaction type 0x${expected.toString(16)} but got ${
        actual === undefined ? 'an empty buffer' : `0x${actual.toString(16)}`
      }`,
    ),
  FIELD_COUNT_MISMATCH: (expected: number, actual: number) =>
    new CodecError(CodecErrorKind.FieldCountMismatch, `Expected ${expected} RLP fields but got ${actual}`),
  SIGNATURE_UNMARSHAL_FAILURE: (detail: string) =>
    new CodecError(CodecErrorKind.SignatureUnmarshalFailure, `Unable to unmarshal signature: ${detail}`),
  SIGNATURE_OUT_OF_RANGE: (component: string, value: bigint, byteLength: number) =>
    new CodecError(
      CodecErrorKind.SignatureOutOfRange,
      `Signature component '${component}' does not fit in ${byteLength} unsigned bytes: ${value}`,
    ),
  RECEIPT_NOT_PROCESSED: (transactionHash: string) =>
    new CodecError(
      CodecErrorKind.ReceiptNotProcessed,
      `Receipt of transaction ${transactionHash} has not been processed and cannot be encoded`,
    ),
};
