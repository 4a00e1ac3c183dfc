// SPDX-License-Identifier: Apache-2.0

import { Input, RLP } from '@ethereumjs/rlp';
import { bigIntToUnpaddedBytes, concatBytes } from '@ethereumjs/util';
import { expect } from 'chai';
import { getBytes } from 'ethers';

import constants, { TransactionType } from '../../../src/lib/constants';
import { BroadcastField, SigningField } from '../../../src/lib/envelopeLayout';
import { CodecErrorKind } from '../../../src/lib/errors/CodecError';
import { Eip712EnvelopeFactory } from '../../../src/lib/factories/eip712EnvelopeFactory';
import { marshalSignature } from '../../../src/lib/signature';
import { IEip712Envelope } from '../../../src/lib/types';
import { asBytes, asList, bytesOfLength, decodeTypedPayload, expectCodecError } from '../../helpers';

const SENDER = '0x1111111111111111111111111111111111111111';
const RECIPIENT = '0x2222222222222222222222222222222222222222';
const PAYMASTER = '0x3333333333333333333333333333333333333333';
const STORAGE_KEY = `0x${'00'.repeat(31)}01`;

const fullEnvelope: IEip712Envelope = Eip712EnvelopeFactory.createEnvelope({
  nonce: 7n,
  chainId: 324n,
  to: RECIPIENT,
  value: 10n ** 18n,
  data: Uint8Array.from([0xde, 0xad, 0xbe, 0xef]),
  gasLimit: 210000n,
  maxPriorityFeePerGas: 100000000n,
  maxFeePerGas: 250000000n,
  r: 0x1234n,
  s: 0x5678n,
  v: 28n,
  from: SENDER,
  meta: {
    gasPerPubdata: 50000n,
    factoryDeps: [Uint8Array.from([1, 2, 3]), Uint8Array.from([4, 5])],
    paymasterParams: { paymaster: PAYMASTER, paymasterInput: Uint8Array.from([0x8c, 0x5a, 0x34, 0x45]) },
  },
});

const nodeJson: Record<string, unknown> = {
  type: '0x71',
  nonce: '0x7',
  chainId: '0x144',
  to: RECIPIENT,
  from: SENDER,
  value: '0xde0b6b3a7640000',
  input: '0xdeadbeef',
  gas: '0x33450',
  maxPriorityFeePerGas: '0x5f5e100',
  maxFeePerGas: '0xee6b280',
  accessList: [],
  v: '0x1c',
  r: '0x1234',
  s: '0x5678',
};

const without = (json: Record<string, unknown>, ...keys: string[]): Record<string, unknown> =>
  Object.fromEntries(Object.entries(json).filter(([key]) => !keys.includes(key)));

const reencode = (fields: Input[]): Uint8Array => concatBytes(Uint8Array.from([0x71]), RLP.encode(fields));

/**
 * Broadcast fields of the full envelope with some positions replaced.
 */
const broadcastFieldsWith = (replacements: Partial<Record<BroadcastField, Input>>): Input[] => {
  const fields: Input[] = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));
  for (const [position, value] of Object.entries(replacements)) {
    fields[Number(position)] = value;
  }
  return fields;
};

describe('Eip712EnvelopeFactory', () => {
  describe('createEnvelope', () => {
    it('fills in defaults for omitted fields', () => {
      expect(Eip712EnvelopeFactory.createEnvelope()).to.deep.equal({
        type: 0x71,
        nonce: 0n,
        chainId: 0n,
        to: '0x',
        value: 0n,
        data: new Uint8Array(0),
        v: 1n,
        r: 0n,
        s: 0n,
        gasLimit: 0n,
        maxPriorityFeePerGas: 0n,
        maxFeePerGas: 0n,
        gasPrice: 0n,
        accessList: [],
      });
    });

    it('maps empty and zero targets onto the deployment address', () => {
      for (const to of [undefined, null, '', '0x', '0x0', '0X0']) {
        expect(Eip712EnvelopeFactory.createEnvelope({ to }).to).to.equal(constants.CONTRACT_DEPLOYMENT_ADDRESS);
      }
    });

    it('checksums addresses', () => {
      const envelope = Eip712EnvelopeFactory.createEnvelope({
        to: '0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed',
      });
      expect(envelope.to).to.equal('0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed');
    });

    it('rejects a malformed address', () => {
      expectCodecError(() => Eip712EnvelopeFactory.createEnvelope({ to: '0x1234' }), CodecErrorKind.MalformedAddress);
    });

    it('rejects a v that does not fit in one byte', () => {
      expectCodecError(() => Eip712EnvelopeFactory.createEnvelope({ v: 256n }), CodecErrorKind.SignatureOutOfRange);
      expectCodecError(
        () => Eip712EnvelopeFactory.createEnvelope({ r: 2n ** 256n }),
        CodecErrorKind.SignatureOutOfRange,
      );
    });
  });

  describe('encodeForBroadcast', () => {
    it('writes 16 fields after the 0x71 type byte', () => {
      const encoded = Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope);
      const fields = decodeTypedPayload(encoded);

      expect(encoded[0]).to.equal(0x71);
      expect(fields).to.have.lengthOf(16);
      expect(asBytes(fields[BroadcastField.Nonce])).to.deep.equal(Uint8Array.from([7]));
      expect(asBytes(fields[BroadcastField.To])).to.deep.equal(bytesOfLength(20, 0x22));
      expect(asBytes(fields[BroadcastField.Data])).to.deep.equal(Uint8Array.from([0xde, 0xad, 0xbe, 0xef]));
      expect(asBytes(fields[BroadcastField.From])).to.deep.equal(bytesOfLength(20, 0x11));
      expect(asBytes(fields[BroadcastField.GasPerPubdata])).to.deep.equal(Uint8Array.from([0xc3, 0x50]));
    });

    it('writes the chain id twice and leaves the reserved slots empty', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));

      expect(asBytes(fields[BroadcastField.ChainId])).to.deep.equal(Uint8Array.from([0x01, 0x44]));
      expect(asBytes(fields[BroadcastField.ChainIdRepeated])).to.deep.equal(Uint8Array.from([0x01, 0x44]));
      expect(asBytes(fields[BroadcastField.Reserved1])).to.have.lengthOf(0);
      expect(asBytes(fields[BroadcastField.Reserved2])).to.have.lengthOf(0);
    });

    it('marshals the signature triplet into the custom signature slot', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));

      expect(asBytes(fields[BroadcastField.CustomSignature])).to.deep.equal(
        marshalSignature({ r: 0x1234n, s: 0x5678n, v: 28n }),
      );
    });

    it('writes the metadata lists', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));

      expect(asList(fields[BroadcastField.FactoryDeps])).to.deep.equal([
        Uint8Array.from([1, 2, 3]),
        Uint8Array.from([4, 5]),
      ]);
      expect(asList(fields[BroadcastField.PaymasterParams])).to.deep.equal([
        bytesOfLength(20, 0x33),
        Uint8Array.from([0x8c, 0x5a, 0x34, 0x45]),
      ]);
    });

    it('writes empty metadata when there is none', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(Eip712EnvelopeFactory.createEnvelope()));

      expect(asBytes(fields[BroadcastField.To])).to.have.lengthOf(0);
      expect(asBytes(fields[BroadcastField.From])).to.have.lengthOf(0);
      expect(asBytes(fields[BroadcastField.GasPerPubdata])).to.have.lengthOf(0);
      expect(asList(fields[BroadcastField.FactoryDeps])).to.have.lengthOf(0);
      expect(asList(fields[BroadcastField.PaymasterParams])).to.have.lengthOf(0);
    });

    it('writes a custom signature as given', () => {
      const customSignature = bytesOfLength(70, 0x05);
      const envelope = Eip712EnvelopeFactory.createEnvelope({ meta: { customSignature, factoryDeps: [] } });
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForBroadcast(envelope));

      expect(asBytes(fields[BroadcastField.CustomSignature])).to.deep.equal(customSignature);
    });
  });

  describe('encodeForSigning', () => {
    it('writes 12 fields after the 0x71 type byte', () => {
      const encoded = Eip712EnvelopeFactory.encodeForSigning(fullEnvelope);
      const fields = decodeTypedPayload(encoded);

      expect(encoded[0]).to.equal(0x71);
      expect(fields).to.have.lengthOf(12);
      expect(asBytes(fields[SigningField.From])).to.deep.equal(bytesOfLength(20, 0x11));
      expect(asBytes(fields[SigningField.Value])).to.deep.equal(bigIntToUnpaddedBytes(10n ** 18n));
      expect(asBytes(fields[SigningField.ChainId])).to.deep.equal(Uint8Array.from([0x01, 0x44]));
      expect(asBytes(fields[SigningField.GasPrice])).to.have.lengthOf(0);
    });

    it('writes the metadata block', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForSigning(fullEnvelope));
      const meta = asList(fields[SigningField.Meta]);

      expect(meta).to.have.lengthOf(4);
      expect(asBytes(meta[0])).to.deep.equal(Uint8Array.from([0xc3, 0x50]));
      expect(asBytes(meta[1])).to.have.lengthOf(0);
      expect(asList(meta[2])).to.deep.equal([bytesOfLength(20, 0x33), Uint8Array.from([0x8c, 0x5a, 0x34, 0x45])]);
      expect(asList(meta[3])).to.deep.equal([Uint8Array.from([1, 2, 3]), Uint8Array.from([4, 5])]);
    });

    it('writes the access list as [address, [storageKey, ...]] pairs', () => {
      const envelope = Eip712EnvelopeFactory.createEnvelope({
        accessList: [{ address: RECIPIENT, storageKeys: [STORAGE_KEY] }],
      });
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForSigning(envelope));

      expect(asList(fields[SigningField.AccessList])).to.deep.equal([[bytesOfLength(20, 0x22), [getBytes(STORAGE_KEY)]]]);
    });

    it('writes an empty sender and an empty metadata list when they are absent', () => {
      const fields = decodeTypedPayload(Eip712EnvelopeFactory.encodeForSigning(Eip712EnvelopeFactory.createEnvelope()));

      expect(asBytes(fields[SigningField.From])).to.have.lengthOf(0);
      expect(asList(fields[SigningField.Meta])).to.have.lengthOf(0);
    });
  });

  describe('serialize', () => {
    it('returns the hex of the broadcast encoding', () => {
      const serialized = Eip712EnvelopeFactory.serialize(fullEnvelope);

      expect(serialized.startsWith('0x71')).to.be.true;
      expect(getBytes(serialized)).to.deep.equal(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));
    });
  });

  describe('fromRawBytes', () => {
    it('decodes what encodeForBroadcast writes', () => {
      const decoded = Eip712EnvelopeFactory.fromRawBytes(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope));

      expect(decoded).to.deep.equal(fullEnvelope);
    });

    it('decodes an envelope without metadata as one without metadata', () => {
      const envelopes = [
        Eip712EnvelopeFactory.createEnvelope(),
        Eip712EnvelopeFactory.createEnvelope({ to: RECIPIENT, chainId: 324n }),
        Eip712EnvelopeFactory.createEnvelope({ ...fullEnvelope, meta: undefined }),
      ];

      for (const envelope of envelopes) {
        const decoded = Eip712EnvelopeFactory.parseRawBytes(Eip712EnvelopeFactory.encodeForBroadcast(envelope));
        expect(decoded).to.deep.equal(envelope);
        expect(decoded).to.not.have.property('meta');
      }
    });

    it('keeps v through the broadcast form', () => {
      for (const v of [0n, 1n, 2n, 27n, 28n, 29n, 34n, 255n]) {
        const envelope = Eip712EnvelopeFactory.createEnvelope({ to: RECIPIENT, r: 0x1234n, s: 0x5678n, v });
        const decoded = Eip712EnvelopeFactory.parseRawBytes(Eip712EnvelopeFactory.encodeForBroadcast(envelope));

        expect(decoded, `v = ${v}`).to.deep.equal(envelope);
      }
    });

    it('decodes metadata without a gas per pubdata limit', () => {
      const envelope = Eip712EnvelopeFactory.createEnvelope({
        to: RECIPIENT,
        meta: { factoryDeps: [Uint8Array.from([1, 2, 3])] },
      });
      const decoded = Eip712EnvelopeFactory.parseRawBytes(Eip712EnvelopeFactory.encodeForBroadcast(envelope));

      expect(decoded).to.deep.equal(envelope);
      expect(decoded.meta).to.not.have.property('gasPerPubdata');
    });

    it('decodes metadata that holds only defaults as no metadata', () => {
      const envelope = Eip712EnvelopeFactory.createEnvelope({ meta: { gasPerPubdata: 0n, factoryDeps: [] } });
      const decoded = Eip712EnvelopeFactory.parseRawBytes(Eip712EnvelopeFactory.encodeForBroadcast(envelope));

      expect(decoded).to.not.have.property('meta');
    });

    it('keeps the repeated chain id when the two copies differ', () => {
      const first = reencode(broadcastFieldsWith({ [BroadcastField.ChainId]: bigIntToUnpaddedBytes(1n) }));
      const second = reencode(broadcastFieldsWith({ [BroadcastField.ChainIdRepeated]: bigIntToUnpaddedBytes(280n) }));

      expect(Eip712EnvelopeFactory.parseRawBytes(first).chainId).to.equal(324n);
      expect(Eip712EnvelopeFactory.parseRawBytes(second).chainId).to.equal(280n);
    });

    it('ignores the content of the reserved slots', () => {
      const bytes = reencode(
        broadcastFieldsWith({ [BroadcastField.Reserved1]: Uint8Array.from([9]), [BroadcastField.Reserved2]: [] }),
      );

      expect(Eip712EnvelopeFactory.parseRawBytes(bytes)).to.deep.equal(fullEnvelope);
    });

    it('returns null for another transaction type or an empty buffer', () => {
      const encoded = Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope);
      const eip1559 = concatBytes(Uint8Array.from([TransactionType.Eip1559]), encoded.subarray(1));

      expect(Eip712EnvelopeFactory.fromRawBytes(eip1559)).to.be.null;
      expect(Eip712EnvelopeFactory.fromRawBytes(new Uint8Array(0))).to.be.null;

      const error = expectCodecError(
        () => Eip712EnvelopeFactory.parseRawBytes(eip1559),
        CodecErrorKind.WrongTypeDiscriminant,
      );
      expect(error.message).to.equal('Expected transaction type 0x71 but got 0x2');
      expectCodecError(
        () => Eip712EnvelopeFactory.parseRawBytes(new Uint8Array(0)),
        CodecErrorKind.WrongTypeDiscriminant,
      );
    });

    it('rejects a list with the wrong number of fields', () => {
      const fields = broadcastFieldsWith({});

      expect(Eip712EnvelopeFactory.fromRawBytes(reencode(fields.slice(0, 15)))).to.be.null;
      expect(Eip712EnvelopeFactory.fromRawBytes(reencode([...fields, new Uint8Array(0)]))).to.be.null;

      const error = expectCodecError(
        () => Eip712EnvelopeFactory.parseRawBytes(reencode(fields.slice(0, 15))),
        CodecErrorKind.FieldCountMismatch,
      );
      expect(error.message).to.equal('Expected 16 RLP fields but got 15');
    });

    it('rejects a payload that is not an RLP list', () => {
      const scalar = concatBytes(Uint8Array.from([0x71]), RLP.encode(Uint8Array.from([1, 2])));
      const trailing = concatBytes(Eip712EnvelopeFactory.encodeForBroadcast(fullEnvelope), Uint8Array.from([0]));

      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(scalar), CodecErrorKind.UnexpectedVariantShape);
      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(trailing), CodecErrorKind.UnexpectedVariantShape);
    });

    it('decodes an empty target as a deployment', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.To]: new Uint8Array(0) }));

      expect(Eip712EnvelopeFactory.parseRawBytes(bytes).to).to.equal(constants.CONTRACT_DEPLOYMENT_ADDRESS);
    });

    it('rejects addresses of the wrong length', () => {
      const to = reencode(broadcastFieldsWith({ [BroadcastField.To]: bytesOfLength(19, 0x22) }));
      const from = reencode(broadcastFieldsWith({ [BroadcastField.From]: bytesOfLength(21, 0x11) }));

      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(to), CodecErrorKind.MalformedAddress);
      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(from), CodecErrorKind.MalformedAddress);
    });

    it('decodes an empty sender as absent', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.From]: new Uint8Array(0) }));

      expect(Eip712EnvelopeFactory.parseRawBytes(bytes)).to.not.have.property('from');
    });

    it('rejects a list where a scalar is expected', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.GasPerPubdata]: [Uint8Array.from([1])] }));

      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(bytes), CodecErrorKind.UnexpectedVariantShape);
    });

    it('drops a paymaster pair with only one half', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.PaymasterParams]: [bytesOfLength(20, 0x33)] }));
      const decoded = Eip712EnvelopeFactory.parseRawBytes(bytes);

      expect(decoded.meta).to.deep.equal({
        gasPerPubdata: 50000n,
        factoryDeps: [Uint8Array.from([1, 2, 3]), Uint8Array.from([4, 5])],
      });
    });

    it('keeps a custom signature that is not the marshalled triplet', () => {
      // compact form of r = 9, s = 10; the marshalled triplet is 65 bytes
      const customSignature = concatBytes(
        bytesOfLength(31, 0),
        Uint8Array.from([9]),
        bytesOfLength(31, 0),
        Uint8Array.from([10]),
      );
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.CustomSignature]: customSignature }));
      const decoded = Eip712EnvelopeFactory.parseRawBytes(bytes);

      expect(decoded.r).to.equal(9n);
      expect(decoded.s).to.equal(10n);
      expect(decoded.v).to.equal(27n);
      expect(decoded.meta?.customSignature).to.deep.equal(customSignature);
    });

    it('rejects a custom signature that cannot be unmarshalled', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.CustomSignature]: bytesOfLength(10, 1) }));

      expect(Eip712EnvelopeFactory.fromRawBytes(bytes)).to.be.null;
      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(bytes), CodecErrorKind.SignatureUnmarshalFailure);
    });

    it('returns null for a signature with a high s', () => {
      const envelope = Eip712EnvelopeFactory.createEnvelope({ ...fullEnvelope, s: 2n ** 255n });
      const bytes = Eip712EnvelopeFactory.encodeForBroadcast(envelope);

      expect(asBytes(decodeTypedPayload(bytes)[BroadcastField.CustomSignature])[32]).to.equal(0x80);
      expect(Eip712EnvelopeFactory.fromRawBytes(bytes)).to.be.null;
      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(bytes), CodecErrorKind.SignatureUnmarshalFailure);
    });

    it('rejects a nested factory dependency', () => {
      const bytes = reencode(broadcastFieldsWith({ [BroadcastField.FactoryDeps]: [[Uint8Array.from([1])]] }));

      expectCodecError(() => Eip712EnvelopeFactory.parseRawBytes(bytes), CodecErrorKind.UnexpectedVariantShape);
    });
  });

  describe('fromJson', () => {
    it('decodes a node transaction object', () => {
      const expected = Eip712EnvelopeFactory.createEnvelope({
        nonce: 7n,
        chainId: 324n,
        to: RECIPIENT,
        from: SENDER,
        value: 10n ** 18n,
        data: Uint8Array.from([0xde, 0xad, 0xbe, 0xef]),
        gasLimit: 210000n,
        maxPriorityFeePerGas: 100000000n,
        maxFeePerGas: 250000000n,
        v: 28n,
        r: 0x1234n,
        s: 0x5678n,
      });

      expect(Eip712EnvelopeFactory.fromJson(nodeJson)).to.deep.equal(expected);
    });

    it('decodes what toJson writes', () => {
      expect(Eip712EnvelopeFactory.fromJson(Eip712EnvelopeFactory.toJson(fullEnvelope))).to.deep.equal(fullEnvelope);
    });

    it('returns null when a required key is missing', () => {
      for (const key of ['to', 'nonce', 'value', 'chainId', 'v', 'r', 's']) {
        expect(Eip712EnvelopeFactory.fromJson(without(nodeJson, key)), key).to.be.null;
        expect(Eip712EnvelopeFactory.parseJson(without(nodeJson, key)), key).to.be.null;
      }
      expect(Eip712EnvelopeFactory.parseJson(without(nodeJson, 'input'))).to.be.null;
    });

    it('returns null for something other than an object', () => {
      expect(Eip712EnvelopeFactory.fromJson('0x71')).to.be.null;
      expect(Eip712EnvelopeFactory.fromJson([nodeJson])).to.be.null;
      expectCodecError(() => Eip712EnvelopeFactory.parseJson(null), CodecErrorKind.UnexpectedVariantShape);
    });

    it('defaults optional quantities to zero', () => {
      const envelope = Eip712EnvelopeFactory.parseJson(without(nodeJson, 'maxFeePerGas', 'maxPriorityFeePerGas', 'gas'));

      expect(envelope?.maxFeePerGas).to.equal(0n);
      expect(envelope?.maxPriorityFeePerGas).to.equal(0n);
      expect(envelope?.gasLimit).to.equal(0n);
      expect(envelope?.gasPrice).to.equal(0n);
    });

    it('treats a null chain id or value as zero', () => {
      const envelope = Eip712EnvelopeFactory.parseJson({ ...nodeJson, chainId: null, value: null });

      expect(envelope?.chainId).to.equal(0n);
      expect(envelope?.value).to.equal(0n);
    });

    it('returns null for a v that does not fit in one byte', () => {
      const json = { ...nodeJson, v: '0x100' };

      expect(Eip712EnvelopeFactory.fromJson(json)).to.be.null;
      expectCodecError(() => Eip712EnvelopeFactory.parseJson(json), CodecErrorKind.SignatureOutOfRange);
    });

    it('rejects a malformed quantity', () => {
      const json = { ...nodeJson, maxFeePerGas: 'not-hex' };

      expect(Eip712EnvelopeFactory.fromJson(json)).to.be.null;
      const error = expectCodecError(() => Eip712EnvelopeFactory.parseJson(json), CodecErrorKind.MalformedHex);
      expect(error.message).to.equal("Field 'maxFeePerGas' is not a valid hex value: not-hex");
    });

    it('prefers gas over gasLimit', () => {
      expect(Eip712EnvelopeFactory.parseJson({ ...nodeJson, gas: '0x1', gasLimit: '0x2' })?.gasLimit).to.equal(1n);
      expect(Eip712EnvelopeFactory.parseJson({ ...without(nodeJson, 'gas'), gasLimit: '0x2' })?.gasLimit).to.equal(2n);
    });

    it('prefers input over data', () => {
      const both = Eip712EnvelopeFactory.parseJson({ ...nodeJson, data: '0x01' });
      const dataOnly = Eip712EnvelopeFactory.parseJson({ ...without(nodeJson, 'input'), data: '0x01' });

      expect(both?.data).to.deep.equal(Uint8Array.from([0xde, 0xad, 0xbe, 0xef]));
      expect(dataOnly?.data).to.deep.equal(Uint8Array.from([0x01]));
    });

    it('maps a null or zero target onto the deployment address', () => {
      for (const to of [null, '', '0x', '0x0']) {
        expect(Eip712EnvelopeFactory.parseJson({ ...nodeJson, to })?.to).to.equal(constants.CONTRACT_DEPLOYMENT_ADDRESS);
      }
    });

    it('rejects a target that is not an address', () => {
      expectCodecError(() => Eip712EnvelopeFactory.parseJson({ ...nodeJson, to: 42 }), CodecErrorKind.MalformedAddress);
      expectCodecError(
        () => Eip712EnvelopeFactory.parseJson({ ...nodeJson, to: '0x1234' }),
        CodecErrorKind.MalformedAddress,
      );
    });

    it('decodes the access list', () => {
      const envelope = Eip712EnvelopeFactory.parseJson({
        ...nodeJson,
        accessList: [{ address: RECIPIENT, storageKeys: [`0x${'AB'.repeat(32)}`] }],
      });

      expect(envelope?.accessList).to.deep.equal([{ address: RECIPIENT, storageKeys: [`0x${'ab'.repeat(32)}`] }]);
    });

    it('drops a malformed access list', () => {
      const envelope = Eip712EnvelopeFactory.parseJson({ ...nodeJson, accessList: [{ address: RECIPIENT }] });

      expect(envelope?.accessList).to.deep.equal([]);
      expect(envelope?.nonce).to.equal(7n);
    });

    it('decodes the metadata block', () => {
      const envelope = Eip712EnvelopeFactory.parseJson({
        ...nodeJson,
        eip712Meta: { gasPerPubdata: '0xc350', factoryDeps: [[1, 2, 3]], paymasterParams: null },
      });

      expect(envelope?.meta).to.deep.equal({ gasPerPubdata: 50000n, factoryDeps: [Uint8Array.from([1, 2, 3])] });
    });
  });

  describe('toJson', () => {
    it('writes quantities as unpadded hex', () => {
      const json = Eip712EnvelopeFactory.toJson(fullEnvelope);

      expect(json.type).to.equal('0x71');
      expect(json.nonce).to.equal('0x7');
      expect(json.chainId).to.equal('0x144');
      expect(json.value).to.equal('0xde0b6b3a7640000');
      expect(json.gas).to.equal('0x33450');
      expect(json.gasPrice).to.equal('0x0');
      expect(json.v).to.equal('0x1c');
      expect(json.r).to.equal('0x1234');
      expect(json.data).to.equal('0xdeadbeef');
      expect(json.to).to.equal(RECIPIENT);
      expect(json.from).to.equal(SENDER);
    });

    it('writes the metadata with byte arrays', () => {
      expect(Eip712EnvelopeFactory.toJson(fullEnvelope).eip712Meta).to.deep.equal({
        gasPerPubdata: '0xc350',
        paymasterParams: { paymaster: PAYMASTER, paymasterInput: [0x8c, 0x5a, 0x34, 0x45] },
        factoryDeps: [
          [1, 2, 3],
          [4, 5],
        ],
      });
    });

    it('writes a null target for a deployment and omits absent members', () => {
      const json = Eip712EnvelopeFactory.toJson(Eip712EnvelopeFactory.createEnvelope());

      expect(json.to).to.be.null;
      expect(json).to.not.have.property('from');
      expect(json).to.not.have.property('eip712Meta');
    });
  });
});
