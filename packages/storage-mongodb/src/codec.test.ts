import { StorageError } from '@docket/core';
import { Decimal128, Long, ObjectId } from 'mongodb';
import { describe, expect, it } from 'vitest';
import { decodeIdentity, decodeRecord, encodeFilter, encodeIdentity, encodeRecord } from './codec.js';

const HEX = '65a1b2c3d4e5f60718293a4b';

class Money {
  constructor(readonly cents: number) {}
}

describe('decodeRecord', () => {
  it('should keep plain values and identifiers', () => {
    const id = new ObjectId(HEX);
    const when = new Date('2024-05-01T00:00:00Z');

    const record = decodeRecord({ _id: id, name: 'Ada', when, tags: ['a', null], address: { city: 'London' } });

    expect(record).toEqual({ _id: id, name: 'Ada', when, tags: ['a', null], address: { city: 'London' } });
    expect(record['_id']).toBe(id);
  });

  it('should convert Long and Decimal128 to numbers', () => {
    const record = decodeRecord({ visits: Long.fromNumber(42), price: Decimal128.fromString('19.5') });

    expect(record).toEqual({ visits: 42, price: 19.5 });
  });

  it('should decode the largest safe Long and decimals with trailing zeros', () => {
    const record = decodeRecord({
      max: Long.fromString('9007199254740991'),
      min: Long.fromString('-9007199254740991'),
      price: Decimal128.fromString('1.50'),
      ratio: Decimal128.fromString('0.1'),
    });

    expect(record).toEqual({ max: 9007199254740991, min: -9007199254740991, price: 1.5, ratio: 0.1 });
  });

  it('should refuse a Long beyond the safe integer range', () => {
    expect(() => decodeRecord({ n: Long.fromString('9007199254740993') })).toThrow(
      'BSON Long 9007199254740993 at "n" cannot be represented exactly as a number'
    );
    expect(() => decodeRecord({ n: Long.fromString('9007199254740992') })).toThrow(StorageError);
  });

  it('should refuse a Decimal128 a number cannot hold exactly', () => {
    expect(() => decodeRecord({ total: Decimal128.fromString('9007199254740993') })).toThrow(
      'BSON Decimal128 9007199254740993 at "total" cannot be represented exactly as a number'
    );
    expect(() => decodeRecord({ rows: [{ amount: Decimal128.fromString('0.12345678901234567890') }] })).toThrow(
      StorageError
    );
  });

  it('should refuse values it cannot represent', () => {
    expect(() => decodeRecord({ price: new Money(100) })).toThrow(
      'Unsupported BSON value of type Money at "price"'
    );
    expect(() => decodeRecord({ nested: { items: [new Money(1)] } })).toThrow(StorageError);
  });
});

describe('encodeIdentity', () => {
  it('should turn hex strings into ObjectIds when enabled', () => {
    const encoded = encodeIdentity(HEX, true);

    expect(encoded).toBeInstanceOf(ObjectId);
    expect(encoded instanceof ObjectId && encoded.toHexString()).toBe(HEX);
    expect(encodeIdentity(HEX, false)).toBe(HEX);
  });

  it('should leave other identities alone', () => {
    expect(encodeIdentity('user-1', true)).toBe('user-1');
    expect(encodeIdentity(7, true)).toBe(7);
  });

  it('should convert foreign identifiers by their hex', () => {
    expect(encodeIdentity({ toHexString: () => HEX }, false)).toBeInstanceOf(ObjectId);
    expect(encodeIdentity({ toHexString: () => 'not-hex' }, true)).toBe('not-hex');
  });
});

describe('encodeFilter', () => {
  it('should encode the top-level _id condition only', () => {
    const filter = encodeFilter({ _id: { $in: [HEX, 'plain'] }, owner: HEX }, true);

    const condition = filter['_id'];
    expect(condition).toEqual({ $in: [new ObjectId(HEX), 'plain'] });
    expect(filter['owner']).toBe(HEX);
  });

  it('should encode a bare _id', () => {
    expect(encodeFilter({ _id: HEX }, true)['_id']).toBeInstanceOf(ObjectId);
    expect(encodeFilter({ name: 'Ada' }, true)).toEqual({ name: 'Ada' });
  });
});

describe('encodeRecord', () => {
  it('should encode a preset _id and copy the record', () => {
    const record = { _id: HEX, name: 'Ada' };
    const encoded = encodeRecord(record, true);

    expect(encoded['_id']).toBeInstanceOf(ObjectId);
    expect(record._id).toBe(HEX);
  });

  it('should reject an _id that is not an identity', () => {
    expect(() => encodeRecord({ _id: { nested: true } }, true)).toThrow(StorageError);
  });
});

describe('decodeIdentity', () => {
  it('should accept strings, numbers and ObjectIds', () => {
    const id = new ObjectId(HEX);
    expect(decodeIdentity(id)).toBe(id);
    expect(decodeIdentity('a')).toBe('a');
    expect(decodeIdentity(3)).toBe(3);
  });

  it('should reject anything else', () => {
    expect(() => decodeIdentity(true)).toThrow(StorageError);
    expect(() => decodeIdentity(Number.NaN)).toThrow(StorageError);
  });
});
