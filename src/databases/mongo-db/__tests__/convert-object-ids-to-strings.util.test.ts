import { describe, it, expect } from 'vitest';
import { ObjectId } from 'mongodb';

import { convertObjectIdsToStrings, toStoredDocument } from '../utils/convert-object-ids-to-strings.util.js';

describe('convertObjectIdsToStrings', () => {
  const hexId = '0123456789abcdef01234567';

  it('should convert nested ObjectIds to hex strings', () => {
    expect(convertObjectIdsToStrings({ ref: new ObjectId(hexId), list: [new ObjectId(hexId), 'x'] }))
      .toEqual({ ref: hexId, list: [hexId, 'x'] });
  });

  it('should keep dates and primitives as they are', () => {
    const date = new Date('2026-01-01T00:00:00.000Z');

    expect(convertObjectIdsToStrings({ createdAt: date, amount: 10, note: null }))
      .toEqual({ createdAt: date, amount: 10, note: null });
  });
});

describe('toStoredDocument', () => {
  it('should expose an ObjectId _id as its hex string', () => {
    const hexId = '0123456789abcdef01234567';

    expect(toStoredDocument({ _id: new ObjectId(hexId), name: 'Test School' }))
      .toEqual({ _id: hexId, name: 'Test School' });
  });
});
