import { describe, it, expect } from 'vitest';
import { ObjectId } from 'mongodb';

import { buildNoSqlMatch } from '../utils/build-no-sql-match.util.js';

describe('buildNoSqlMatch', () => {
  it('should return an empty match without filters', () => {
    expect(buildNoSqlMatch({})).toEqual({});
  });

  it('should turn eq into an equality match', () => {
    expect(buildNoSqlMatch({ filters: { school_id: { eq: 'school-1' }, status: { eq: 'paid' } } }))
      .toEqual({ school_id: 'school-1', status: 'paid' });
  });

  it('should turn in into $in', () => {
    expect(buildNoSqlMatch({ filters: { status: { in: ['approved', 'paid'] } } }))
      .toEqual({ status: { $in: ['approved', 'paid'] } });
  });

  it('should convert a well-formed _id into an ObjectId', () => {
    const id = '0123456789abcdef01234567';

    const match = buildNoSqlMatch({ filters: { _id: { eq: id } } });

    expect(match._id).toBeInstanceOf(ObjectId);
    expect(match._id).toEqual(new ObjectId(id));
  });

  it('should leave a malformed _id as a string', () => {
    expect(buildNoSqlMatch({ filters: { _id: { eq: 'school-1' } } })).toEqual({ _id: 'school-1' });
  });

  it('should not convert hex strings stored in other properties', () => {
    expect(buildNoSqlMatch({ filters: { school_id: { eq: '0123456789abcdef01234567' } } }))
      .toEqual({ school_id: '0123456789abcdef01234567' });
  });
});
