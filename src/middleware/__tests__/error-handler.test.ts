import { describe, it, expect } from 'vitest';

import { sanitizeData } from '../error-handler.js';

describe('sanitizeData', () => {
  it('should mask sensitive fields whatever their case', () => {
    expect(sanitizeData({ Email: 'admin@testschool.example', name: 'Test School', PASSWORD: 'test-password' }))
      .toEqual({ Email: '********', name: 'Test School', PASSWORD: '********' });
  });

  it('should mask bank details of payout requests', () => {
    expect(sanitizeData({ amount: 40, account_number: '000111222333', ifsc: 'TEST0000001' }))
      .toEqual({ amount: 40, account_number: '********', ifsc: '********' });
  });

  it('should walk nested objects and arrays', () => {
    expect(sanitizeData({ schools: [{ phone: '555-0100', name: 'A' }], headers: { authorization: 'Bearer test-token' } }))
      .toEqual({ schools: [{ phone: '********', name: 'A' }], headers: { authorization: '********' } });
  });

  it('should return primitives and empty values unchanged', () => {
    expect(sanitizeData('plain')).toBe('plain');
    expect(sanitizeData(42)).toBe(42);
    expect(sanitizeData(null)).toBeNull();
    expect(sanitizeData(undefined)).toBeUndefined();
  });
});
