import { describe, it, expect } from 'vitest';

import { entityUtils } from '../entity.utils.js';
import { ValidationError } from '../../errors/index.js';
import { OrderSpec } from '../../models/order.model.js';
import { PayoutRequestSpec } from '../../models/payout-request.model.js';
import { SchoolSpec } from '../../models/school.model.js';
import { UserSpec } from '../../models/user.model.js';
import { ProductSpec } from '../../models/product.model.js';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a ValidationError');
}

describe('entityUtils', () => {
  describe('parse', () => {
    it('should default an order status to paid', () => {
      const order = entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: 10 }, 'test');

      expect(order).toEqual({ school_id: 's1', order_number: 'ORD-1', amount: 10, status: 'paid' });
    });

    it('should default a payout request status to pending', () => {
      const payout = entityUtils.parse(PayoutRequestSpec, {
        school_id: 's1',
        amount: 5,
        bank_name: 'Test Bank',
        account_holder: 'Holder',
        account_number: '123',
        ifsc: 'TEST0001',
      }, 'test');

      expect(payout.status).toBe('pending');
    });

    it('should strip properties the schema does not declare, including _id', () => {
      const order = entityUtils.parse(OrderSpec, {
        _id: '0123456789abcdef01234567',
        school_id: 's1',
        order_number: 'ORD-1',
        amount: 10,
        discount: 3,
      }, 'test');

      expect(order).not.toHaveProperty('_id');
      expect(order).not.toHaveProperty('discount');
    });

    it('should convert a numeric string amount to a number', () => {
      const order = entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: '42.5' }, 'test');

      expect(order.amount).toBe(42.5);
    });

    it('should not coerce values of other types', () => {
      const error = captureValidationError(() =>
        entityUtils.parse(OrderSpec, { school_id: 123, order_number: 'ORD-1', amount: 1, items: ['a', 1] }, 'test'));

      expect(error.errors.map(e => e.field)).toEqual(['school_id', 'items']);
    });

    it('should reject a non-numeric string amount', () => {
      const error = captureValidationError(() =>
        entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: '12abc' }, 'test'));

      expect(error.errors.map(e => e.field)).toEqual(['amount']);
    });

    it('should keep explicit nulls on optional fields', () => {
      const order = entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: 1, items: null }, 'test');

      expect(order.items).toBeNull();
    });

    it('should accept an amount of zero', () => {
      const order = entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: 0 }, 'test');

      expect(order.amount).toBe(0);
    });

    it('should reject a negative amount and name the field', () => {
      const error = captureValidationError(() =>
        entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: -1 }, 'test'));

      expect(error.statusCode).toBe(422);
      expect(error.errors.map(e => e.field)).toEqual(['amount']);
    });

    it('should reject an unknown order status', () => {
      const error = captureValidationError(() =>
        entityUtils.parse(OrderSpec, { school_id: 's1', order_number: 'ORD-1', amount: 1, status: 'refunded' }, 'test'));

      expect(error.errors.map(e => e.field)).toEqual(['status']);
    });

    it('should report every missing required field', () => {
      const error = captureValidationError(() => entityUtils.parse(OrderSpec, { amount: 1 }, 'test'));
      const fields = error.errors.map(e => e.field);

      expect(fields).toContain('school_id');
      expect(fields).toContain('order_number');
    });

    it('should reject a body that is not an object without naming a field', () => {
      const error = captureValidationError(() => entityUtils.parse(OrderSpec, undefined, 'test'));

      expect(error.errors.length).toBeGreaterThan(0);
      expect(error.errors[0].field).toBeUndefined();
    });

    it('should reject a malformed email and a short password', () => {
      const error = captureValidationError(() =>
        entityUtils.parse(SchoolSpec, { name: 'School', email: 'not-an-email', password: '12345' }, 'test'));
      const fields = error.errors.map(e => e.field);

      expect(fields).toContain('email');
      expect(fields).toContain('password');
    });

    it('should accept a school without address and phone', () => {
      const school = entityUtils.parse(SchoolSpec, { name: 'School', email: 'a@b.example', password: '123456' }, 'test');

      expect(school).toEqual({ name: 'School', email: 'a@b.example', password: '123456' });
    });
  });

  describe('auxiliary schemas', () => {
    it('should default a user to active and accept an age within range', () => {
      const user = entityUtils.parse(UserSpec, { name: 'Ann', email: 'ann@example.com', address: 'Somewhere', age: 30 }, 'test');

      expect(user.is_active).toBe(true);
      expect(entityUtils.validate(UserSpec, { ...user, age: 121 })).not.toBeNull();
      expect(entityUtils.validate(UserSpec, { ...user, age: -1 })).not.toBeNull();
    });

    it('should reject a negative product price', () => {
      const product = { title: 'Blazer', price: 20, category: 'uniform', in_stock: true };

      expect(entityUtils.validate(ProductSpec, product)).toBeNull();
      expect(entityUtils.validate(ProductSpec, { ...product, price: -0.01 })).not.toBeNull();
    });
  });

  describe('isValidObjectId', () => {
    it('should accept 24 hex characters only', () => {
      expect(entityUtils.isValidObjectId('0123456789abcdefABCDEF01')).toBe(true);
      expect(entityUtils.isValidObjectId('0123456789abcdef0123456')).toBe(false);
      expect(entityUtils.isValidObjectId('zzzzzzzzzzzzzzzzzzzzzzzz')).toBe(false);
      expect(entityUtils.isValidObjectId(42)).toBe(false);
    });
  });
});
