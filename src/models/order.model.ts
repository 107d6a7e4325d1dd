import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const ORDER_COLLECTION = 'order';

export const OrderStatusSchema = Type.Union([
  Type.Literal('paid'),
  Type.Literal('pending'),
  Type.Literal('cancelled'),
], { default: 'paid' });

export type OrderStatus = Static<typeof OrderStatusSchema>;

export const OrderSchema = Type.Object({
  school_id: Type.String({ description: 'Id of the school that owns the order' }),
  order_number: Type.String({ description: 'Human-friendly order number' }),
  amount: Type.Number({ minimum: 0 }),
  status: OrderStatusSchema,
  items: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
});

export type IOrder = Static<typeof OrderSchema>;

export const OrderSpec = entityUtils.getModelSpec(OrderSchema);
