import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const ProductSchema = Type.Object({
  title: Type.String(),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  price: Type.Number({ minimum: 0, description: 'Price in dollars' }),
  category: Type.String(),
  in_stock: Type.Boolean({ default: true }),
});

export type IProduct = Static<typeof ProductSchema>;

export const ProductSpec = entityUtils.getModelSpec(ProductSchema);
