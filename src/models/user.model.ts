import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const UserSchema = Type.Object({
  name: Type.String({ description: 'Full name' }),
  email: Type.String({ description: 'Email address' }),
  address: Type.String(),
  age: Type.Optional(Type.Union([Type.Integer({ minimum: 0, maximum: 120, description: 'Age in years' }), Type.Null()])),
  is_active: Type.Boolean({ default: true }),
});

export type IUser = Static<typeof UserSchema>;

export const UserSpec = entityUtils.getModelSpec(UserSchema);
