import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const LoginRequestSchema = Type.Object({
  email: Type.String(),
  password: Type.String(),
});

export type ILoginRequest = Static<typeof LoginRequestSchema>;

export const LoginRequestSpec = entityUtils.getModelSpec(LoginRequestSchema);

// returned by both signup and login
export interface ILoginResponse {
  school_id: string;
  name: string;
  email: string;
}
