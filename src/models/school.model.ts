import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const SCHOOL_COLLECTION = 'school';

// password is stored and compared as plain text; see DESIGN.md before relying on it
export const SchoolSchema = Type.Object({
  name: Type.String({ description: 'School name' }),
  email: Type.String({ format: 'email', description: 'School admin email' }),
  password: Type.String({ minLength: 6 }),
  address: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  phone: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type ISchool = Static<typeof SchoolSchema>;

export const SchoolSpec = entityUtils.getModelSpec(SchoolSchema);
