import type { ValueError } from '@sinclair/typebox/errors';

export interface IModelSpec<T = unknown> {
  /**
   * Applies schema defaults, turns numeric strings in number fields into numbers and strips properties the schema does not declare.
   * The result still has to pass isValid.
   */
  decode(value: unknown): unknown;
  isValid(value: unknown): value is T;
  errors(value: unknown): ValueError[];
}
