/**
 * Everything read back from the store carries its id in canonical form: a 24 character hex string.
 */
export interface IEntity {
  _id: string;
}

export type Persisted<T> = T & IEntity;
