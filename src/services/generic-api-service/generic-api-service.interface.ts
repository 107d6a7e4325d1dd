import { IQueryOptions } from '../../models/query-options.interface.js';
import { Persisted } from '../../models/entity.interface.js';

export interface IGenericApiService<T> {
  prepareEntity(doc: unknown): T;
  create(doc: unknown): Promise<Persisted<T>>;
  find(queryOptions: IQueryOptions): Promise<Persisted<T>[]>;
  findOne(queryOptions: IQueryOptions): Promise<Persisted<T> | null>;
  getById(id: string): Promise<Persisted<T> | null>;
}
