import { IModelSpec } from '../models/model-spec.interface.js';
import { Filter, IQueryOptions } from '../models/query-options.interface.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { GenericApiService } from './generic-api-service/generic-api.service.js';

export interface ISchoolScoped {
  school_id: string;
}

/**
 * A GenericApiService for resources that belong to a single school.
 * Every school-scoped query is an equality match on school_id, optionally narrowed by further filters.
 */
export class SchoolScopedApiService<T extends ISchoolScoped & Record<string, unknown>> extends GenericApiService<T> {
  constructor(
    database: IDatabase,
    collectionName: string,
    singularResourceName: string,
    modelSpec: IModelSpec<T>
  ) {
    super(database, collectionName, singularResourceName, modelSpec);
  }

  /**
   * Unpaginated: returns every matching record, in insertion order.
   */
  async getAllForSchool(schoolId: string, filters: { [key: string]: Filter } = {}): Promise<Persisted<T>[]> {
    const queryOptions: IQueryOptions = {
      filters: { ...filters, school_id: { eq: schoolId } }
    };
    return this.find(queryOptions);
  }
}
