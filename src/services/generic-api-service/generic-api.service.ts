import { IEntity, Persisted } from '../../models/entity.interface.js';
import { IModelSpec } from '../../models/model-spec.interface.js';
import { IQueryOptions } from '../../models/query-options.interface.js';
import { IDatabase, IStoredDocument } from '../../databases/models/database.interface.js';
import { entityUtils } from '../../utils/entity.utils.js';
import { ServerError } from '../../errors/index.js';
import { IGenericApiService } from './generic-api-service.interface.js';

export class GenericApiService<T extends Record<string, unknown>> implements IGenericApiService<T> {
  protected database: IDatabase;
  protected collectionName: string;
  protected singularResourceName: string;
  protected modelSpec: IModelSpec<T>;

  /**
   * @constructs GenericApiService<T>
   * @param database The store every query and command goes through
   * @param collectionName The collection holding this resource (e.g. 'payoutrequest')
   * @param singularResourceName Used in error messages (e.g. 'payout request')
   * @param modelSpec The model spec used to validate incoming entities and decode stored ones
   */
  constructor(
    database: IDatabase,
    collectionName: string,
    singularResourceName: string,
    modelSpec: IModelSpec<T>
  ) {
    this.database = database;
    this.collectionName = collectionName;
    this.singularResourceName = singularResourceName;
    this.modelSpec = modelSpec;
  }

  /**
   * Applies schema defaults, strips anything the schema does not declare (a client supplied _id included)
   * and validates the result.
   * @throws ValidationError listing every offending field
   */
  prepareEntity(doc: unknown): T {
    return entityUtils.parse(this.modelSpec, doc, `${this.constructor.name}.prepareEntity`);
  }

  /**
   * Turns a stored document back into a typed entity. A document that no longer matches
   * its schema is a server-side problem, not the caller's.
   */
  postprocessEntity(stored: IStoredDocument): Persisted<T> {
    const { _id, ...rest } = stored;
    const decoded = this.modelSpec.decode(rest);

    if (!this.modelSpec.isValid(decoded)) {
      throw new ServerError(`Stored ${this.singularResourceName} ${_id} does not match its schema`);
    }

    return { ...decoded, _id };
  }

  postprocessEntities(stored: IStoredDocument[]): Persisted<T>[] {
    return stored.map(document => this.postprocessEntity(document));
  }

  /**
   * Writes an entity that has already been through prepareEntity.
   */
  async insertEntity(entity: T): Promise<Persisted<T>> {
    const { insertedId } = await this.database.create(entity, this.collectionName);
    const identity: IEntity = { _id: insertedId };
    return { ...entity, ...identity };
  }

  async create(doc: unknown): Promise<Persisted<T>> {
    const entity = this.prepareEntity(doc);
    return this.insertEntity(entity);
  }

  async find(queryOptions: IQueryOptions): Promise<Persisted<T>[]> {
    const stored = await this.database.find(queryOptions, this.collectionName);
    return this.postprocessEntities(stored);
  }

  async findOne(queryOptions: IQueryOptions): Promise<Persisted<T> | null> {
    const stored = await this.database.findOne(queryOptions, this.collectionName);
    return stored ? this.postprocessEntity(stored) : null;
  }

  async getById(id: string): Promise<Persisted<T> | null> {
    const stored = await this.database.getById(id, this.collectionName);
    return stored ? this.postprocessEntity(stored) : null;
  }
}
