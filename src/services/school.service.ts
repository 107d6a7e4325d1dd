import { ISchool, SCHOOL_COLLECTION, SchoolSpec } from '../models/school.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { GenericApiService } from './generic-api-service/generic-api.service.js';

export class SchoolService extends GenericApiService<ISchool> {
  constructor(database: IDatabase) {
    super(database, SCHOOL_COLLECTION, 'school', SchoolSpec);
  }

  // exact, case-sensitive match
  async getByEmail(email: string): Promise<Persisted<ISchool> | null> {
    return this.findOne({ filters: { email: { eq: email } } });
  }

  async getByCredentials(email: string, password: string): Promise<Persisted<ISchool> | null> {
    return this.findOne({ filters: { email: { eq: email }, password: { eq: password } } });
  }
}
