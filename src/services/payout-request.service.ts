import {
  IPayoutRequest,
  PAYOUT_REQUEST_COLLECTION,
  PayoutRequestSpec,
  SETTLED_PAYOUT_STATUSES,
} from '../models/payout-request.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { NotFoundError } from '../errors/index.js';
import { SchoolScopedApiService } from './school-scoped-api.service.js';
import { SchoolService } from './school.service.js';

export class PayoutRequestService extends SchoolScopedApiService<IPayoutRequest> {
  private schoolService: SchoolService;

  constructor(database: IDatabase) {
    super(database, PAYOUT_REQUEST_COLLECTION, 'payout request', PayoutRequestSpec);
    this.schoolService = new SchoolService(database);
  }

  /**
   * The referenced school must exist. Whatever status the caller sent, a new request is always pending.
   * @throws NotFoundError when school_id is not the id of an existing school
   */
  override async create(doc: unknown): Promise<Persisted<IPayoutRequest>> {
    const payoutRequest = this.prepareEntity(doc);

    const school = await this.schoolService.getById(payoutRequest.school_id);
    if (!school) {
      throw new NotFoundError('School not found');
    }

    return this.insertEntity({ ...payoutRequest, status: 'pending' });
  }

  async getSettledPayouts(schoolId: string): Promise<Persisted<IPayoutRequest>[]> {
    return this.getAllForSchool(schoolId, { status: { in: SETTLED_PAYOUT_STATUSES } });
  }
}
