import { Application } from 'express';

import { IPayoutCreateResponse, IPayoutRequest } from '../models/payout-request.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { PayoutRequestService } from '../services/payout-request.service.js';
import { ApiController } from './api.controller.js';

/**
 * Lists and creates payout requests. Moving a request out of pending happens outside this API.
 */
export class PayoutsController extends ApiController<IPayoutRequest, IPayoutCreateResponse> {
	constructor(app: Application, database: IDatabase) {
		super('payouts', app, new PayoutRequestService(database));
	}

	protected toCreateResponse(payoutRequest: Persisted<IPayoutRequest>): IPayoutCreateResponse {
		return {
			request_id: payoutRequest._id,
			status: payoutRequest.status
		};
	}
}
