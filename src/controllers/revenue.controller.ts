import { Application, Request, Response } from 'express';

import { IRevenueSummary } from '../models/revenue-summary.model.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { RevenueService } from '../services/revenue.service.js';
import { apiUtils } from '../utils/api.utils.js';

export class RevenueController {
	revenueService: RevenueService;

	constructor(app: Application, database: IDatabase) {
		this.revenueService = new RevenueService(database);

		this.mapRoutes(app);
	}

	mapRoutes(app: Application) {
		app.get(`/api/revenue`, this.getRevenueSummary.bind(this));
	}

	async getRevenueSummary(req: Request, res: Response) {
		res.set('Content-Type', 'application/json');
		const schoolId = apiUtils.getRequiredQueryParam(req, 'school_id');

		const summary = await this.revenueService.getRevenueSummary(schoolId);
		apiUtils.apiResponse<IRevenueSummary>(res, 200, { data: summary });
	}
}
