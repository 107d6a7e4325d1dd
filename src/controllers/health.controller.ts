import { Application, Request, Response } from 'express';

import { IBaseApiConfig } from '../models/base-api-config.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { HealthService, IStoreDiagnostics, LIVENESS_MESSAGE } from '../services/health.service.js';
import { apiUtils } from '../utils/api.utils.js';

export class HealthController {
	healthService: HealthService;

	constructor(app: Application, database: IDatabase, config: IBaseApiConfig) {
		this.healthService = new HealthService(database, config);

		this.mapRoutes(app);
	}

	mapRoutes(app: Application) {
		app.get('/', this.getLiveness.bind(this));
		app.get('/test', this.getDiagnostics.bind(this));
	}

	async getLiveness(req: Request, res: Response) {
		apiUtils.apiResponse<{ message: string }>(res, 200, { data: { message: LIVENESS_MESSAGE } });
	}

	async getDiagnostics(req: Request, res: Response) {
		const diagnostics = await this.healthService.getDiagnostics();
		apiUtils.apiResponse<IStoreDiagnostics>(res, 200, { data: diagnostics });
	}
}
