import { Application } from 'express';

import { AuthController, HealthController, OrdersController, PayoutsController, RevenueController } from './controllers/index.js';
import { IDatabase } from './databases/models/database.interface.js';
import { IBaseApiConfig } from './models/base-api-config.interface.js';

export function setupRoutes(app: Application, database: IDatabase, config: IBaseApiConfig): void {
  new HealthController(app, database, config);
  new AuthController(app, database);
  new OrdersController(app, database);
  new RevenueController(app, database);
  new PayoutsController(app, database);
}
