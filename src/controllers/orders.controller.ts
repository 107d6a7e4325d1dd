import { Application } from 'express';

import { IOrder } from '../models/order.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { OrderService } from '../services/order.service.js';
import { ApiController } from './api.controller.js';

export interface IOrderCreateResponse {
	id: string;
}

export class OrdersController extends ApiController<IOrder, IOrderCreateResponse> {
	constructor(app: Application, database: IDatabase) {
		super('orders', app, new OrderService(database));
	}

	protected toCreateResponse(order: Persisted<IOrder>): IOrderCreateResponse {
		return { id: order._id };
	}
}
