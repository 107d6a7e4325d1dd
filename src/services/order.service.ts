import { IOrder, ORDER_COLLECTION, OrderSpec } from '../models/order.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { SchoolScopedApiService } from './school-scoped-api.service.js';

/**
 * Orders are written once and never changed. Creating one does not check that the school exists.
 */
export class OrderService extends SchoolScopedApiService<IOrder> {
  constructor(database: IDatabase) {
    super(database, ORDER_COLLECTION, 'order', OrderSpec);
  }

  async getPaidOrders(schoolId: string): Promise<Persisted<IOrder>[]> {
    return this.getAllForSchool(schoolId, { status: { eq: 'paid' } });
  }
}
