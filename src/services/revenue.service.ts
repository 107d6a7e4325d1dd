import { IRevenueSummary } from '../models/revenue-summary.model.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { revenueUtils } from '../utils/revenue.utils.js';
import { OrderService } from './order.service.js';
import { PayoutRequestService } from './payout-request.service.js';

/**
 * Pending payout is not stored anywhere. It is recomputed on every call from two independent
 * reads, so a payout approved between them may or may not be reflected.
 */
export class RevenueService {
  private orderService: OrderService;
  private payoutRequestService: PayoutRequestService;

  constructor(database: IDatabase) {
    this.orderService = new OrderService(database);
    this.payoutRequestService = new PayoutRequestService(database);
  }

  async getRevenueSummary(schoolId: string): Promise<IRevenueSummary> {
    const [paidOrders, settledPayouts] = await Promise.all([
      this.orderService.getPaidOrders(schoolId),
      this.payoutRequestService.getSettledPayouts(schoolId),
    ]);

    return revenueUtils.computeRevenueSummary(paidOrders, settledPayouts);
  }
}
