import _ from 'lodash';

import { IOrder } from '../models/order.model.js';
import { IPayoutRequest, SETTLED_PAYOUT_STATUSES } from '../models/payout-request.model.js';
import { IRevenueSummary } from '../models/revenue-summary.model.js';

/**
 * Reconciles a school's orders against its payout requests.
 * Only paid orders count as revenue and only approved or paid payouts count as money already
 * handed over. Pending payout is whatever revenue is left, never below zero.
 * Records with any other status are ignored, so callers may pass unfiltered lists.
 */
function computeRevenueSummary(
	orders: Pick<IOrder, 'amount' | 'status'>[],
	payouts: Pick<IPayoutRequest, 'amount' | 'status'>[]
): IRevenueSummary {
	const paidOrders = orders.filter(order => order.status === 'paid');
	const settledPayouts = payouts.filter(payout => SETTLED_PAYOUT_STATUSES.includes(payout.status));

	const totalRevenue = _.sumBy(paidOrders, order => order.amount);
	const paidOut = _.sumBy(settledPayouts, payout => payout.amount);

	return {
		total_orders: paidOrders.length,
		total_revenue: totalRevenue,
		pending_payout: Math.max(totalRevenue - paidOut, 0),
	};
}

export const revenueUtils = {
	computeRevenueSummary,
};
