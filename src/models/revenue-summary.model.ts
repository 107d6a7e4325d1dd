export interface IRevenueSummary {
  total_orders: number;
  total_revenue: number;
  pending_payout: number;
}
