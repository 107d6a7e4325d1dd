import { Static, Type } from '@sinclair/typebox';
import { entityUtils } from '../utils/entity.utils.js';

export const PAYOUT_REQUEST_COLLECTION = 'payoutrequest';

/**
 * Only pending is ever written by this API. approved, rejected and paid are set by
 * whoever processes the requests outside of it.
 */
export const PayoutStatusSchema = Type.Union([
  Type.Literal('pending'),
  Type.Literal('approved'),
  Type.Literal('rejected'),
  Type.Literal('paid'),
], { default: 'pending' });

export type PayoutStatus = Static<typeof PayoutStatusSchema>;

// payouts in these states count as money already handed to the school
export const SETTLED_PAYOUT_STATUSES: PayoutStatus[] = ['approved', 'paid'];

export const PayoutRequestSchema = Type.Object({
  school_id: Type.String(),
  amount: Type.Number({ minimum: 0 }),
  bank_name: Type.String(),
  account_holder: Type.String(),
  account_number: Type.String(),
  ifsc: Type.String({ description: 'IFSC/SWIFT code' }),
  status: PayoutStatusSchema,
});

export type IPayoutRequest = Static<typeof PayoutRequestSchema>;

export const PayoutRequestSpec = entityUtils.getModelSpec(PayoutRequestSchema);

export interface IPayoutCreateResponse {
  request_id: string;
  status: PayoutStatus;
}
