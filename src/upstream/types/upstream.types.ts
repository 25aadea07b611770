import { JsonValue } from '../../common/json';

export enum TransactionType {
  PAYOUT = 'payout',
  PAYIN = 'payin',
}

export interface UpstreamResponse {
  statusCode: number;
  ok: boolean;
  body: JsonValue;
}

export const UPSTREAM_ENDPOINTS: Readonly<Record<TransactionType, string>> = {
  [TransactionType.PAYOUT]:
    process.env.PAYOUT_STATUS_URL || 'https://server.sahulatpay.com/disbursement/tele',
  [TransactionType.PAYIN]:
    process.env.PAYIN_STATUS_URL || 'https://server.sahulatpay.com/transactions/tele',
};

export const UPSTREAM_QUERY_PARAM = 'merchantTransactionId';

// Configuration constants
export const UPSTREAM_TIMEOUT_MS = Number(process.env.UPSTREAM_TIMEOUT_MS) || 15_000;
