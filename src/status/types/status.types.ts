import { JsonValue } from '../../common/json';
import { TransactionType } from '../../upstream/types/upstream.types';

export enum CanonicalStatus {
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  PENDING = 'PENDING',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Vendor status after normalization. Unrecognised statuses are kept as
 * `other`, holding the raw text upper-cased.
 */
export type NormalizedStatus =
  | { kind: 'known'; status: CanonicalStatus }
  | { kind: 'other'; status: string };

export enum LookupFailureReason {
  TIMEOUT = 'TIMEOUT',
  ERROR = 'ERROR',
}

export const NOT_IN_BO = 'NOT_IN_BO';

export interface LookupSuccess {
  kind: 'success';
  orderId: string;
  type: TransactionType;
  statusCode: number;
  upstreamOk: boolean;
  found: boolean;
  status: NormalizedStatus;
  rawStatus: JsonValue;
  txnId: JsonValue;
  processedAt: JsonValue;
  amount: JsonValue;
  currency: JsonValue;
  merchant: JsonValue;
  data: JsonValue;
}

export interface LookupFailure {
  kind: 'failure';
  orderId: string;
  type: TransactionType;
  reason: LookupFailureReason;
  message: string;
}

export type LookupOutcome = LookupSuccess | LookupFailure;

export interface StatusSummary {
  status: string;
  raw_status: JsonValue;
  txn_id: JsonValue;
  date: JsonValue;
  amount: JsonValue;
  currency: JsonValue;
  merchant: JsonValue;
  note: string;
}

export interface BulkStatusEntry {
  order_id: string;
  type: TransactionType;
  status: string;
  raw_status: JsonValue;
  txn_id: JsonValue;
  processed_at: JsonValue;
  status_code: number;
  note: string;
}

export interface BulkStatusResult {
  ok: true;
  type: TransactionType;
  count: number;
  elapsed_ms: number;
  results: BulkStatusEntry[];
}

export const BULK_MAX_IDS = 5000;

export const NOT_AVAILABLE = 'N/A';
export const DEFAULT_CURRENCY = 'PKR';

export const TXN_ID_KEYS = ['transactionId', 'txnId', 'id'] as const;
export const PROCESSED_AT_KEYS = [
  'updatedAt',
  'updated_at',
  'createdAt',
  'created_at',
  'date_time',
  'date',
  'timestamp',
] as const;
export const AMOUNT_KEYS = ['amount', 'totalAmount', 'txnAmount', 'balance'] as const;
export const CURRENCY_KEYS = ['currency', 'ccy'] as const;
export const MERCHANT_PROVIDER_KEY = 'jazzCashMerchant';
export const MERCHANT_PROVIDER_NAME_KEYS = ['merchant_of'] as const;
export const MERCHANT_NAME_KEYS = ['merchantName'] as const;
