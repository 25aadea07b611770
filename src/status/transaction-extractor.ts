import { JsonObject, JsonValue, isJsonObject } from '../common/json';
import { TransactionType } from '../upstream/types/upstream.types';

type TransactionLocator = (response: JsonObject) => JsonValue | undefined;

// Payout responses nest the list under `data`, payin responses carry it at the top level.
const TRANSACTION_LOCATORS: Readonly<Record<TransactionType, TransactionLocator>> = {
  [TransactionType.PAYOUT]: response => {
    const data = response.data;
    return isJsonObject(data) ? data.transactions : undefined;
  },
  [TransactionType.PAYIN]: response => response.transactions,
};

/**
 * First transaction of an upstream response, or an empty record when there is
 * none. Never throws, whatever the shape of `response`.
 */
export function extractFirstTransaction(response: JsonValue, type: TransactionType): JsonObject {
  if (!isJsonObject(response)) {
    return {};
  }

  const transactions = TRANSACTION_LOCATORS[type](response);
  if (!Array.isArray(transactions) || transactions.length === 0) {
    return {};
  }

  const first = transactions[0];
  return isJsonObject(first) ? first : {};
}

export function isEmptyRecord(record: JsonObject): boolean {
  return Object.keys(record).length === 0;
}
