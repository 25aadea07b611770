import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { JsonObject, JsonValue, isJsonObject } from '../common/json';
import { pickField } from '../common/pick-field';
import { sanitize } from '../common/sanitize';
import { UpstreamService } from '../upstream/upstream.service';
import { UpstreamTimeoutError } from '../upstream/upstream.errors';
import { TransactionType, UpstreamResponse } from '../upstream/types/upstream.types';
import { normalizeStatus } from './status-normalizer';
import { extractFirstTransaction, isEmptyRecord } from './transaction-extractor';
import {
  AMOUNT_KEYS,
  CanonicalStatus,
  CURRENCY_KEYS,
  DEFAULT_CURRENCY,
  LookupFailure,
  LookupFailureReason,
  LookupOutcome,
  LookupSuccess,
  MERCHANT_NAME_KEYS,
  MERCHANT_PROVIDER_KEY,
  MERCHANT_PROVIDER_NAME_KEYS,
  NOT_AVAILABLE,
  NOT_IN_BO,
  PROCESSED_AT_KEYS,
  TXN_ID_KEYS,
} from './types/status.types';

@Injectable()
export class StatusService {
  constructor(
    private readonly upstreamService: UpstreamService,
    @InjectPinoLogger(StatusService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Looks up one merchant transaction id upstream. Upstream failures come back
   * as a {@link LookupFailure}; this method does not reject.
   */
  async resolve(orderId: string, type: TransactionType): Promise<LookupOutcome> {
    let upstream: UpstreamResponse;

    try {
      upstream = await this.upstreamService.fetchStatus(orderId, type);
    } catch (error) {
      return this.toFailure(orderId, type, error);
    }

    const transaction = extractFirstTransaction(upstream.body, type);
    const rawStatus = transaction.status ?? null;
    const status = normalizeStatus(rawStatus);

    const result: LookupSuccess = {
      kind: 'success',
      orderId,
      type,
      statusCode: upstream.statusCode,
      upstreamOk: upstream.ok,
      found: !isEmptyRecord(transaction),
      status,
      rawStatus,
      txnId: pickField(transaction, TXN_ID_KEYS, NOT_AVAILABLE),
      processedAt: pickField(transaction, PROCESSED_AT_KEYS, NOT_AVAILABLE),
      amount: pickField(transaction, AMOUNT_KEYS, null),
      currency: pickField(transaction, CURRENCY_KEYS, DEFAULT_CURRENCY),
      merchant: this.resolveMerchant(transaction),
      data: sanitize(upstream.body),
    };

    this.logger.info(
      {
        orderId,
        type,
        statusCode: result.statusCode,
        status: status.status,
        found: result.found,
      },
      'Status lookup resolved',
    );

    return result;
  }

  /**
   * Anomaly note for a resolved lookup. Only the highest-priority anomaly is
   * reported: missing transaction, then upstream not ok, then unknown status,
   * then a non-200 status code.
   */
  describeAnomaly(result: LookupSuccess): string {
    if (!result.found) {
      return NOT_IN_BO;
    }
    if (!result.upstreamOk) {
      return 'Upstream not ok';
    }
    if (result.status.status === CanonicalStatus.UNKNOWN) {
      return 'Unknown status';
    }
    if (result.statusCode !== 200) {
      return `HTTP ${result.statusCode}`;
    }
    return '';
  }

  private resolveMerchant(transaction: JsonObject): JsonValue {
    const provider = transaction[MERCHANT_PROVIDER_KEY];
    const providerMerchant = isJsonObject(provider)
      ? pickField(provider, MERCHANT_PROVIDER_NAME_KEYS, null)
      : null;

    return providerMerchant ?? pickField(transaction, MERCHANT_NAME_KEYS, null);
  }

  private toFailure(orderId: string, type: TransactionType, error: unknown): LookupFailure {
    if (error instanceof UpstreamTimeoutError) {
      return {
        kind: 'failure',
        orderId,
        type,
        reason: LookupFailureReason.TIMEOUT,
        message: error.message,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error({ orderId, type, err: error }, 'Status lookup failed');

    return {
      kind: 'failure',
      orderId,
      type,
      reason: LookupFailureReason.ERROR,
      message,
    };
  }
}
