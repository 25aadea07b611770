import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { ErrorKind, errorBody } from '../common/errors';
import { TransactionType } from '../upstream/types/upstream.types';
import { StatusService } from './status.service';
import {
  BULK_MAX_IDS,
  BulkStatusEntry,
  BulkStatusResult,
  LookupFailureReason,
  LookupOutcome,
  NOT_AVAILABLE,
  NOT_IN_BO,
} from './types/status.types';

const FAILURE_STATUS_CODES: Readonly<Record<LookupFailureReason, number>> = {
  [LookupFailureReason.TIMEOUT]: 504,
  [LookupFailureReason.ERROR]: 500,
};

const FAILURE_STATUSES: ReadonlySet<string> = new Set(Object.values(LookupFailureReason));

@Injectable()
export class BulkStatusService {
  constructor(
    private readonly statusService: StatusService,
    @InjectPinoLogger(BulkStatusService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Resolves each non-blank id in order, one upstream call at a time. A failing
   * id becomes a TIMEOUT or ERROR entry and the batch carries on.
   */
  async resolveMany(ids: readonly string[], type: TransactionType): Promise<BulkStatusResult> {
    if (ids.length === 0) {
      throw new BadRequestException(
        errorBody(ErrorKind.VALIDATION_ERROR, 'ids must be a non-empty list'),
      );
    }

    if (ids.length > BULK_MAX_IDS) {
      throw new BadRequestException(
        errorBody(ErrorKind.VALIDATION_ERROR, `ids must not contain more than ${BULK_MAX_IDS} entries`),
      );
    }

    const startedAt = Date.now();
    const orderIds = ids.map(id => id.trim()).filter(id => id !== '');
    const results = new Array<BulkStatusEntry>(orderIds.length);

    for (const [index, orderId] of orderIds.entries()) {
      results[index] = this.toEntry(await this.resolveIsolated(orderId, type));
    }

    const elapsedMs = Date.now() - startedAt;

    this.logger.info(
      {
        type,
        requested: ids.length,
        resolved: results.length,
        notFound: results.filter(r => r.status === NOT_IN_BO).length,
        failed: results.filter(r => FAILURE_STATUSES.has(r.status)).length,
        elapsedMs,
      },
      'Bulk status lookup completed',
    );

    return {
      ok: true,
      type,
      count: results.length,
      elapsed_ms: elapsedMs,
      results,
    };
  }

  private async resolveIsolated(orderId: string, type: TransactionType): Promise<LookupOutcome> {
    try {
      return await this.statusService.resolve(orderId, type);
    } catch (error) {
      this.logger.error({ orderId, type, err: error }, 'Unexpected failure during bulk lookup');
      return {
        kind: 'failure',
        orderId,
        type,
        reason: LookupFailureReason.ERROR,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private toEntry(outcome: LookupOutcome): BulkStatusEntry {
    if (outcome.kind === 'failure') {
      return {
        order_id: outcome.orderId,
        type: outcome.type,
        status: outcome.reason,
        raw_status: null,
        txn_id: NOT_AVAILABLE,
        processed_at: NOT_AVAILABLE,
        status_code: FAILURE_STATUS_CODES[outcome.reason],
        note: outcome.reason === LookupFailureReason.TIMEOUT ? outcome.reason : outcome.message,
      };
    }

    if (!outcome.found) {
      return {
        order_id: outcome.orderId,
        type: outcome.type,
        status: NOT_IN_BO,
        raw_status: null,
        txn_id: NOT_AVAILABLE,
        processed_at: NOT_AVAILABLE,
        status_code: outcome.statusCode,
        note: NOT_IN_BO,
      };
    }

    return {
      order_id: outcome.orderId,
      type: outcome.type,
      status: outcome.status.status,
      raw_status: outcome.rawStatus,
      txn_id: outcome.txnId,
      processed_at: outcome.processedAt,
      status_code: outcome.statusCode,
      note: this.statusService.describeAnomaly(outcome),
    };
  }
}
