import {
  BadRequestException,
  Body,
  Controller,
  Get,
  GatewayTimeoutException,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { ErrorKind, errorBody } from '../common/errors';
import { bodyValidationPipe, queryValidationPipe } from '../common/validation.pipe';
import { JsonValue } from '../common/json';
import { TransactionType } from '../upstream/types/upstream.types';
import { BulkStatusService } from './bulk-status.service';
import { BulkStatusDto } from './dto/bulk-status.dto';
import { StatusQueryDto } from './dto/status-query.dto';
import { StatusService } from './status.service';
import { BulkStatusResult, LookupFailureReason, StatusSummary } from './types/status.types';

export interface StatusLookupResponse {
  ok: boolean;
  status_code: number;
  order_id: string;
  type: TransactionType;
  summary: StatusSummary;
  data: JsonValue;
}

@Controller()
export class StatusController {
  constructor(
    private readonly statusService: StatusService,
    private readonly bulkStatusService: BulkStatusService,
  ) {}

  @Get('status')
  async getStatus(
    @Query(queryValidationPipe) query: StatusQueryDto,
    @Res() res: Response,
  ): Promise<void> {
    const orderId = query.order_id || query.id;

    if (!orderId) {
      throw new BadRequestException(errorBody(ErrorKind.VALIDATION_ERROR, 'order_id is required'));
    }

    const outcome = await this.statusService.resolve(orderId, query.type);

    if (outcome.kind === 'failure') {
      if (outcome.reason === LookupFailureReason.TIMEOUT) {
        throw new GatewayTimeoutException(errorBody(ErrorKind.TIMEOUT, outcome.message));
      }
      throw new InternalServerErrorException(errorBody(ErrorKind.UPSTREAM_ERROR, outcome.message));
    }

    const body: StatusLookupResponse = {
      ok: outcome.upstreamOk,
      status_code: outcome.statusCode,
      order_id: outcome.orderId,
      type: outcome.type,
      summary: {
        status: outcome.status.status,
        raw_status: outcome.rawStatus,
        txn_id: outcome.txnId,
        date: outcome.processedAt,
        amount: outcome.amount,
        currency: outcome.currency,
        merchant: outcome.merchant,
        note: this.statusService.describeAnomaly(outcome),
      },
      data: outcome.data,
    };

    // Mirror the upstream status code to the caller.
    res.status(outcome.statusCode).json(body);
  }

  @Post('bulk-status')
  @HttpCode(HttpStatus.OK)
  async getBulkStatus(@Body(bodyValidationPipe) dto: BulkStatusDto): Promise<BulkStatusResult> {
    return this.bulkStatusService.resolveMany(dto.ids, dto.type);
  }
}
