import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { JsonValue } from '../common/json';
import { parseJsonPreservingIntegers } from '../common/parse-json';
import { UpstreamRequestError, UpstreamTimeoutError } from './upstream.errors';
import {
  TransactionType,
  UpstreamResponse,
  UPSTREAM_ENDPOINTS,
  UPSTREAM_QUERY_PARAM,
  UPSTREAM_TIMEOUT_MS,
} from './types/upstream.types';

@Injectable()
export class UpstreamService {
  private readonly timeoutMs = UPSTREAM_TIMEOUT_MS;

  constructor(
    @InjectPinoLogger(UpstreamService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Issues the status GET for one merchant transaction id.
   *
   * Throws {@link UpstreamTimeoutError} when the deadline passes before the body
   * is read, and {@link UpstreamRequestError} for any other transport failure.
   */
  async fetchStatus(orderId: string, type: TransactionType): Promise<UpstreamResponse> {
    const url = new URL(UPSTREAM_ENDPOINTS[type]);
    url.searchParams.set(UPSTREAM_QUERY_PARAM, orderId);
    const target = url.toString();
    const startedAt = Date.now();

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = await response.text();

      this.logger.debug(
        { orderId, type, statusCode: response.status, durationMs: Date.now() - startedAt },
        'Upstream responded',
      );

      return {
        statusCode: response.status,
        ok: response.ok,
        body: this.parseBody(text),
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.warn({ orderId, type, timeoutMs: this.timeoutMs }, 'Upstream request timed out');
        throw new UpstreamTimeoutError(target, this.timeoutMs);
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ orderId, type, err: error }, 'Upstream request failed');
      throw new UpstreamRequestError(target, message, { cause: error });
    }
  }

  private parseBody(text: string): JsonValue {
    try {
      return parseJsonPreservingIntegers(text);
    } catch {
      return { raw: text };
    }
  }
}
