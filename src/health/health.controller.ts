import { Controller, Get } from '@nestjs/common';
import { UPSTREAM_TIMEOUT_MS } from '../upstream/types/upstream.types';
import { BULK_MAX_IDS } from '../status/types/status.types';

export const SERVICE_NAME = 'payout-status-proxy';
export const SERVICE_VERSION = '1.0.0';

@Controller()
export class HealthController {
  @Get()
  describeService() {
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        status: 'GET /status?order_id=<id>&type=payout|payin',
        bulkStatus: 'POST /bulk-status',
        health: 'GET /health',
      },
      limits: {
        bulkMaxIds: BULK_MAX_IDS,
        upstreamTimeoutMs: UPSTREAM_TIMEOUT_MS,
      },
    };
  }

  // Liveness only; the upstream is not contacted.
  @Get('health')
  liveness() {
    return {
      ok: true,
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
    };
  }
}
