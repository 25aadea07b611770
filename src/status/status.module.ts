import { Module } from '@nestjs/common';
import { UpstreamModule } from '../upstream/upstream.module';
import { BulkStatusService } from './bulk-status.service';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';

@Module({
  imports: [UpstreamModule],
  controllers: [StatusController],
  providers: [StatusService, BulkStatusService],
  exports: [StatusService, BulkStatusService],
})
export class StatusModule {}
