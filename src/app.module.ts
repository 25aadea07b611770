import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { ErrorBodyFilter } from './common/error-body.filter';
import { buildLoggerParams } from './config/logger.config';
import { HealthModule } from './health/health.module';
import { StatusModule } from './status/status.module';

@Module({
  imports: [LoggerModule.forRoot(buildLoggerParams()), StatusModule, HealthModule],
  providers: [{ provide: APP_FILTER, useClass: ErrorBodyFilter }],
})
export class AppModule {}
