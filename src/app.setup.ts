import { NestExpressApplication } from '@nestjs/platform-express';

// 5000 ids of vendor-length transaction ids fit well within this.
export const JSON_BODY_LIMIT = '1mb';

/** Body parsing and CORS shared by every entry point and the e2e suite. */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.useBodyParser('json', { limit: JSON_BODY_LIMIT });
  app.enableCors();

  return app;
}
