import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  configureApp(app);

  const port = Number(process.env.PORT) || 5000;
  await app.listen(port, '0.0.0.0');
  app.get(Logger).log(`Status proxy listening on port ${port}`);
}

bootstrap().catch(error => {
  console.error('Failed to start status proxy', error);
  process.exit(1);
});
