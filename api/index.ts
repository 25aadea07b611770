import 'reflect-metadata';
import { IncomingMessage, ServerResponse } from 'http';
import { NestFactory } from '@nestjs/core';
import { ExpressAdapter, NestExpressApplication } from '@nestjs/platform-express';
import express from 'express';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

const server = express();

let ready: Promise<NestExpressApplication> | undefined;

async function initNest(): Promise<NestExpressApplication> {
  const nest = await NestFactory.create<NestExpressApplication>(
    AppModule,
    new ExpressAdapter(server),
    { logger: ['error', 'warn', 'log'] },
  );
  configureApp(nest);
  return nest.init();
}

/** Serverless entry: boots Nest on the first request and reuses it afterwards. */
export default async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
  ready ??= initNest().catch(error => {
    ready = undefined;
    throw error;
  });
  await ready;
  server(req, res);
}
