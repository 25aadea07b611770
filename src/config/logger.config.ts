import { Params } from 'nestjs-pino';

export function buildLoggerParams(env: NodeJS.ProcessEnv = process.env): Params {
  const isTest = env.NODE_ENV === 'test';
  const isProduction = env.NODE_ENV === 'production';

  return {
    pinoHttp: {
      transport:
        !isProduction && !isTest
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                singleLine: true,
                levelFirst: true,
                translateTime: 'SYS:standard',
              },
            }
          : undefined,
      level: isTest ? 'silent' : env.LOG_LEVEL || 'info',
      autoLogging: !isTest,
      redact: ['req.headers.authorization'],
    },
  };
}
