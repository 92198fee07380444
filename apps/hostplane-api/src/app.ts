import type {Server} from 'node:http';

import 'reflect-metadata';
import helmet from 'helmet';
import express from 'express';
import {NestFactory} from '@nestjs/core';
import {ExpressAdapter} from '@nestjs/platform-express';
import {createStructuredLogger, type StructuredLogger} from '@hostplane/logging';

import type {ServiceConfig} from './config';
import {paramDecodeErrorHandler, pathEncodingGuard} from './nest/encodingGuards';
import {HostplaneApiNestModule} from './nest/hostplaneApiNestModule';
import {createHostplaneRuntime, type HostplaneRuntimeOverrides} from './runtime';

export const createHostplaneApiApp = async ({
  config,
  logger: providedLogger,
  overrides
}: {
  config: ServiceConfig;
  logger?: StructuredLogger;
  overrides?: HostplaneRuntimeOverrides;
}) => {
  const logger =
    providedLogger ??
    createStructuredLogger({
      service: 'hostplane-api',
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    });
  const runtime = createHostplaneRuntime({config, logger, ...(overrides ? {overrides} : {})});

  const expressApp = express();
  expressApp.disable('x-powered-by');
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  );
  expressApp.use(pathEncodingGuard);

  const nestApp = await NestFactory.create(
    HostplaneApiNestModule.register({
      config,
      store: runtime.store,
      logger
    }),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
    }
  );

  await nestApp.init();
  expressApp.use(paramDecodeErrorHandler);

  const server: Server = nestApp.getHttpServer();

  // The proxy comes up with the committed state before the API accepts writes.
  const start = async () => {
    await runtime.store.start();
    await nestApp.listen(config.port, config.host);
  };

  const stop = async () => {
    await nestApp.close();
    await runtime.store.shutdown();
  };

  return {
    server,
    start,
    stop,
    runtime,
    logger
  };
};

export type HostplaneApiApp = Awaited<ReturnType<typeof createHostplaneApiApp>>;
