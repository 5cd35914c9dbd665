#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CommandRunnerService, ExitCode } from './commands/command-runner.service';
import { describeError } from './common/errors/dcv.errors';

async function bootstrap(): Promise<ExitCode> {
  const logger = new Logger('Bootstrap');
  logger.log('DCV - Domain Control Validation using DigiCert and UltraDNS APIs');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error', 'fatal'],
    abortOnError: false,
  });
  try {
    return await app.get(CommandRunnerService).run();
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    new Logger('Bootstrap').error(describeError(err));
    process.exitCode = ExitCode.FAILURE;
  });
