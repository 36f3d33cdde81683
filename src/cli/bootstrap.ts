import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '@/app.module';

/**
 * Builds the DI container. Provider errors (a bad env value, for one)
 * reject here instead of aborting the process, so the CLI can report them.
 */
export function createCollectorContext(
  logger: LogLevel[] | false = ['log', 'warn', 'error'],
): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, {
    logger,
    abortOnError: false,
  });
}
