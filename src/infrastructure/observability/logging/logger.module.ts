// src/infrastructure/observability/logging/logger.module.ts
import { Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import pino from 'pino';
import { EnvConfigService } from '../../config';
import { AppLoggerService } from './app-logger.service';

// stdout carries the command's own output, so logs go to stderr
const STDERR_FD = 2;

export function createLoggerParams(
  envConfig: Pick<EnvConfigService, 'logLevel' | 'isProduction' | 'cafeName'>,
): Params {
  const options = {
    level: envConfig.logLevel,
    base: { cafe: envConfig.cafeName },
  };

  // JSON lines in production
  if (envConfig.isProduction) {
    return { pinoHttp: [options, pino.destination(STDERR_FD)] };
  }

  // Readable output while developing
  return {
    pinoHttp: {
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          singleLine: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    },
  };
}

@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService): Params => createLoggerParams(envConfig),
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
