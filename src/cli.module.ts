import { LogLevel, Module } from '@nestjs/common';
import { ConfigModule } from './infrastructure/config';
import { LoggerModule } from './infrastructure/observability/logging';
import { CafeCliModule } from './infrastructure/cli';

// Startup LOG lines would land on stdout ahead of the command's output
export const CLI_LOG_LEVELS: LogLevel[] = ['error', 'warn'];

/**
 * Root module for the CLI.
 *
 * Entry point for nest-commander: configuration and logging are
 * global, the commands live in CafeCliModule.
 */
@Module({
  imports: [ConfigModule, LoggerModule, CafeCliModule],
})
export class CliModule {}
