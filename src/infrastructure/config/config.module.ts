import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { EnvConfigService } from './env-config.service';
import { validateEnv } from './env.validation';

/**
 * Global configuration module.
 *
 * Loads `.env.local` / `.env`, validates them with the Zod schema and
 * provides EnvConfigService for type-safe access.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
  ],
  providers: [EnvConfigService],
  exports: [EnvConfigService],
})
export class ConfigModule {}
