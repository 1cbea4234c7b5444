import { DynamicModule, Global, Module } from '@nestjs/common';
import { EnvConfigService } from '@infrastructure/config';

type TestEnvConfig = Pick<EnvConfigService, 'nodeEnv' | 'logLevel' | 'cafeName' | 'isProduction'>;

/**
 * Global stand-in for ConfigModule, so module specs never read .env files.
 * Defaults to production with silent logs to keep pino-pretty workers out of tests.
 */
@Global()
@Module({})
export class TestConfigModule {
  static register(overrides: Partial<TestEnvConfig> = {}): DynamicModule {
    const config: TestEnvConfig = {
      nodeEnv: 'production',
      logLevel: 'silent',
      cafeName: 'Test Café',
      isProduction: true,
      ...overrides,
    };

    return {
      module: TestConfigModule,
      global: true,
      providers: [{ provide: EnvConfigService, useValue: config }],
      exports: [EnvConfigService],
    };
  }
}
