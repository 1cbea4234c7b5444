export { ConfigModule } from './config.module';
export { EnvConfigService } from './env-config.service';
export { EnvConfig, envSchema, validateEnv } from './env.validation';
