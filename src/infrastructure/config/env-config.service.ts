import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Use this instead of ConfigService.get() for autocomplete and
 * compile-time checking. Values always exist: the Zod schema fills
 * defaults at startup.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get logLevel(): EnvConfig['LOG_LEVEL'] {
    return this.configService.get('LOG_LEVEL', { infer: true });
  }

  get cafeName(): EnvConfig['CAFE_NAME'] {
    return this.configService.get('CAFE_NAME', { infer: true });
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
