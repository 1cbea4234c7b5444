import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from 'nestjs-pino';
import {
  AppLoggerService,
  LoggerModule,
  createLoggerParams,
} from '@infrastructure/observability/logging';
import { TestConfigModule } from '../../../../support/test-config.module';

describe('LoggerModule', () => {
  describe('createLoggerParams', () => {
    it('should write pretty logs to stderr outside production', () => {
      // Act
      const params = createLoggerParams({
        logLevel: 'debug',
        isProduction: false,
        cafeName: 'Test Café',
      });

      // Assert
      expect(params.pinoHttp).toEqual({
        level: 'debug',
        base: { cafe: 'Test Café' },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });
    });

    it('should write JSON logs to stderr in production', () => {
      // Act
      const params = createLoggerParams({
        logLevel: 'warn',
        isProduction: true,
        cafeName: 'Test Café',
      });

      // Assert
      expect(Array.isArray(params.pinoHttp)).toBe(true);
      if (Array.isArray(params.pinoHttp)) {
        const [options, stream] = params.pinoHttp;
        expect(options).toEqual({ level: 'warn', base: { cafe: 'Test Café' } });
        expect(stream).toMatchObject({ fd: 2 });
      }
    });
  });

  describe('module wiring', () => {
    let module: TestingModule;

    beforeEach(async () => {
      module = await Test.createTestingModule({
        imports: [TestConfigModule.register(), LoggerModule],
      }).compile();
    });

    afterEach(async () => {
      await module.close();
    });

    it('should provide AppLoggerService', () => {
      expect(module.get(AppLoggerService)).toBeInstanceOf(AppLoggerService);
    });

    it('should provide the pino-backed Nest logger', () => {
      expect(module.get(Logger)).toBeInstanceOf(Logger);
    });
  });
});
