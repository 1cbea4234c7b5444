export { LoggerModule, createLoggerParams } from './logger.module';
export { AppLoggerService, OrderEvent } from './app-logger.service';
