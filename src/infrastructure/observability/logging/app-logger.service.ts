// src/infrastructure/observability/logging/app-logger.service.ts
import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';
import { OrderStatusValue } from '../../../domain/value-objects';

export type OrderEvent = 'placed' | 'prepared' | 'served';

@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Order lifecycle events
   */
  logOrderEvent(context: {
    drink: string;
    size: string;
    event: OrderEvent;
    status: OrderStatusValue;
  }): void {
    this.logger.info(
      {
        component: 'order',
        ...context,
      },
      `Order ${context.event}: ${context.drink} (${context.size})`,
    );
  }

  logWorkflowFailure(context: { drink: string; size: string; code: string; message: string }): void {
    this.logger.error(
      {
        component: 'order',
        ...context,
      },
      `Order workflow failed: ${context.code}`,
    );
  }
}
