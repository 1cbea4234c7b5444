import { Module } from '@nestjs/common';
import { RunOrderWorkflowUseCase } from '../../application/use-cases';
import { Cafe } from '../../domain/services';
import { LoggerModule } from '../observability/logging';
import { OpenCommand, OrderCommand } from './commands';

/**
 * Module wiring the café's domain and use cases to CLI commands.
 *
 * Domain classes stay free of Nest decorators, so they are
 * provided through factories here.
 */
@Module({
  imports: [LoggerModule],
  providers: [
    {
      provide: Cafe,
      useFactory: (): Cafe => new Cafe(),
    },
    {
      provide: 'IOrderWorkflow',
      useFactory: (cafe: Cafe): RunOrderWorkflowUseCase => new RunOrderWorkflowUseCase(cafe),
      inject: [Cafe],
    },
    OrderCommand,
    OpenCommand,
  ],
})
export class CafeCliModule {}
