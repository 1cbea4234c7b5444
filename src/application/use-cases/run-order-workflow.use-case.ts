import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import { OrderOutputDto, OrderWorkflowOutputDto, RunOrderWorkflowInputDto } from '../dtos';
import { ApplicationError, CafeClosedError, UnexpectedError } from '../errors';
import { CoffeeOrder } from '../../domain/entities';
import { Cafe } from '../../domain/services';
import { IOrderWorkflowPort } from '../ports';

/**
 * RunOrderWorkflowUseCase takes one order from placement to the counter.
 *
 * The café only describes brewing and serving; the order's own transitions
 * are invoked here explicitly. Steps:
 * 1. Refuse if the café is closed
 * 2. Place the order and brew the drink
 * 3. Prepare the order (unless skipped)
 * 4. Serve the order and describe the hand-off (unless skipped)
 */
@Injectable()
export class RunOrderWorkflowUseCase implements IOrderWorkflowPort {
  private readonly logger = new Logger(RunOrderWorkflowUseCase.name);

  constructor(@Inject(Cafe) private readonly cafe: Cafe) {}

  execute(input: RunOrderWorkflowInputDto): Either<ApplicationError, OrderWorkflowOutputDto> {
    try {
      if (!this.cafe.isOpen()) {
        return left(new CafeClosedError());
      }

      const transcript: string[] = [];
      const label = `${input.drink} (${input.size})`;

      const order = CoffeeOrder.create(input.drink, input.size);
      transcript.push(`Order placed: ${label}`);
      this.logger.debug(`Placed order for ${label}`);

      transcript.push(this.cafe.brew(order.drink));

      if (input.prepare ?? true) {
        order.prepare();
        transcript.push(`Order prepared: ${label}`);
        this.logger.debug(`Prepared ${label}`);
      }

      if (input.serve ?? true) {
        // Describing the serve does not transition the order, so both calls are needed
        order.serve();
        transcript.push(this.cafe.serve(order));
        transcript.push(`Order served: ${label}`);
        this.logger.debug(`Served ${label}`);
      }

      return right({ order: this.mapToOutput(order), transcript });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return left(new UnexpectedError(message));
    }
  }

  private mapToOutput(order: CoffeeOrder): OrderOutputDto {
    return {
      drink: order.drink,
      size: order.size,
      status: order.status.value,
      prepared: order.isPrepared(),
      served: order.isServed(),
      summary: order.toSummary(),
    };
  }
}
