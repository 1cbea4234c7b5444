import { Either } from '../../common';
import { ApplicationError } from '../../errors';
import { OrderWorkflowOutputDto, RunOrderWorkflowInputDto } from '../../dtos';

export interface IOrderWorkflowPort {
  /**
   * Place an order and walk it through brewing, preparing and serving.
   *
   * @param input - Drink, size and which transitions to apply
   * @returns Either an error or the final order with a transcript of each step
   */
  execute(input: RunOrderWorkflowInputDto): Either<ApplicationError, OrderWorkflowOutputDto>;
}
