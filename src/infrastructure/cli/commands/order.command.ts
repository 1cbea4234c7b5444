import { Inject } from '@nestjs/common';
import { Command, CommandRunner, Option } from 'nest-commander';
import { IOrderWorkflowPort } from '../../../application/ports';
import { OrderStatusValue } from '../../../domain/value-objects';
import { AppLoggerService, OrderEvent } from '../../observability/logging';

interface OrderCommandOptions {
  skipPrepare?: boolean;
  skipServe?: boolean;
}

const EVENT_BY_STATUS: Record<OrderStatusValue, OrderEvent> = {
  ordered: 'placed',
  prepared: 'prepared',
  served: 'served',
};

@Command({
  name: 'order',
  arguments: '<drink> <size>',
  description: 'Place an order and walk it through brewing, preparing and serving',
})
export class OrderCommand extends CommandRunner {
  constructor(
    @Inject('IOrderWorkflow')
    private readonly orderWorkflow: IOrderWorkflowPort,
    private readonly appLogger: AppLoggerService,
  ) {
    super();
  }

  async run(passedParams: string[], options: OrderCommandOptions = {}): Promise<void> {
    const [drink, size] = passedParams;

    const result = this.orderWorkflow.execute({
      drink,
      size,
      prepare: !options.skipPrepare,
      serve: !options.skipServe,
    });

    /* eslint-disable no-console */
    if (result.isLeft()) {
      const error = result.value;
      console.log(`Error [${error.code}]: ${error.message}`);
      this.appLogger.logWorkflowFailure({ drink, size, code: error.code, message: error.message });
      process.exitCode = 1;
      return;
    }

    const { order, transcript } = result.value;
    for (const line of transcript) {
      console.log(line);
    }
    console.log(`Final status: ${order.status}`);
    /* eslint-enable no-console */

    this.appLogger.logOrderEvent({
      drink: order.drink,
      size: order.size,
      event: EVENT_BY_STATUS[order.status],
      status: order.status,
    });
  }

  @Option({
    flags: '--skip-prepare',
    description: 'Do not mark the order as prepared',
  })
  parseSkipPrepare(): boolean {
    return true;
  }

  @Option({
    flags: '--skip-serve',
    description: 'Do not serve the order',
  })
  parseSkipServe(): boolean {
    return true;
  }
}
