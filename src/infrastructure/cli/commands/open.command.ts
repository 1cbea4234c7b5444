import { Inject } from '@nestjs/common';
import { Command, CommandRunner } from 'nest-commander';
import { Cafe } from '../../../domain/services';
import { EnvConfigService } from '../../config';

@Command({
  name: 'open',
  description: 'Check whether the café is taking orders',
})
export class OpenCommand extends CommandRunner {
  constructor(
    @Inject(Cafe) private readonly cafe: Cafe,
    private readonly envConfig: EnvConfigService,
  ) {
    super();
  }

  async run(): Promise<void> {
    const state = this.cafe.isOpen() ? 'open' : 'closed';
    // eslint-disable-next-line no-console
    console.log(`${this.envConfig.cafeName} is ${state}`);
  }
}
