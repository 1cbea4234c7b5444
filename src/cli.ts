import { CommandFactory } from 'nest-commander';
import { Logger } from 'nestjs-pino';
import { CLI_LOG_LEVELS, CliModule } from './cli.module';

async function bootstrap(): Promise<void> {
  const app = await CommandFactory.createWithoutRunning(CliModule, CLI_LOG_LEVELS);
  app.useLogger(app.get(Logger));

  await CommandFactory.runApplication(app);
  await app.close();
}

void bootstrap();
