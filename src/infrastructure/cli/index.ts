export { CafeCliModule } from './cafe-cli.module';
export * from './commands';
