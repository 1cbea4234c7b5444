export { RunOrderWorkflowUseCase } from './run-order-workflow.use-case';
