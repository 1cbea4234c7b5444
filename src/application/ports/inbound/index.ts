export { IOrderWorkflowPort } from './order-workflow.port';
