export { OrderCommand } from './order.command';
export { OpenCommand } from './open.command';
