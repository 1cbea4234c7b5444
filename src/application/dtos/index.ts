export * from './order.dto';
