export { OrderStatus, OrderStatusValue } from './order-status.vo';
