export { CoffeeOrder } from './coffee-order.entity';
