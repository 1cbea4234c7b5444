import { CoffeeOrder } from '../entities';

/**
 * Domain Service describing what the café does with drinks and orders.
 * Holds no state: every method depends only on its arguments.
 *
 * Describing a serve does not mark the order as served. Callers that need
 * both must call `order.serve()` themselves.
 */
export class Cafe {
  isOpen(): boolean {
    return true;
  }

  brew(drink: string): string {
    return `Brewing ${drink}...`;
  }

  serve(order: CoffeeOrder): string {
    return `Serving ${order.drink} (${order.size})`;
  }
}
