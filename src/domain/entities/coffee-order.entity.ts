import { OrderStatus } from '../value-objects';

/**
 * Entity representing a single drink order at the café.
 * Drink and size are fixed at creation; only the status changes.
 */
export class CoffeeOrder {
  private constructor(
    public readonly drink: string,
    public readonly size: string,
    private _status: OrderStatus,
  ) {}

  // Factory method: place a new order
  static create(drink: string, size: string): CoffeeOrder {
    return new CoffeeOrder(drink, size, OrderStatus.ordered());
  }

  get status(): OrderStatus {
    return this._status;
  }

  // Transitions are unconditional: calling them out of order simply overwrites the status
  prepare(): void {
    this._status = OrderStatus.prepared();
  }

  serve(): void {
    this._status = OrderStatus.served();
  }

  isPrepared(): boolean {
    return this._status.isPrepared();
  }

  isServed(): boolean {
    return this._status.isServed();
  }

  // e.g. "Latte (medium) - ordered"
  toSummary(): string {
    return `${this.drink} (${this.size}) - ${this._status.toString()}`;
  }
}
