/**
 * Value Object representing the status of a coffee order.
 * Orders move forward through: ordered → prepared → served
 */
export class OrderStatus {
  private constructor(public readonly value: OrderStatusValue) {}

  // Factory methods for each status
  static ordered(): OrderStatus {
    return new OrderStatus('ordered');
  }

  static prepared(): OrderStatus {
    return new OrderStatus('prepared');
  }

  static served(): OrderStatus {
    return new OrderStatus('served');
  }

  // Status checks
  isPrepared(): boolean {
    return this.value === 'prepared';
  }

  isServed(): boolean {
    return this.value === 'served';
  }

  toString(): string {
    return this.value;
  }
}

export type OrderStatusValue = 'ordered' | 'prepared' | 'served';
