import { Cafe } from '@domain/services';
import { CoffeeOrder } from '@domain/entities';

describe('Cafe', () => {
  let cafe: Cafe;

  beforeEach(() => {
    cafe = new Cafe();
  });

  describe('isOpen', () => {
    it('should always be open', () => {
      expect(cafe.isOpen()).toBe(true);
    });
  });

  describe('brew', () => {
    it('should describe brewing a drink', () => {
      expect(cafe.brew('Cappuccino')).toBe('Brewing Cappuccino...');
    });

    it('should accept any drink label', () => {
      expect(cafe.brew('')).toBe('Brewing ...');
    });
  });

  describe('serve', () => {
    it('should describe serving an order', () => {
      const order = CoffeeOrder.create('Latte', 'medium');

      expect(cafe.serve(order)).toBe('Serving Latte (medium)');
    });

    it('should not change the order status', () => {
      const order = CoffeeOrder.create('Latte', 'medium');

      cafe.serve(order);

      expect(order.status.value).toBe('ordered');
      expect(order.isServed()).toBe(false);
    });

    it('should leave a prepared order prepared', () => {
      const order = CoffeeOrder.create('Mocha', 'large');
      order.prepare();

      expect(cafe.serve(order)).toBe('Serving Mocha (large)');
      expect(order.isPrepared()).toBe(true);
    });

    it('should read the order freshly on every call', () => {
      const latte = CoffeeOrder.create('Latte', 'medium');
      const espresso = CoffeeOrder.create('Espresso', 'small');

      expect(cafe.serve(latte)).toBe('Serving Latte (medium)');
      expect(cafe.serve(espresso)).toBe('Serving Espresso (small)');
    });
  });
});
