/**
 * Either monad for explicit error handling.
 *
 * Either<L, R> represents a value that can be one of two types:
 * - Left<L>: Represents a failure/error case
 * - Right<R>: Represents a success case
 *
 * @example
 * ```typescript
 * const result = useCase.execute({ drink: 'Latte', size: 'medium' });
 * if (result.isRight()) {
 *   console.log(result.value.transcript);
 * } else {
 *   console.log(result.value.code);
 * }
 * ```
 */

// Left represents failure
export class Left<L> {
  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

// Right represents success
export class Right<R> {
  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

// Union type
export type Either<L, R> = Left<L> | Right<R>;

// Helper functions to create Either values
export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);
