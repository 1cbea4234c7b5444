import { OrderStatusValue } from '../../domain/value-objects';

/**
 * Input for running a single order through the café.
 * `prepare` and `serve` default to true.
 */
export interface RunOrderWorkflowInputDto {
  drink: string;
  size: string;
  prepare?: boolean;
  serve?: boolean;
}

export interface OrderOutputDto {
  drink: string;
  size: string;
  status: OrderStatusValue;
  prepared: boolean;
  served: boolean;
  summary: string;
}

export interface OrderWorkflowOutputDto {
  order: OrderOutputDto;
  // Human-readable lines, in the order the steps happened
  transcript: string[];
}
