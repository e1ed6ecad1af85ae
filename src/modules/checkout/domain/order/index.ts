export { aggregateOrder } from './aggregate-order';
export {
  OrderContext,
  type FailureKind,
  type StepFailure,
  type StepRecord,
} from './order-context';
export * from './order.types';
