export { pathToArray as responsePathAsArray } from '../jsutils/Path';

export {
  createSourceEventStream,
  defaultFieldResolver,
  defaultTypeResolver,
  execute,
  executeSync,
  experimentalExecuteIncrementally,
  subscribe,
  UNEXPECTED_EXPERIMENTAL_DIRECTIVES,
  UNEXPECTED_MULTIPLE_PAYLOADS,
} from './execute';

export type { ExecutionArgs, StreamUsage } from './execute';

export { collectFields, collectSubfields } from './collectFields';

export type {
  CollectFieldsResult,
  DeferUsage,
  FieldDetails,
  FieldGroup,
  GroupedFieldSet,
} from './collectFields';

export { buildFieldPlan } from './buildFieldPlan';

export type {
  DeferUsageSet,
  FieldPlan,
  NewGroupedFieldSetDetails,
} from './buildFieldPlan';

export { mapAsyncIterable } from './mapAsyncIterable';

export { MiddlewareManager } from './middleware';

export type { Middleware, MiddlewareFn, MiddlewareObject } from './middleware';

export { sortErrors } from './sortErrors';

export {
  getArgumentValues,
  getDirectiveValues,
  getVariableValues,
} from './values';

export type {
  BareDeferredGroupedFieldSetResult,
  BareStreamItemsResult,
  CompletedResult,
  ExecutionResult,
  ExperimentalIncrementalExecutionResults,
  FormattedExecutionResult,
  IncrementalDeferResult,
  IncrementalResult,
  IncrementalStreamResult,
  InitialIncrementalExecutionResult,
  PendingResult,
  SubsequentIncrementalExecutionResult,
} from './types';
