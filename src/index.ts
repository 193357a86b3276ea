/** Directives for defer/stream support */
export { GraphQLDeferDirective, GraphQLStreamDirective } from './type/index';

/** Execute GraphQL queries. */
export {
  createSourceEventStream,
  defaultFieldResolver,
  defaultTypeResolver,
  execute,
  executeSync,
  experimentalExecuteIncrementally,
  responsePathAsArray,
  subscribe,
  UNEXPECTED_EXPERIMENTAL_DIRECTIVES,
  UNEXPECTED_MULTIPLE_PAYLOADS,
  collectFields,
  collectSubfields,
  buildFieldPlan,
  mapAsyncIterable,
  MiddlewareManager,
  sortErrors,
  getArgumentValues,
  getDirectiveValues,
  getVariableValues,
} from './execution/index';

export type {
  ExecutionArgs,
  StreamUsage,
  CollectFieldsResult,
  DeferUsage,
  FieldDetails,
  FieldGroup,
  GroupedFieldSet,
  DeferUsageSet,
  FieldPlan,
  NewGroupedFieldSetDetails,
  Middleware,
  MiddlewareFn,
  MiddlewareObject,
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
} from './execution/index';

/** Coerce input values. */
export { coerceInputValue } from './utilities/coerceInputValue';
export type { OnErrorCB } from './utilities/coerceInputValue';
export { valueFromAST } from './utilities/valueFromAST';

/** Logging. */
export { createLogger } from './logger';
export type { Logger } from './logger';
