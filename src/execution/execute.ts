import type {
  DocumentNode,
  FieldNode,
  FragmentDefinitionNode,
  GraphQLAbstractType,
  GraphQLField,
  GraphQLFieldResolver,
  GraphQLLeafType,
  GraphQLList,
  GraphQLObjectType,
  GraphQLOutputType,
  GraphQLResolveInfo,
  GraphQLSchema,
  GraphQLTypeResolver,
  OperationDefinitionNode,
} from 'graphql';
import {
  assertValidSchema,
  GraphQLError,
  isAbstractType,
  isLeafType,
  isListType,
  isNonNullType,
  isObjectType,
  Kind,
  locatedError,
  OperationTypeNode,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
} from 'graphql';

import { devAssert } from '../jsutils/devAssert';
import { inspect } from '../jsutils/inspect';
import { invariant } from '../jsutils/invariant';
import { isAsyncIterable } from '../jsutils/isAsyncIterable';
import { isIterableObject } from '../jsutils/isIterableObject';
import { isObjectLike } from '../jsutils/isObjectLike';
import { isPromise } from '../jsutils/isPromise';
import type { Maybe } from '../jsutils/Maybe';
import { memoize2 } from '../jsutils/memoize2';
import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import { addPath, pathToArray } from '../jsutils/Path';
import { promiseForObject } from '../jsutils/promiseForObject';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { promiseReduce } from '../jsutils/promiseReduce';

import type { Logger } from '../logger';
import { defaultLogger } from '../logger';

import { GraphQLStreamDirective } from '../type/directives';

import type { DeferUsageSet, NewGroupedFieldSetDetails } from './buildFieldPlan';
import { buildFieldPlan } from './buildFieldPlan';
import type {
  CollectFieldsResult,
  DeferUsage,
  FieldGroup,
  GroupedFieldSet,
} from './collectFields';
import {
  collectFields,
  collectSubfields as _collectSubfields,
} from './collectFields';
import { buildIncrementalResponse } from './IncrementalPublisher';
import { mapAsyncIterable } from './mapAsyncIterable';
import type { Middleware } from './middleware';
import { MiddlewareManager } from './middleware';
import { sortErrors } from './sortErrors';
import type {
  CancellableStreamRecord,
  DeferredGroupedFieldSetRecord,
  DeferredGroupedFieldSetResult,
  ExecutionResult,
  ExperimentalIncrementalExecutionResults,
  IncrementalDataRecord,
  StreamItemsRecord,
  StreamItemsResult,
  StreamRecord,
} from './types';
import {
  DeferredFragmentRecord,
  isCancellableStreamRecord,
  isDeferredGroupedFieldSetRecord,
  isReconcilableStreamItemsResult,
} from './types';
import {
  getArgumentValues,
  getDirectiveValues,
  getVariableValues,
} from './values';

/* eslint-disable max-params */

/**
 * Terminology
 *
 * "Definitions" are the generic name for top-level statements in the document.
 * Examples of this include:
 * 1) Operations (such as a query)
 * 2) Fragments
 *
 * "Operations" are a generic name for requests in the document.
 * Examples of this include:
 * 1) query,
 * 2) mutation
 *
 * "Selections" are the definitions that can appear legally and at
 * single level of the query. These include:
 * 1) field references e.g `a`
 * 2) fragment "spreads" e.g. `...c`
 * 3) inline fragment "spreads" e.g. `...on Type { a }`
 */

/**
 * Data that must be available at all points during query execution.
 *
 * Namely, schema of the type system that is currently executing,
 * and the fragments defined in the query document
 */
export interface ExecutionContext {
  schema: GraphQLSchema;
  fragments: ObjMap<FragmentDefinitionNode>;
  rootValue: unknown;
  contextValue: unknown;
  operation: OperationDefinitionNode;
  variableValues: { [variable: string]: unknown };
  fieldResolver: GraphQLFieldResolver<unknown, unknown>;
  typeResolver: GraphQLTypeResolver<unknown, unknown>;
  subscribeFieldResolver: GraphQLFieldResolver<unknown, unknown>;
  middlewareManager: MiddlewareManager;
  /**
   * A memoized collection of relevant subfields with regard to the return
   * type. Memoizing ensures the subfields are not repeatedly calculated, which
   * saves overhead when resolving lists of values.
   */
  collectSubfields: (
    returnType: GraphQLObjectType,
    fieldGroup: FieldGroup,
  ) => CollectFieldsResult;
  streamUsages: WeakMap<FieldGroup, StreamUsage | undefined>;
  cancellableStreams: Set<CancellableStreamRecord>;
  logger: Logger;
}

/**
 * The state of one unit of delivery: the initial result, one deferred
 * grouped field set or one stream item.
 */
interface IncrementalContext {
  errors: Array<GraphQLError>;
  /** Paths of the nullable fields that absorbed an error. */
  nullPaths: Set<Path>;
  incrementalDataRecords: Array<IncrementalDataRecord>;
  deferUsageSet: DeferUsageSet | undefined;
}

export interface ExecutionArgs {
  schema: GraphQLSchema;
  document: DocumentNode;
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>;
  operationName?: Maybe<string>;
  fieldResolver?: Maybe<GraphQLFieldResolver<unknown, unknown>>;
  typeResolver?: Maybe<GraphQLTypeResolver<unknown, unknown>>;
  subscribeFieldResolver?: Maybe<GraphQLFieldResolver<unknown, unknown>>;
  middleware?: Maybe<MiddlewareManager | ReadonlyArray<Middleware>>;
  maxVariableErrors?: Maybe<number>;
  logger?: Maybe<Logger>;
}

export interface StreamUsage {
  label: string | undefined;
  initialCount: number;
  fieldGroup: FieldGroup;
}

const DEFAULT_MAX_VARIABLE_ERRORS = 50;

export const UNEXPECTED_EXPERIMENTAL_DIRECTIVES =
  'The provided schema unexpectedly contains experimental directives (@defer or @stream). These directives may only be utilized if experimental execution features are explicitly enabled.';

export const UNEXPECTED_MULTIPLE_PAYLOADS =
  'Executing this GraphQL operation would unexpectedly produce multiple payloads (due to @defer or @stream directive)';

/**
 * Implements the "Executing requests" section of the GraphQL specification.
 *
 * Returns either a synchronous ExecutionResult (if all encountered resolvers
 * are synchronous), or a Promise of an ExecutionResult that will eventually be
 * resolved and never rejected.
 *
 * If the arguments to this function do not result in a legal execution context,
 * a GraphQLError will be thrown immediately explaining the invalid input.
 *
 * This function does not support incremental delivery (`@defer` and `@stream`).
 * If an operation which would defer or stream data is executed with this
 * function, it will throw or return a rejected promise.
 * Use `experimentalExecuteIncrementally` if you want to support incremental
 * delivery.
 */
export function execute(args: ExecutionArgs): PromiseOrValue<ExecutionResult> {
  if (args.schema.getDirective('defer') || args.schema.getDirective('stream')) {
    throw new Error(UNEXPECTED_EXPERIMENTAL_DIRECTIVES);
  }

  const result = experimentalExecuteIncrementally(args);
  if (isPromise(result)) {
    return result.then(assertSinglePayload);
  }
  return assertSinglePayload(result);
}

function assertSinglePayload(
  result: ExecutionResult | ExperimentalIncrementalExecutionResults,
): ExecutionResult {
  if ('initialResult' in result) {
    // This can happen if the operation contains @defer or @stream directives
    // and is not validated prior to execution
    throw new Error(UNEXPECTED_MULTIPLE_PAYLOADS);
  }
  return result;
}

/**
 * Implements the "Executing requests" section of the GraphQL specification,
 * including `@defer` and `@stream` as proposed in
 * https://github.com/graphql/graphql-spec/pull/742
 *
 * This function returns a Promise of an ExperimentalIncrementalExecutionResults
 * object. This object either consists of a single ExecutionResult, or an
 * object containing an `initialResult` and a stream of `subsequentResults`.
 *
 * If the arguments to this function do not result in a legal execution context,
 * a GraphQLError will be thrown immediately explaining the invalid input.
 */
export function experimentalExecuteIncrementally(
  args: ExecutionArgs,
): PromiseOrValue<ExecutionResult | ExperimentalIncrementalExecutionResults> {
  // If a valid execution context cannot be created due to incorrect arguments,
  // a "Response" with only errors is returned.
  const exeContext = buildExecutionContext(args);

  // Return early errors if execution context failed.
  if (!('schema' in exeContext)) {
    return { errors: exeContext };
  }

  return executeImpl(exeContext);
}

function executeImpl(
  exeContext: ExecutionContext,
): PromiseOrValue<ExecutionResult | ExperimentalIncrementalExecutionResults> {
  // Return a Promise that will eventually resolve to the data described by
  // The "Response" section of the GraphQL specification.
  //
  // If errors are encountered while executing a GraphQL field, only that
  // field and its descendants will be omitted, and sibling fields will still
  // be executed. An execution which encounters errors will still result in a
  // resolved Promise.
  //
  // Errors from sub-fields of a NonNull type may propagate to the top level,
  // at which point we still log the error and null the parent field, which
  // in this case is the entire response.
  const incrementalContext = newIncrementalContext(undefined);
  try {
    const result = executeOperation(exeContext, incrementalContext);
    if (isPromise(result)) {
      return result.then(
        (data) => buildDataResponse(exeContext, incrementalContext, data),
        (error: unknown) =>
          buildErrorResponse(exeContext, incrementalContext, error),
      );
    }
    return buildDataResponse(exeContext, incrementalContext, result);
  } catch (error) {
    return buildErrorResponse(exeContext, incrementalContext, error);
  }
}

/**
 * Also implements the "Executing requests" section of the GraphQL specification.
 * However, it guarantees to complete synchronously (or throw an error) assuming
 * that all field resolvers are also synchronous.
 */
export function executeSync(args: ExecutionArgs): ExecutionResult {
  const result = experimentalExecuteIncrementally(args);

  // Assert that the execution was synchronous.
  if (isPromise(result) || 'initialResult' in result) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}

function newIncrementalContext(
  deferUsageSet: DeferUsageSet | undefined,
): IncrementalContext {
  return {
    errors: [],
    nullPaths: new Set(),
    incrementalDataRecords: [],
    deferUsageSet,
  };
}

/**
 * Given a completed execution context and data, build the `{ errors, data }`
 * response defined by the "Response" section of the GraphQL specification,
 * or the initial and subsequent results when data remains to be delivered.
 */
function buildDataResponse(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  data: ObjMap<unknown>,
): ExecutionResult | ExperimentalIncrementalExecutionResults {
  const { errors, nullPaths, incrementalDataRecords } = incrementalContext;
  const filteredIncrementalDataRecords = filterIncrementalDataRecords(
    exeContext,
    nullPaths,
    incrementalDataRecords,
  );

  if (filteredIncrementalDataRecords.length === 0) {
    return buildResponse(data, errors);
  }

  return buildIncrementalResponse(
    exeContext,
    data,
    sortErrors(errors),
    filteredIncrementalDataRecords,
  );
}

function buildErrorResponse(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  error: unknown,
): ExecutionResult {
  const { errors, incrementalDataRecords } = incrementalContext;
  discardIncrementalDataRecords(exeContext, incrementalDataRecords);
  return buildResponse(null, [...errors, toGraphQLError(error)]);
}

function buildResponse(
  data: ObjMap<unknown> | null,
  errors: ReadonlyArray<GraphQLError>,
): ExecutionResult {
  return errors.length === 0 ? { data } : { errors: sortErrors(errors), data };
}

function toGraphQLError(error: unknown): GraphQLError {
  return error instanceof GraphQLError ? error : locatedError(error, undefined);
}

function withError(
  errors: ReadonlyArray<GraphQLError>,
  error: unknown,
): ReadonlyArray<GraphQLError> {
  return sortErrors([...errors, toGraphQLError(error)]);
}

/**
 * Drops the records created beneath a field that was later nulled.
 */
function filterIncrementalDataRecords(
  exeContext: ExecutionContext,
  nullPaths: ReadonlySet<Path>,
  incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>,
): ReadonlyArray<IncrementalDataRecord> {
  if (nullPaths.size === 0) {
    return incrementalDataRecords;
  }

  const filtered: Array<IncrementalDataRecord> = [];
  for (const incrementalDataRecord of incrementalDataRecords) {
    const path = isDeferredGroupedFieldSetRecord(incrementalDataRecord)
      ? incrementalDataRecord.path
      : incrementalDataRecord.streamRecord.path;
    if (isUnderNullPath(path, nullPaths)) {
      discardIncrementalDataRecords(exeContext, [incrementalDataRecord]);
    } else {
      filtered.push(incrementalDataRecord);
    }
  }
  return filtered;
}

function isUnderNullPath(
  path: Path | undefined,
  nullPaths: ReadonlySet<Path>,
): boolean {
  let current = path;
  while (current !== undefined) {
    if (nullPaths.has(current)) {
      return true;
    }
    current = current.prev;
  }
  return false;
}

function discardIncrementalDataRecords(
  exeContext: ExecutionContext,
  incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>,
): void {
  const { logger, cancellableStreams } = exeContext;
  for (const incrementalDataRecord of incrementalDataRecords) {
    if (isDeferredGroupedFieldSetRecord(incrementalDataRecord)) {
      logger.debug(
        { path: pathToArray(incrementalDataRecord.path) },
        'discarded deferred grouped field set',
      );
      continue;
    }

    const streamRecord = incrementalDataRecord.streamRecord;
    logger.debug(
      { path: pathToArray(streamRecord.path) },
      'discarded stream',
    );
    if (
      isCancellableStreamRecord(streamRecord) &&
      cancellableStreams.delete(streamRecord)
    ) {
      returnStreamIteratorIgnoringError(exeContext, streamRecord);
    }
  }
}

function returnStreamIteratorIgnoringError(
  exeContext: ExecutionContext,
  streamRecord: CancellableStreamRecord,
): void {
  // eslint-disable-next-line @typescript-eslint/no-floating-promises
  streamRecord.earlyReturn().catch((error: unknown) => {
    exeContext.logger.warn(
      { err: error, path: pathToArray(streamRecord.path) },
      'early return of stream failed',
    );
  });
}

/**
 * Constructs a ExecutionContext object from the arguments passed to
 * execute, which we will pass throughout the other execution methods.
 *
 * Throws a GraphQLError if a valid execution context cannot be created.
 *
 * @internal
 */
export function buildExecutionContext(
  args: ExecutionArgs,
): ReadonlyArray<GraphQLError> | ExecutionContext {
  const {
    schema,
    document,
    rootValue,
    contextValue,
    variableValues: rawVariableValues,
    operationName,
    fieldResolver,
    typeResolver,
    subscribeFieldResolver,
    middleware,
    maxVariableErrors,
    logger,
  } = args;

  devAssert(document, 'Must provide document.');

  // If the schema used for execution is invalid, throw an error.
  assertValidSchema(schema);

  devAssert(
    rawVariableValues == null || isObjectLike(rawVariableValues),
    'Variables must be provided as an Object where each property is a variable value. Perhaps look to see if an unparsed JSON string was provided.',
  );

  let operation: OperationDefinitionNode | undefined;
  const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
  for (const definition of document.definitions) {
    switch (definition.kind) {
      case Kind.OPERATION_DEFINITION:
        if (operationName == null) {
          if (operation !== undefined) {
            return [
              new GraphQLError(
                'Must provide operation name if query contains multiple operations.',
              ),
            ];
          }
          operation = definition;
        } else if (definition.name?.value === operationName) {
          operation = definition;
        }
        break;
      case Kind.FRAGMENT_DEFINITION:
        fragments[definition.name.value] = definition;
        break;
      default:
      // ignore non-executable definitions
    }
  }

  if (!operation) {
    if (operationName != null) {
      return [new GraphQLError(`Unknown operation named "${operationName}".`)];
    }
    return [new GraphQLError('Must provide an operation.')];
  }

  const operationLogger = (logger ?? defaultLogger).child({
    operation: operation.name?.value,
  });

  /* c8 ignore next */
  const variableDefinitions = operation.variableDefinitions ?? [];

  const coercedVariableValues = getVariableValues(
    schema,
    variableDefinitions,
    rawVariableValues ?? {},
    { maxErrors: maxVariableErrors ?? DEFAULT_MAX_VARIABLE_ERRORS },
  );

  if (coercedVariableValues.errors) {
    operationLogger.debug(
      { errorCount: coercedVariableValues.errors.length },
      'variable coercion failed',
    );
    return coercedVariableValues.errors;
  }

  const variableValues = coercedVariableValues.coerced;
  const validOperation = operation;

  return {
    schema,
    fragments,
    rootValue,
    contextValue,
    operation,
    variableValues,
    fieldResolver: fieldResolver ?? defaultFieldResolver,
    typeResolver: typeResolver ?? defaultTypeResolver,
    subscribeFieldResolver: subscribeFieldResolver ?? defaultFieldResolver,
    middlewareManager:
      middleware instanceof MiddlewareManager
        ? middleware
        : new MiddlewareManager(...(middleware ?? [])),
    collectSubfields: memoize2(
      (returnType: GraphQLObjectType, fieldGroup: FieldGroup) =>
        _collectSubfields(
          schema,
          fragments,
          variableValues,
          validOperation,
          returnType,
          fieldGroup,
        ),
    ),
    streamUsages: new WeakMap(),
    cancellableStreams: new Set(),
    logger: operationLogger,
  };
}

/**
 * Derives the execution context for one subscription event, with the event
 * payload as the root value and no stream state carried over between events.
 *
 * @internal
 */
export function buildPerEventExecutionContext(
  exeContext: ExecutionContext,
  payload: unknown,
): ExecutionContext {
  return {
    ...exeContext,
    rootValue: payload,
    cancellableStreams: new Set(),
  };
}

/**
 * Implements the "Executing operations" section of the GraphQL specification.
 */
function executeOperation(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
): PromiseOrValue<ObjMap<unknown>> {
  const { operation, schema, fragments, variableValues, rootValue } =
    exeContext;
  const rootType = schema.getRootType(operation.operation);
  if (rootType == null) {
    throw new GraphQLError(
      `Schema is not configured to execute ${operation.operation} operation.`,
      { nodes: operation },
    );
  }

  const { fields, newDeferUsages } = collectFields(
    schema,
    fragments,
    variableValues,
    rootType,
    operation,
  );
  const { groupedFieldSet, newGroupedFieldSets } = buildFieldPlan(fields);
  const path = undefined;

  const deferMap = addNewDeferredFragments(newDeferUsages, new Map(), path);

  const result =
    operation.operation === OperationTypeNode.MUTATION
      ? executeFieldsSerially(
          exeContext,
          rootType,
          rootValue,
          path,
          groupedFieldSet,
          incrementalContext,
          deferMap,
        )
      : executeFields(
          exeContext,
          rootType,
          rootValue,
          path,
          groupedFieldSet,
          incrementalContext,
          deferMap,
        );

  if (newGroupedFieldSets.size > 0) {
    incrementalContext.incrementalDataRecords.push(
      ...executeDeferredGroupedFieldSets(
        exeContext,
        rootType,
        rootValue,
        path,
        newGroupedFieldSets,
        deferMap,
      ),
    );
  }

  return result;
}

/**
 * Implements the "Executing selection sets" section of the GraphQL specification
 * for fields that must be executed serially.
 */
function executeFieldsSerially(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  groupedFieldSet: GroupedFieldSet,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ObjMap<unknown>> {
  const initialResults: ObjMap<unknown> = Object.create(null);
  return promiseReduce(
    groupedFieldSet,
    (results, [responseName, fieldGroup]) => {
      const fieldPath = addPath(path, responseName, parentType.name);
      const result = executeField(
        exeContext,
        parentType,
        sourceValue,
        fieldGroup,
        fieldPath,
        incrementalContext,
        deferMap,
      );
      if (result === undefined) {
        return results;
      }
      if (isPromise(result)) {
        return result.then((resolvedResult) => {
          results[responseName] = resolvedResult;
          return results;
        });
      }
      results[responseName] = result;
      return results;
    },
    initialResults,
  );
}

/**
 * Implements the "Executing selection sets" section of the GraphQL specification
 * for fields that may be executed in parallel.
 */
function executeFields(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  groupedFieldSet: GroupedFieldSet,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ObjMap<unknown>> {
  const results: ObjMap<unknown> = Object.create(null);
  let containsPromise = false;

  try {
    for (const [responseName, fieldGroup] of groupedFieldSet) {
      const fieldPath = addPath(path, responseName, parentType.name);
      const result = executeField(
        exeContext,
        parentType,
        sourceValue,
        fieldGroup,
        fieldPath,
        incrementalContext,
        deferMap,
      );

      if (result !== undefined) {
        results[responseName] = result;
        if (isPromise(result)) {
          containsPromise = true;
        }
      }
    }
  } catch (error) {
    if (containsPromise) {
      // Ensure that any promises returned by other fields are handled, as they may also reject.
      return promiseForObject(results).finally(() => {
        throw error;
      });
    }
    throw error;
  }

  // If there are no promises, we can just return the object
  if (!containsPromise) {
    return results;
  }

  // Otherwise, results is a map from field name to the result of resolving that
  // field, which is possibly a promise. Return a promise that will return this
  // same map, but with any promises replaced with the values they resolved to.
  return promiseForObject(results);
}

function toNodes(fieldGroup: FieldGroup): ReadonlyArray<FieldNode> {
  return fieldGroup.map((fieldDetails) => fieldDetails.node);
}

/**
 * Implements the "Executing fields" section of the GraphQL specification
 * In particular, this function figures out the value that the field returns by
 * calling its resolve function, then calls completeValue to complete promises,
 * serialize scalars, or execute the sub-selection-set for objects.
 */
function executeField(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  source: unknown,
  fieldGroup: FieldGroup,
  path: Path,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<unknown> {
  const fieldDef = getFieldDef(
    exeContext.schema,
    parentType,
    fieldGroup[0].node,
  );
  if (!fieldDef) {
    return;
  }

  const returnType = fieldDef.type;
  const resolveFn = exeContext.middlewareManager.getFieldResolver(
    fieldDef.resolve ?? exeContext.fieldResolver,
  );

  const info = buildResolveInfo(
    exeContext,
    fieldDef,
    toNodes(fieldGroup),
    parentType,
    path,
  );

  // Get the resolve function, regardless of if its result is normal or abrupt (error).
  try {
    // Build a JS object of arguments from the field.arguments AST, using the
    // variables scope to fulfill any variable references.
    const args = getArgumentValues(
      fieldDef,
      fieldGroup[0].node,
      exeContext.variableValues,
    );

    // The resolve function's optional third argument is a context value that
    // is provided to every resolve function within an execution. It is commonly
    // used to represent an authenticated user, or request-specific caches.
    const contextValue = exeContext.contextValue;

    const result = resolveFn(source, args, contextValue, info);

    if (isPromise(result)) {
      return completePromisedValue(
        exeContext,
        returnType,
        fieldGroup,
        info,
        path,
        result,
        incrementalContext,
        deferMap,
      );
    }

    const completed = completeValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      result,
      incrementalContext,
      deferMap,
    );

    if (isPromise(completed)) {
      // Note: we don't rely on a `catch` method, but we do expect "thenable"
      // to take a second callback for the error case.
      return completed.then(undefined, (rawError: unknown) =>
        handleFieldError(
          rawError,
          returnType,
          fieldGroup,
          path,
          incrementalContext,
        ),
      );
    }
    return completed;
  } catch (rawError) {
    return handleFieldError(
      rawError,
      returnType,
      fieldGroup,
      path,
      incrementalContext,
    );
  }
}

/**
 * This method looks up the field on the given type definition.
 * It has special casing for the three introspection fields,
 * __schema, __type and __typename. __typename is special because
 * it can always be queried as a field, even in situations where no
 * other fields are allowed, like on a Union. __schema and __type
 * could get automatically added to the query type, but that would
 * require mutating type definitions, which would cause issues.
 *
 * @internal
 */
export function getFieldDef(
  schema: GraphQLSchema,
  parentType: GraphQLObjectType,
  fieldNode: FieldNode,
): Maybe<GraphQLField<unknown, unknown>> {
  const fieldName = fieldNode.name.value;

  if (
    fieldName === SchemaMetaFieldDef.name &&
    schema.getQueryType() === parentType
  ) {
    return SchemaMetaFieldDef;
  } else if (
    fieldName === TypeMetaFieldDef.name &&
    schema.getQueryType() === parentType
  ) {
    return TypeMetaFieldDef;
  } else if (fieldName === TypeNameMetaFieldDef.name) {
    return TypeNameMetaFieldDef;
  }
  return parentType.getFields()[fieldName];
}

/**
 * @internal
 */
export function buildResolveInfo(
  exeContext: ExecutionContext,
  fieldDef: GraphQLField<unknown, unknown>,
  fieldNodes: ReadonlyArray<FieldNode>,
  parentType: GraphQLObjectType,
  path: Path,
): GraphQLResolveInfo {
  // The resolve function's optional fourth argument is a collection of
  // information about the current execution state.
  return {
    fieldName: fieldDef.name,
    fieldNodes,
    returnType: fieldDef.type,
    parentType,
    path,
    schema: exeContext.schema,
    fragments: exeContext.fragments,
    rootValue: exeContext.rootValue,
    operation: exeContext.operation,
    variableValues: exeContext.variableValues,
  };
}

function handleFieldError(
  rawError: unknown,
  returnType: GraphQLOutputType,
  fieldGroup: FieldGroup,
  path: Path,
  incrementalContext: IncrementalContext,
): null {
  const error = locatedError(rawError, toNodes(fieldGroup), pathToArray(path));

  // If the field type is non-nullable, then it is resolved without any
  // protection from errors, however it still properly locates the error.
  if (isNonNullType(returnType)) {
    throw error;
  }

  // Otherwise, error protection is applied, logging the error and resolving
  // a null value for this field if one is encountered.
  incrementalContext.errors.push(error);
  incrementalContext.nullPaths.add(path);
  return null;
}

/**
 * Implements the instructions for completeValue as defined in the
 * "Value Completion" section of the GraphQL specification.
 *
 * If the field type is Non-Null, then this recursively completes the value
 * for the inner type. It throws a field error if that completion returns null,
 * as per the "Nullability" section of the GraphQL specification.
 *
 * If the field type is a List, then this recursively completes the value
 * for the inner type on each item in the list.
 *
 * If the field type is a Scalar or Enum, ensures the completed value is a legal
 * value of the type by calling the `serialize` method of GraphQL type
 * definition.
 *
 * If the field is an abstract type, determine the runtime type of the value
 * and then complete based on that type
 *
 * Otherwise, the field type expects a sub-selection set, and will complete the
 * value by executing all sub-selections.
 */
function completeValue(
  exeContext: ExecutionContext,
  returnType: GraphQLOutputType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<unknown> {
  // If result is an Error, throw a located error.
  if (result instanceof Error) {
    throw result;
  }

  // If field type is NonNull, complete for inner type, and throw field error
  // if result is null.
  if (isNonNullType(returnType)) {
    const completed = completeValue(
      exeContext,
      returnType.ofType,
      fieldGroup,
      info,
      path,
      result,
      incrementalContext,
      deferMap,
    );
    if (completed === null) {
      throw new Error(
        `Cannot return null for non-nullable field ${info.parentType.name}.${info.fieldName}.`,
      );
    }
    return completed;
  }

  // If result value is null or undefined then return null.
  if (result == null) {
    return null;
  }

  // If field type is List, complete each item in the list with the inner type
  if (isListType(returnType)) {
    return completeListValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      result,
      incrementalContext,
      deferMap,
    );
  }

  // If field type is a leaf type, Scalar or Enum, serialize to a valid value,
  // returning null if serialization is not possible.
  if (isLeafType(returnType)) {
    return completeLeafValue(returnType, result);
  }

  // If field type is an abstract type, Interface or Union, determine the
  // runtime Object type and complete for that type.
  if (isAbstractType(returnType)) {
    return completeAbstractValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      result,
      incrementalContext,
      deferMap,
    );
  }

  // If field type is Object, execute and complete all sub-selections.
  if (isObjectType(returnType)) {
    return completeObjectValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      result,
      incrementalContext,
      deferMap,
    );
  }
  /* c8 ignore next 6 */
  // Not reachable, all possible output types have been considered.
  invariant(
    false,
    'Cannot complete value of unexpected output type: ' + inspect(returnType),
  );
}

async function completePromisedValue(
  exeContext: ExecutionContext,
  returnType: GraphQLOutputType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: Promise<unknown>,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): Promise<unknown> {
  try {
    const resolved = await result;
    let completed = completeValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      resolved,
      incrementalContext,
      deferMap,
    );
    if (isPromise(completed)) {
      completed = await completed;
    }
    return completed;
  } catch (rawError) {
    return handleFieldError(
      rawError,
      returnType,
      fieldGroup,
      path,
      incrementalContext,
    );
  }
}

/**
 * Returns an object containing info for streaming if a field should be
 * streamed based on the experimental flag, stream directive present and
 * not disabled by the "if" argument.
 */
function getStreamUsage(
  exeContext: ExecutionContext,
  fieldGroup: FieldGroup,
  path: Path,
): StreamUsage | undefined {
  // do not stream inner lists of multi-dimensional lists
  if (typeof path.key === 'number') {
    return;
  }

  const { streamUsages } = exeContext;
  if (streamUsages.has(fieldGroup)) {
    return streamUsages.get(fieldGroup);
  }

  // validation only allows equivalent streams on multiple fields, so it is
  // safe to only check the first fieldNode for the stream directive
  const stream = getDirectiveValues(
    GraphQLStreamDirective,
    fieldGroup[0].node,
    exeContext.variableValues,
  );

  let streamUsage: StreamUsage | undefined;
  if (stream && stream.if !== false) {
    invariant(
      typeof stream.initialCount === 'number',
      'initialCount must be a number',
    );

    invariant(
      stream.initialCount >= 0,
      'initialCount must be a positive integer',
    );

    invariant(
      exeContext.operation.operation !== OperationTypeNode.SUBSCRIPTION,
      '`@stream` directive not supported on subscription operations. Disable `@stream` by setting the `if` argument to `false`.',
    );

    streamUsage = {
      initialCount: stream.initialCount,
      label: typeof stream.label === 'string' ? stream.label : undefined,
      // streamed items are delivered on their own, outside of any deferred fragment
      fieldGroup: fieldGroup.map((fieldDetails) => ({
        node: fieldDetails.node,
        deferUsage: undefined,
      })),
    };
  }

  streamUsages.set(fieldGroup, streamUsage);
  return streamUsage;
}

/**
 * Complete a async iterator value by completing the result and calling
 * recursively until all the results are completed.
 */
async function completeAsyncIteratorValue(
  exeContext: ExecutionContext,
  itemType: GraphQLOutputType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  asyncIterator: AsyncIterator<unknown>,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): Promise<ReadonlyArray<unknown>> {
  const streamUsage = getStreamUsage(exeContext, fieldGroup, path);
  let containsPromise = false;
  const completedResults: Array<unknown> = [];
  let index = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    if (streamUsage && index >= streamUsage.initialCount) {
      const streamRecord = buildAsyncStreamRecord(
        exeContext,
        streamUsage.label,
        path,
        asyncIterator,
      );
      incrementalContext.incrementalDataRecords.push(
        buildAsyncStreamItemsRecord(
          exeContext,
          streamRecord,
          index,
          asyncIterator,
          streamUsage.fieldGroup,
          info,
          itemType,
        ),
      );
      break;
    }

    const itemPath = addPath(path, index, undefined);
    let iteration: IteratorResult<unknown>;
    try {
      // eslint-disable-next-line no-await-in-loop
      iteration = await asyncIterator.next();
      if (iteration.done) {
        break;
      }
    } catch (rawError) {
      throw locatedError(rawError, toNodes(fieldGroup), pathToArray(path));
    }

    if (
      completeListItemValue(
        iteration.value,
        completedResults,
        exeContext,
        itemType,
        fieldGroup,
        info,
        itemPath,
        incrementalContext,
        deferMap,
      )
    ) {
      containsPromise = true;
    }
    index += 1;
  }
  return containsPromise ? Promise.all(completedResults) : completedResults;
}

/**
 * Complete a list value by completing each item in the list with the
 * inner type
 */
function completeListValue(
  exeContext: ExecutionContext,
  returnType: GraphQLList<GraphQLOutputType>,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ReadonlyArray<unknown>> {
  const itemType = returnType.ofType;

  if (isAsyncIterable(result)) {
    const asyncIterator = result[Symbol.asyncIterator]();

    return completeAsyncIteratorValue(
      exeContext,
      itemType,
      fieldGroup,
      info,
      path,
      asyncIterator,
      incrementalContext,
      deferMap,
    );
  }

  if (!isIterableObject(result)) {
    throw new GraphQLError(
      `Expected Iterable, but did not find one for field "${info.parentType.name}.${info.fieldName}".`,
    );
  }

  const streamUsage = getStreamUsage(exeContext, fieldGroup, path);

  // This is specified as a simple map, however we're optimizing the path
  // where the list contains no Promises by avoiding creating another Promise.
  let containsPromise = false;
  const completedResults: Array<unknown> = [];
  let index = 0;
  const iterator = result[Symbol.iterator]();
  let iteration = iterator.next();
  while (!iteration.done) {
    if (streamUsage && index >= streamUsage.initialCount) {
      const streamRecord: StreamRecord = { label: streamUsage.label, path };
      incrementalContext.incrementalDataRecords.push(
        buildSyncStreamItemsRecord(
          exeContext,
          streamRecord,
          index,
          iteration.value,
          iterator,
          streamUsage.fieldGroup,
          info,
          itemType,
        ),
      );
      break;
    }

    // No need to modify the info object containing the path,
    // since from here on it is not ever accessed by resolver functions.
    const itemPath = addPath(path, index, undefined);

    if (
      completeListItemValue(
        iteration.value,
        completedResults,
        exeContext,
        itemType,
        fieldGroup,
        info,
        itemPath,
        incrementalContext,
        deferMap,
      )
    ) {
      containsPromise = true;
    }

    index++;
    iteration = iterator.next();
  }

  return containsPromise ? Promise.all(completedResults) : completedResults;
}

/**
 * Complete a list item value by adding it to the completed results.
 *
 * Returns true if the value is a Promise.
 */
function completeListItemValue(
  item: unknown,
  completedResults: Array<unknown>,
  exeContext: ExecutionContext,
  itemType: GraphQLOutputType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemPath: Path,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): boolean {
  if (isPromise(item)) {
    completedResults.push(
      completePromisedValue(
        exeContext,
        itemType,
        fieldGroup,
        info,
        itemPath,
        item,
        incrementalContext,
        deferMap,
      ),
    );

    return true;
  }

  try {
    const completedItem = completeValue(
      exeContext,
      itemType,
      fieldGroup,
      info,
      itemPath,
      item,
      incrementalContext,
      deferMap,
    );

    if (isPromise(completedItem)) {
      // Note: we don't rely on a `catch` method, but we do expect "thenable"
      // to take a second callback for the error case.
      completedResults.push(
        completedItem.then(undefined, (rawError: unknown) =>
          handleFieldError(
            rawError,
            itemType,
            fieldGroup,
            itemPath,
            incrementalContext,
          ),
        ),
      );

      return true;
    }

    completedResults.push(completedItem);
  } catch (rawError) {
    completedResults.push(
      handleFieldError(
        rawError,
        itemType,
        fieldGroup,
        itemPath,
        incrementalContext,
      ),
    );
  }

  return false;
}

/**
 * Complete a Scalar or Enum by serializing to a valid value, returning
 * null if serialization is not possible.
 */
function completeLeafValue(
  returnType: GraphQLLeafType,
  result: unknown,
): unknown {
  const serializedResult = returnType.serialize(result);
  if (serializedResult == null) {
    throw new Error(
      `Expected \`${inspect(returnType)}.serialize(${inspect(result)})\` to ` +
        `return non-nullable value, returned: ${inspect(serializedResult)}`,
    );
  }
  return serializedResult;
}

/**
 * Complete a value of an abstract type by determining the runtime object type
 * of that value, then complete the value for that type.
 */
function completeAbstractValue(
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ObjMap<unknown>> {
  const resolveTypeFn = returnType.resolveType ?? exeContext.typeResolver;
  const contextValue = exeContext.contextValue;
  const runtimeType = resolveTypeFn(result, contextValue, info, returnType);

  if (isPromise(runtimeType)) {
    return runtimeType.then((resolvedRuntimeType) =>
      completeObjectValue(
        exeContext,
        ensureValidRuntimeType(
          resolvedRuntimeType,
          exeContext,
          returnType,
          fieldGroup,
          info,
          result,
        ),
        fieldGroup,
        info,
        path,
        result,
        incrementalContext,
        deferMap,
      ),
    );
  }

  return completeObjectValue(
    exeContext,
    ensureValidRuntimeType(
      runtimeType,
      exeContext,
      returnType,
      fieldGroup,
      info,
      result,
    ),
    fieldGroup,
    info,
    path,
    result,
    incrementalContext,
    deferMap,
  );
}

function ensureValidRuntimeType(
  runtimeTypeName: unknown,
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  result: unknown,
): GraphQLObjectType {
  if (runtimeTypeName == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}". Either the "${returnType.name}" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.`,
      { nodes: toNodes(fieldGroup) },
    );
  }

  // releases before 16.0.0 supported returning `GraphQLObjectType` from `resolveType`
  if (isObjectType(runtimeTypeName)) {
    throw new GraphQLError(
      'Support for returning GraphQLObjectType from resolveType was removed in graphql-js@16.0.0 please return type name instead.',
    );
  }

  if (typeof runtimeTypeName !== 'string') {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}" with ` +
        `value ${inspect(result)}, received "${inspect(runtimeTypeName)}".`,
    );
  }

  const runtimeType = exeContext.schema.getType(runtimeTypeName);
  if (runtimeType == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a type "${runtimeTypeName}" that does not exist inside the schema.`,
      { nodes: toNodes(fieldGroup) },
    );
  }

  if (!isObjectType(runtimeType)) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a non-object type "${runtimeTypeName}".`,
      { nodes: toNodes(fieldGroup) },
    );
  }

  if (!exeContext.schema.isSubType(returnType, runtimeType)) {
    throw new GraphQLError(
      `Runtime Object type "${runtimeType.name}" is not a possible type for "${returnType.name}".`,
      { nodes: toNodes(fieldGroup) },
    );
  }

  return runtimeType;
}

/**
 * Complete an Object value by executing all sub-selections.
 */
function completeObjectValue(
  exeContext: ExecutionContext,
  returnType: GraphQLObjectType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ObjMap<unknown>> {
  // If there is an isTypeOf predicate function, call it with the
  // current result. If isTypeOf returns false, then raise an error rather
  // than continuing execution.
  if (returnType.isTypeOf) {
    const isTypeOf = returnType.isTypeOf(result, exeContext.contextValue, info);

    if (isPromise(isTypeOf)) {
      return isTypeOf.then((resolvedIsTypeOf) => {
        if (!resolvedIsTypeOf) {
          throw invalidReturnTypeError(returnType, result, fieldGroup);
        }
        return collectAndExecuteSubfields(
          exeContext,
          returnType,
          fieldGroup,
          path,
          result,
          incrementalContext,
          deferMap,
        );
      });
    }

    if (!isTypeOf) {
      throw invalidReturnTypeError(returnType, result, fieldGroup);
    }
  }

  return collectAndExecuteSubfields(
    exeContext,
    returnType,
    fieldGroup,
    path,
    result,
    incrementalContext,
    deferMap,
  );
}

function invalidReturnTypeError(
  returnType: GraphQLObjectType,
  result: unknown,
  fieldGroup: FieldGroup,
): GraphQLError {
  return new GraphQLError(
    `Expected value of type "${returnType.name}" but got: ${inspect(result)}.`,
    { nodes: toNodes(fieldGroup) },
  );
}

function collectAndExecuteSubfields(
  exeContext: ExecutionContext,
  returnType: GraphQLObjectType,
  fieldGroup: FieldGroup,
  path: Path,
  result: unknown,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<ObjMap<unknown>> {
  // Collect sub-fields to execute to complete this value.
  const { fields, newDeferUsages } = exeContext.collectSubfields(
    returnType,
    fieldGroup,
  );
  const { groupedFieldSet, newGroupedFieldSets } = buildFieldPlan(
    fields,
    incrementalContext.deferUsageSet,
  );

  const newDeferMap = addNewDeferredFragments(newDeferUsages, deferMap, path);

  const subFields = executeFields(
    exeContext,
    returnType,
    result,
    path,
    groupedFieldSet,
    incrementalContext,
    newDeferMap,
  );

  if (newGroupedFieldSets.size > 0) {
    incrementalContext.incrementalDataRecords.push(
      ...executeDeferredGroupedFieldSets(
        exeContext,
        returnType,
        result,
        path,
        newGroupedFieldSets,
        newDeferMap,
      ),
    );
  }

  return subFields;
}

/**
 * Instantiates new DeferredFragmentRecords for the given path within an
 * incremental data record, returning an updated map of DeferUsage
 * objects to DeferredFragmentRecords.
 *
 * Note: As defer directives may be used with operations returning lists,
 *       a DeferUsage object may correspond to many DeferredFragmentRecords.
 */
function addNewDeferredFragments(
  newDeferUsages: ReadonlyArray<DeferUsage>,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
  path: Path | undefined,
): ReadonlyMap<DeferUsage, DeferredFragmentRecord> {
  if (newDeferUsages.length === 0) {
    return deferMap;
  }

  const newDeferMap = new Map(deferMap);

  for (const newDeferUsage of newDeferUsages) {
    const parentDeferUsage = newDeferUsage.parentDeferUsage;

    const parent =
      parentDeferUsage === undefined
        ? undefined
        : deferredFragmentRecordFromDeferUsage(parentDeferUsage, newDeferMap);

    const deferredFragmentRecord = new DeferredFragmentRecord({
      path,
      label: newDeferUsage.label,
      parent,
    });

    newDeferMap.set(newDeferUsage, deferredFragmentRecord);
  }

  return newDeferMap;
}

function deferredFragmentRecordFromDeferUsage(
  deferUsage: DeferUsage,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): DeferredFragmentRecord {
  const deferredFragmentRecord = deferMap.get(deferUsage);
  invariant(deferredFragmentRecord !== undefined);
  return deferredFragmentRecord;
}

function executeDeferredGroupedFieldSets(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  newGroupedFieldSets: ReadonlyMap<DeferUsageSet, NewGroupedFieldSetDetails>,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): ReadonlyArray<DeferredGroupedFieldSetRecord> {
  const newDeferredGroupedFieldSetRecords: Array<DeferredGroupedFieldSetRecord> =
    [];

  for (const [
    deferUsageSet,
    { groupedFieldSet, shouldInitiateDefer },
  ] of newGroupedFieldSets) {
    const deferredFragmentRecords = Array.from(deferUsageSet, (deferUsage) =>
      deferredFragmentRecordFromDeferUsage(deferUsage, deferMap),
    );

    const executor = () =>
      executeDeferredGroupedFieldSet(
        exeContext,
        parentType,
        sourceValue,
        path,
        groupedFieldSet,
        deferredFragmentRecords,
        newIncrementalContext(deferUsageSet),
        deferMap,
      );

    newDeferredGroupedFieldSetRecords.push({
      deferredFragmentRecords,
      path,
      result: shouldInitiateDefer
        ? Promise.resolve().then(executor)
        : executor(),
    });
  }

  return newDeferredGroupedFieldSetRecords;
}

function executeDeferredGroupedFieldSet(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  groupedFieldSet: GroupedFieldSet,
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>,
  incrementalContext: IncrementalContext,
  deferMap: ReadonlyMap<DeferUsage, DeferredFragmentRecord>,
): PromiseOrValue<DeferredGroupedFieldSetResult> {
  let result: PromiseOrValue<ObjMap<unknown>>;
  try {
    result = executeFields(
      exeContext,
      parentType,
      sourceValue,
      path,
      groupedFieldSet,
      incrementalContext,
      deferMap,
    );
  } catch (error) {
    return buildNonReconcilableDeferredGroupedFieldSetResult(
      exeContext,
      incrementalContext,
      deferredFragmentRecords,
      path,
      error,
    );
  }

  if (isPromise(result)) {
    return result.then(
      (resolved) =>
        buildDeferredGroupedFieldSetResult(
          exeContext,
          incrementalContext,
          deferredFragmentRecords,
          path,
          resolved,
        ),
      (error: unknown) =>
        buildNonReconcilableDeferredGroupedFieldSetResult(
          exeContext,
          incrementalContext,
          deferredFragmentRecords,
          path,
          error,
        ),
    );
  }

  return buildDeferredGroupedFieldSetResult(
    exeContext,
    incrementalContext,
    deferredFragmentRecords,
    path,
    result,
  );
}

function buildDeferredGroupedFieldSetResult(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>,
  path: Path | undefined,
  data: ObjMap<unknown>,
): DeferredGroupedFieldSetResult {
  const { errors, nullPaths, incrementalDataRecords } = incrementalContext;
  return {
    deferredFragmentRecords,
    path: pathToArray(path),
    result:
      errors.length === 0 ? { data } : { data, errors: sortErrors(errors) },
    incrementalDataRecords: filterIncrementalDataRecords(
      exeContext,
      nullPaths,
      incrementalDataRecords,
    ),
  };
}

function buildNonReconcilableDeferredGroupedFieldSetResult(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>,
  path: Path | undefined,
  error: unknown,
): DeferredGroupedFieldSetResult {
  discardIncrementalDataRecords(
    exeContext,
    incrementalContext.incrementalDataRecords,
  );
  return {
    deferredFragmentRecords,
    path: pathToArray(path),
    errors: withError(incrementalContext.errors, error),
  };
}

function buildSyncStreamItemsRecord(
  exeContext: ExecutionContext,
  streamRecord: StreamRecord,
  initialIndex: number,
  initialItem: unknown,
  iterator: Iterator<unknown>,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemType: GraphQLOutputType,
): StreamItemsRecord {
  const streamItemsResults: Array<PromiseOrValue<StreamItemsResult>> = [];

  let index = initialIndex;
  let item = initialItem;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const itemPath = addPath(streamRecord.path, index, undefined);
    streamItemsResults.push(
      completeStreamItem(
        exeContext,
        streamRecord,
        itemPath,
        item,
        newIncrementalContext(undefined),
        fieldGroup,
        info,
        itemType,
      ),
    );

    const iteration = iterator.next();
    if (iteration.done) {
      break;
    }
    item = iteration.value;
    index++;
  }

  // each record carries the record of the following item, the last one
  // carries the record terminating the stream
  let streamItemsRecord: StreamItemsRecord = {
    streamRecord,
    result: { streamRecord },
  };
  for (let i = streamItemsResults.length - 1; i >= 0; i--) {
    const nextStreamItemsRecord = streamItemsRecord;
    const streamItemsResult = streamItemsResults[i];
    streamItemsRecord = {
      streamRecord,
      result: isPromise(streamItemsResult)
        ? streamItemsResult.then((resolved) =>
            withNextStreamItemsRecord(resolved, nextStreamItemsRecord),
          )
        : withNextStreamItemsRecord(streamItemsResult, nextStreamItemsRecord),
    };
  }
  return streamItemsRecord;
}

function withNextStreamItemsRecord(
  streamItemsResult: StreamItemsResult,
  nextStreamItemsRecord: StreamItemsRecord,
): StreamItemsResult {
  if (!isReconcilableStreamItemsResult(streamItemsResult)) {
    return streamItemsResult;
  }
  return {
    ...streamItemsResult,
    incrementalDataRecords: [
      ...streamItemsResult.incrementalDataRecords,
      nextStreamItemsRecord,
    ],
  };
}

function buildAsyncStreamRecord(
  exeContext: ExecutionContext,
  label: string | undefined,
  path: Path,
  asyncIterator: AsyncIterator<unknown>,
): StreamRecord {
  const returnFn = asyncIterator.return;
  if (returnFn === undefined) {
    return { label, path };
  }

  const streamRecord: CancellableStreamRecord = {
    label,
    path,
    earlyReturn: () => returnFn.call(asyncIterator),
  };
  exeContext.cancellableStreams.add(streamRecord);
  return streamRecord;
}

function buildAsyncStreamItemsRecord(
  exeContext: ExecutionContext,
  streamRecord: StreamRecord,
  index: number,
  asyncIterator: AsyncIterator<unknown>,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemType: GraphQLOutputType,
): StreamItemsRecord {
  return {
    streamRecord,
    result: getNextAsyncStreamItemsResult(
      exeContext,
      streamRecord,
      index,
      asyncIterator,
      fieldGroup,
      info,
      itemType,
    ),
  };
}

async function getNextAsyncStreamItemsResult(
  exeContext: ExecutionContext,
  streamRecord: StreamRecord,
  index: number,
  asyncIterator: AsyncIterator<unknown>,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemType: GraphQLOutputType,
): Promise<StreamItemsResult> {
  let iteration: IteratorResult<unknown>;
  try {
    iteration = await asyncIterator.next();
  } catch (error) {
    return {
      streamRecord,
      errors: [
        locatedError(
          error,
          toNodes(fieldGroup),
          pathToArray(streamRecord.path),
        ),
      ],
    };
  }

  if (iteration.done) {
    return { streamRecord };
  }

  const itemPath = addPath(streamRecord.path, index, undefined);
  const streamItemsResult = await completeStreamItem(
    exeContext,
    streamRecord,
    itemPath,
    iteration.value,
    newIncrementalContext(undefined),
    fieldGroup,
    info,
    itemType,
  );

  return withNextStreamItemsRecord(
    streamItemsResult,
    buildAsyncStreamItemsRecord(
      exeContext,
      streamRecord,
      index + 1,
      asyncIterator,
      fieldGroup,
      info,
      itemType,
    ),
  );
}

function completeStreamItem(
  exeContext: ExecutionContext,
  streamRecord: StreamRecord,
  itemPath: Path,
  item: unknown,
  incrementalContext: IncrementalContext,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemType: GraphQLOutputType,
): PromiseOrValue<StreamItemsResult> {
  const deferMap = new Map<DeferUsage, DeferredFragmentRecord>();

  if (isPromise(item)) {
    return completePromisedValue(
      exeContext,
      itemType,
      fieldGroup,
      info,
      itemPath,
      item,
      incrementalContext,
      deferMap,
    ).then(
      (resolvedItem) =>
        buildStreamItemsResult(
          exeContext,
          incrementalContext,
          streamRecord,
          resolvedItem,
        ),
      (error: unknown) =>
        buildNonReconcilableStreamItemsResult(
          exeContext,
          incrementalContext,
          streamRecord,
          error,
        ),
    );
  }

  let result: PromiseOrValue<unknown>;
  try {
    try {
      result = completeValue(
        exeContext,
        itemType,
        fieldGroup,
        info,
        itemPath,
        item,
        incrementalContext,
        deferMap,
      );
    } catch (rawError) {
      result = handleFieldError(
        rawError,
        itemType,
        fieldGroup,
        itemPath,
        incrementalContext,
      );
    }
  } catch (error) {
    return buildNonReconcilableStreamItemsResult(
      exeContext,
      incrementalContext,
      streamRecord,
      error,
    );
  }

  if (isPromise(result)) {
    return result
      .then(undefined, (rawError: unknown) =>
        handleFieldError(
          rawError,
          itemType,
          fieldGroup,
          itemPath,
          incrementalContext,
        ),
      )
      .then(
        (resolvedItem) =>
          buildStreamItemsResult(
            exeContext,
            incrementalContext,
            streamRecord,
            resolvedItem,
          ),
        (error: unknown) =>
          buildNonReconcilableStreamItemsResult(
            exeContext,
            incrementalContext,
            streamRecord,
            error,
          ),
      );
  }

  return buildStreamItemsResult(
    exeContext,
    incrementalContext,
    streamRecord,
    result,
  );
}

function buildStreamItemsResult(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  streamRecord: StreamRecord,
  item: unknown,
): StreamItemsResult {
  const { errors, nullPaths, incrementalDataRecords } = incrementalContext;
  return {
    streamRecord,
    result:
      errors.length === 0
        ? { items: [item] }
        : { items: [item], errors: sortErrors(errors) },
    incrementalDataRecords: filterIncrementalDataRecords(
      exeContext,
      nullPaths,
      incrementalDataRecords,
    ),
  };
}

function buildNonReconcilableStreamItemsResult(
  exeContext: ExecutionContext,
  incrementalContext: IncrementalContext,
  streamRecord: StreamRecord,
  error: unknown,
): StreamItemsResult {
  discardIncrementalDataRecords(
    exeContext,
    incrementalContext.incrementalDataRecords,
  );
  return {
    streamRecord,
    errors: withError(incrementalContext.errors, error),
  };
}

/**
 * If a resolveType function is not given, then a default resolve behavior is
 * used which attempts two strategies:
 *
 * First, See if the provided value has a `__typename` field defined, if so, use
 * that value as name of the resolved type.
 *
 * Otherwise, test each possible type for the abstract type by calling
 * isTypeOf for the object being coerced, returning the first type that matches.
 */
export const defaultTypeResolver: GraphQLTypeResolver<unknown, unknown> =
  function (value, contextValue, info, abstractType) {
    // First, look for `__typename`.
    if (isObjectLike(value) && typeof value.__typename === 'string') {
      return value.__typename;
    }

    // Otherwise, test each possible type.
    const possibleTypes = info.schema.getPossibleTypes(abstractType);
    const promisedIsTypeOfResults: Array<Promise<boolean>> = [];

    for (let i = 0; i < possibleTypes.length; i++) {
      const type = possibleTypes[i];

      if (type.isTypeOf) {
        const isTypeOfResult = type.isTypeOf(value, contextValue, info);

        if (isPromise(isTypeOfResult)) {
          promisedIsTypeOfResults[i] = isTypeOfResult;
        } else if (isTypeOfResult) {
          return type.name;
        }
      }
    }

    if (promisedIsTypeOfResults.length) {
      return Promise.all(promisedIsTypeOfResults).then((isTypeOfResults) => {
        for (let i = 0; i < isTypeOfResults.length; i++) {
          if (isTypeOfResults[i]) {
            return possibleTypes[i].name;
          }
        }
        return undefined;
      });
    }
    return undefined;
  };

/**
 * If a resolve function is not given, then a default resolve behavior is used
 * which takes the property of the source object of the same name as the field
 * and returns it as the result, or if it's a function, returns the result
 * of calling that function while passing along args and context value.
 */
export const defaultFieldResolver: GraphQLFieldResolver<unknown, unknown> =
  function (source, args, contextValue, info) {
    // ensure source is a value for which property access is acceptable.
    if (isObjectLike(source) || typeof source === 'function') {
      const property: unknown = Reflect.get(source, info.fieldName);
      if (typeof property === 'function') {
        const result: unknown = property.call(source, args, contextValue, info);
        return result;
      }
      return property;
    }
    return undefined;
  };

/**
 * Implements the "Subscribe" algorithm described in the GraphQL specification.
 *
 * Returns a Promise which resolves to either an AsyncIterator (if successful)
 * or an ExecutionResult (error). The promise will be rejected if the schema or
 * other arguments to this function are invalid, or if the resolved event stream
 * is not an async iterable.
 *
 * If the client-provided arguments to this function do not result in a
 * compliant subscription, a GraphQL Response (ExecutionResult) with descriptive
 * errors and no data will be returned.
 *
 * If the source stream could not be created due to faulty subscription resolver
 * logic or underlying systems, the promise will resolve to a single
 * ExecutionResult containing `errors` and no `data`.
 *
 * If the operation succeeded, the promise resolves to an AsyncIterator, which
 * yields a stream of ExecutionResults representing the response stream.
 *
 * This function does not support incremental delivery (`@defer` and `@stream`).
 * If an operation which would defer or stream data is executed with this
 * function, a field error will be raised at the location of the `@defer` or
 * `@stream` directive.
 *
 * Accepts an object with named arguments.
 */
export function subscribe(
  args: ExecutionArgs,
): PromiseOrValue<
  AsyncGenerator<ExecutionResult, void, void> | ExecutionResult
> {
  // If a valid execution context cannot be created due to incorrect arguments,
  // a "Response" with only errors is returned.
  const exeContext = buildExecutionContext(args);

  // Return early errors if execution context failed.
  if (!('schema' in exeContext)) {
    return { errors: exeContext };
  }

  const resultOrStream = createSourceEventStreamImpl(exeContext);

  if (isPromise(resultOrStream)) {
    return resultOrStream.then((resolvedResultOrStream) =>
      mapSourceToResponse(exeContext, resolvedResultOrStream),
    );
  }

  return mapSourceToResponse(exeContext, resultOrStream);
}

function mapSourceToResponse(
  exeContext: ExecutionContext,
  resultOrStream: ExecutionResult | AsyncIterable<unknown>,
): AsyncGenerator<ExecutionResult, void, void> | ExecutionResult {
  if (!isAsyncIterable(resultOrStream)) {
    return resultOrStream;
  }

  // For each payload yielded from a subscription, map it over the normal
  // GraphQL `execute` function, with `payload` as the rootValue.
  // This implements the "MapSourceToResponseEvent" algorithm described in
  // the GraphQL specification. The `execute` function provides the
  // "ExecuteSubscriptionEvent" algorithm, as it is nearly identical to the
  // "ExecuteQuery" algorithm, for which `execute` is also used.
  return mapAsyncIterable(resultOrStream, (payload: unknown) => {
    const result = executeImpl(
      buildPerEventExecutionContext(exeContext, payload),
    );
    return isPromise(result)
      ? result.then(assertSinglePayload)
      : assertSinglePayload(result);
  });
}

/**
 * Implements the "CreateSourceEventStream" algorithm described in the
 * GraphQL specification, resolving the subscription source event stream.
 *
 * Returns a Promise which resolves to either an AsyncIterable (if successful)
 * or an ExecutionResult (error). The promise will be rejected if the schema or
 * other arguments to this function are invalid, or if the resolved event stream
 * is not an async iterable.
 *
 * If the client-provided arguments to this function do not result in a
 * compliant subscription, a GraphQL Response (ExecutionResult) with
 * descriptive errors and no data will be returned.
 *
 * If the the source stream could not be created due to faulty subscription
 * resolver logic or underlying systems, the promise will resolve to a single
 * ExecutionResult containing `errors` and no `data`.
 *
 * If the operation succeeded, the promise resolves to the AsyncIterable for the
 * event stream returned by the resolver.
 *
 * A Source Event Stream represents a sequence of events, each of which triggers
 * a GraphQL execution for that event.
 *
 * This may be useful when hosting the stateful subscription service in a
 * different process or machine than the stateless GraphQL execution engine,
 * or otherwise separating these two steps. For more on this, see the
 * "Supporting Subscriptions at Scale" information in the GraphQL specification.
 */
export function createSourceEventStream(
  args: ExecutionArgs,
): PromiseOrValue<AsyncIterable<unknown> | ExecutionResult> {
  // If a valid execution context cannot be created due to incorrect arguments,
  // a "Response" with only errors is returned.
  const exeContext = buildExecutionContext(args);

  // Return early errors if execution context failed.
  if (!('schema' in exeContext)) {
    return { errors: exeContext };
  }

  return createSourceEventStreamImpl(exeContext);
}

function createSourceEventStreamImpl(
  exeContext: ExecutionContext,
): PromiseOrValue<AsyncIterable<unknown> | ExecutionResult> {
  try {
    const eventStream = executeSubscription(exeContext);
    if (isPromise(eventStream)) {
      return eventStream.then(undefined, (error: unknown) => ({
        errors: [toGraphQLError(error)],
      }));
    }

    return eventStream;
  } catch (error) {
    return { errors: [toGraphQLError(error)] };
  }
}

function executeSubscription(
  exeContext: ExecutionContext,
): PromiseOrValue<AsyncIterable<unknown>> {
  const { schema, fragments, operation, variableValues, rootValue } =
    exeContext;

  const rootType = schema.getSubscriptionType();
  if (rootType == null) {
    throw new GraphQLError(
      'Schema is not configured to execute subscription operation.',
      { nodes: operation },
    );
  }

  const { fields } = collectFields(
    schema,
    fragments,
    variableValues,
    rootType,
    operation,
  );

  const firstRootField = fields.entries().next();
  invariant(
    firstRootField.done !== true,
    'Subscription operation must select a root field.',
  );
  const [responseName, fieldGroup] = firstRootField.value;
  const fieldName = fieldGroup[0].node.name.value;
  const fieldDef = getFieldDef(schema, rootType, fieldGroup[0].node);

  if (!fieldDef) {
    throw new GraphQLError(
      `The subscription field "${fieldName}" is not defined.`,
      { nodes: toNodes(fieldGroup) },
    );
  }

  const path = addPath(undefined, responseName, rootType.name);
  const info = buildResolveInfo(
    exeContext,
    fieldDef,
    toNodes(fieldGroup),
    rootType,
    path,
  );

  try {
    // Implements the "ResolveFieldEventStream" algorithm from GraphQL specification.
    // It differs from "ResolveFieldValue" due to providing a different `resolveFn`.

    // Build a JS object of arguments from the field.arguments AST, using the
    // variables scope to fulfill any variable references.
    const args = getArgumentValues(
      fieldDef,
      fieldGroup[0].node,
      variableValues,
    );

    // The resolve function's optional third argument is a context value that
    // is provided to every resolve function within an execution. It is commonly
    // used to represent an authenticated user, or request-specific caches.
    const contextValue = exeContext.contextValue;

    // Call the `subscribe()` resolver or the default resolver to produce an
    // AsyncIterable yielding raw payloads.
    const resolveFn = fieldDef.subscribe ?? exeContext.subscribeFieldResolver;
    const result = resolveFn(rootValue, args, contextValue, info);

    if (isPromise(result)) {
      return result.then(assertEventStream).then(undefined, (error: unknown) => {
        throw locatedError(error, toNodes(fieldGroup), pathToArray(path));
      });
    }

    return assertEventStream(result);
  } catch (error) {
    throw locatedError(error, toNodes(fieldGroup), pathToArray(path));
  }
}

function assertEventStream(result: unknown): AsyncIterable<unknown> {
  if (result instanceof Error) {
    throw result;
  }

  // Assert field returned an event stream, otherwise yield an error.
  if (!isAsyncIterable(result)) {
    throw new GraphQLError(
      'Subscription field must return Async Iterable. ' +
        `Received: ${inspect(result)}.`,
    );
  }

  return result;
}
