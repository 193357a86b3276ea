import type { GraphQLError, GraphQLFormattedError } from 'graphql';

import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';

/**
 * The result of GraphQL execution.
 *
 *   - `errors` is included when any errors occurred as a non-empty array.
 *   - `data` is the result of a successful execution of the query.
 *   - `extensions` is reserved for adding non-standard properties.
 */
export interface ExecutionResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> {
  errors?: ReadonlyArray<GraphQLError>;
  data?: TData | null;
  extensions?: TExtensions;
}

export interface FormattedExecutionResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> {
  errors?: ReadonlyArray<GraphQLFormattedError>;
  data?: TData | null;
  extensions?: TExtensions;
}

export interface ExperimentalIncrementalExecutionResults<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> {
  initialResult: InitialIncrementalExecutionResult<TData, TExtensions>;
  subsequentResults: AsyncGenerator<
    SubsequentIncrementalExecutionResult<unknown, TExtensions>,
    void,
    void
  >;
}

export interface InitialIncrementalExecutionResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> extends ExecutionResult<TData, TExtensions> {
  data: TData;
  pending: ReadonlyArray<PendingResult>;
  hasNext: true;
  extensions?: TExtensions;
}

export interface SubsequentIncrementalExecutionResult<
  TData = unknown,
  TExtensions = ObjMap<unknown>,
> {
  pending?: ReadonlyArray<PendingResult>;
  incremental?: ReadonlyArray<IncrementalResult<TData, TExtensions>>;
  completed?: ReadonlyArray<CompletedResult>;
  hasNext: boolean;
  extensions?: TExtensions;
}

export interface BareDeferredGroupedFieldSetResult<TData = ObjMap<unknown>> {
  errors?: ReadonlyArray<GraphQLError>;
  data: TData;
}

export interface IncrementalDeferResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> extends BareDeferredGroupedFieldSetResult<TData> {
  id: string;
  subPath?: ReadonlyArray<string | number>;
  extensions?: TExtensions;
}

export interface BareStreamItemsResult<TData = ReadonlyArray<unknown>> {
  errors?: ReadonlyArray<GraphQLError>;
  items: TData;
}

export interface IncrementalStreamResult<
  TData = ReadonlyArray<unknown>,
  TExtensions = ObjMap<unknown>,
> extends BareStreamItemsResult<TData> {
  id: string;
  subPath?: ReadonlyArray<string | number>;
  extensions?: TExtensions;
}

export type IncrementalResult<TData = unknown, TExtensions = ObjMap<unknown>> =
  | IncrementalDeferResult<TData, TExtensions>
  | IncrementalStreamResult<TData, TExtensions>;

export interface PendingResult {
  id: string;
  path: ReadonlyArray<string | number>;
  label?: string;
}

export interface CompletedResult {
  id: string;
  errors?: ReadonlyArray<GraphQLError>;
}

/**
 * A DeferredFragmentRecord is created for each active `@defer` at each
 * object boundary where the fragment applies. It is announced as pending
 * once its parent fragment (if any) has completed, and completes once every
 * grouped field set result it expects has been reconciled.
 */
export class DeferredFragmentRecord {
  path: Path | undefined;
  label: string | undefined;
  id?: string | undefined;
  parent: DeferredFragmentRecord | undefined;
  expectedReconcilableResults: number;
  results: Array<DeferredGroupedFieldSetResult>;
  reconcilableResults: Set<ReconcilableDeferredGroupedFieldSetResult>;
  children: Set<DeferredFragmentRecord>;
  errors: ReadonlyArray<GraphQLError> | undefined;

  constructor(opts: {
    path: Path | undefined;
    label: string | undefined;
    parent: DeferredFragmentRecord | undefined;
  }) {
    this.path = opts.path;
    this.label = opts.label;
    this.parent = opts.parent;
    this.expectedReconcilableResults = 0;
    this.results = [];
    this.reconcilableResults = new Set();
    this.children = new Set();
  }
}

export interface DeferredGroupedFieldSetRecord {
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>;
  path: Path | undefined;
  result: PromiseOrValue<DeferredGroupedFieldSetResult>;
}

export type DeferredGroupedFieldSetResult =
  | ReconcilableDeferredGroupedFieldSetResult
  | NonReconcilableDeferredGroupedFieldSetResult;

export interface ReconcilableDeferredGroupedFieldSetResult {
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>;
  path: ReadonlyArray<string | number>;
  result: BareDeferredGroupedFieldSetResult;
  incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>;
  errors?: never;
  sent?: boolean;
}

export interface NonReconcilableDeferredGroupedFieldSetResult {
  deferredFragmentRecords: ReadonlyArray<DeferredFragmentRecord>;
  path: ReadonlyArray<string | number>;
  errors: ReadonlyArray<GraphQLError>;
  result?: never;
}

export function isNonReconcilableDeferredGroupedFieldSetResult(
  deferredGroupedFieldSetResult: DeferredGroupedFieldSetResult,
): deferredGroupedFieldSetResult is NonReconcilableDeferredGroupedFieldSetResult {
  return deferredGroupedFieldSetResult.errors !== undefined;
}

export interface StreamRecord {
  path: Path;
  label: string | undefined;
  id?: string | undefined;
}

export interface CancellableStreamRecord extends StreamRecord {
  earlyReturn: () => Promise<unknown>;
}

export function isCancellableStreamRecord(
  streamRecord: StreamRecord,
): streamRecord is CancellableStreamRecord {
  return 'earlyReturn' in streamRecord;
}

export interface StreamItemsRecord {
  streamRecord: StreamRecord;
  result: PromiseOrValue<StreamItemsResult>;
}

export type StreamItemsResult =
  | ReconcilableStreamItemsResult
  | TerminatingStreamItemsResult
  | NonReconcilableStreamItemsResult;

export interface ReconcilableStreamItemsResult {
  streamRecord: StreamRecord;
  result: BareStreamItemsResult;
  incrementalDataRecords: ReadonlyArray<IncrementalDataRecord>;
  errors?: never;
}

export interface TerminatingStreamItemsResult {
  streamRecord: StreamRecord;
  result?: never;
  incrementalDataRecords?: never;
  errors?: never;
}

export interface NonReconcilableStreamItemsResult {
  streamRecord: StreamRecord;
  errors: ReadonlyArray<GraphQLError>;
  result?: never;
}

export function isReconcilableStreamItemsResult(
  streamItemsResult: StreamItemsResult,
): streamItemsResult is ReconcilableStreamItemsResult {
  return streamItemsResult.result !== undefined;
}

export type IncrementalDataRecord =
  | DeferredGroupedFieldSetRecord
  | StreamItemsRecord;

export type IncrementalDataRecordResult =
  | DeferredGroupedFieldSetResult
  | StreamItemsResult;

export type SubsequentResultRecord = DeferredFragmentRecord | StreamRecord;

export function isDeferredGroupedFieldSetRecord(
  incrementalDataRecord: IncrementalDataRecord,
): incrementalDataRecord is DeferredGroupedFieldSetRecord {
  return 'deferredFragmentRecords' in incrementalDataRecord;
}

export function isDeferredGroupedFieldSetResult(
  subsequentResult: IncrementalDataRecordResult,
): subsequentResult is DeferredGroupedFieldSetResult {
  return 'deferredFragmentRecords' in subsequentResult;
}

export function isDeferredFragmentRecord(
  subsequentResultRecord: SubsequentResultRecord,
): subsequentResultRecord is DeferredFragmentRecord {
  return subsequentResultRecord instanceof DeferredFragmentRecord;
}
